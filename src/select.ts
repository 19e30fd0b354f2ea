export interface Selection {
  // Zero-based, in the order entered, without repeats
  indices: number[];
  invalid: string[];
}

/**
 * Read a target choice like `1 3` or `all` against a list of `count` entries.
 * Numbers are 1-based; anything else or out of range lands in `invalid`.
 */
export function parseSelection(input: string, count: number): Selection {
  const trimmed = input.trim();
  if (trimmed === "all") {
    return { indices: Array.from({ length: count }, (_, i) => i), invalid: [] };
  }

  const selection: Selection = { indices: [], invalid: [] };
  for (const token of trimmed.split(/\s+/).filter(Boolean)) {
    const n = /^\d+$/.test(token) ? Number(token) : NaN;
    if (!Number.isInteger(n) || n < 1 || n > count) {
      selection.invalid.push(token);
      continue;
    }
    if (!selection.indices.includes(n - 1)) {
      selection.indices.push(n - 1);
    }
  }
  return selection;
}
