import * as yaml from "js-yaml";

export interface ParsedNote {
  frontmatter: Record<string, unknown>;
  // Raw front matter block including the closing `---` line and newline
  header: string;
  body: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Split a note into YAML front matter and body.
 * Returns null when there is no front matter or it is not a YAML mapping.
 */
export function parseFrontmatter(content: string): ParsedNote | null {
  if (!content.startsWith("---")) {
    return null;
  }

  const match = content.match(/^(---\r?\n(?:---|(.*?)\r?\n---)(?:\r?\n|$))(.*)$/s);
  if (!match) {
    return null;
  }

  try {
    const loaded = yaml.load(match[2] ?? "") ?? {};
    if (!isRecord(loaded)) {
      return null;
    }
    return { frontmatter: loaded, header: match[1], body: match[3] };
  } catch {
    return null;
  }
}
