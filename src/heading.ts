import fs from "fs/promises";
import path from "path";
import { formatLongDate, parseNoteDate } from "./date.js";
import { parseFrontmatter } from "./frontmatter.js";

export function headingTitle(fileName: string, frontmatter: Record<string, unknown> = {}): string {
  const title = frontmatter.title;
  if (typeof title === "string" && title.trim()) {
    return title.trim();
  }

  const date = parseNoteDate(fileName);
  if (date) {
    return formatLongDate(date);
  }
  return path.basename(fileName, path.extname(fileName));
}

/**
 * Give a note a top-level heading when its body doesn't start with one.
 * Front matter stays first. Returns the new content, or null if nothing changes.
 */
export function withHeading(content: string, fileName: string): string | null {
  const parsed = parseFrontmatter(content);
  const header = parsed?.header ?? "";
  const body = parsed ? parsed.body : content;

  if (body.trim().startsWith("#")) {
    return null;
  }

  const heading = `# ${headingTitle(fileName, parsed?.frontmatter)}`;
  const rest = body.replace(/^\s*\n/, "");
  return `${header}${heading}\n\n${rest}`;
}

export async function ensureHeading(filePath: string): Promise<boolean> {
  const content = await fs.readFile(filePath, "utf-8");
  const updated = withHeading(content, path.basename(filePath));
  if (updated === null) {
    return false;
  }
  await fs.writeFile(filePath, updated, "utf-8");
  return true;
}
