import fs from "fs/promises";
import path from "path";
import { BUCKET_PATTERN, dateKey, parseNoteDate } from "./date.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./log.js";

export type LinkScope = "vault" | "folder";

export interface DatedNote {
  path: string;
  name: string;
  key: string;
}

export interface NoteLink {
  from: string;
  to: string;
}

export interface LinkSummary {
  notes: number;
  linked: number;
  skipped: number;
  links: NoteLink[];
  errors: string[];
}

export function linkName(fileName: string): string {
  return fileName.replace(/\.md$/, "");
}

export function nextLinkBlock(target: string): string {
  return `\n\n---\n**Next:** [[${linkName(target)}]]`;
}

async function collectDatedNotes(
  dir: string,
  recursive: boolean,
  logger: Logger,
  out: DatedNote[] = [],
): Promise<DatedNote[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const fullPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      if (!recursive) continue;
      try {
        await collectDatedNotes(fullPath, recursive, logger, out);
      } catch (error) {
        logger.warn(`Skipping unreadable directory '${fullPath}': ${errorMessage(error)}`);
      }
    } else if (entry.isFile() && entry.name.endsWith(".md")) {
      const date = parseNoteDate(entry.name);
      if (date) {
        out.push({ path: fullPath, name: entry.name, key: dateKey(date) });
      }
    }
  }
  return out;
}

// `7-1-2025.md` before `7-1-2025(1).md` before `7-1-2025(2).md`.
function compareNoteNames(a: string, b: string): number {
  const split = (name: string): [string, number] => {
    const match = linkName(name).match(/^(.*?)(?:\((\d+)\))?$/s);
    return match ? [match[1], match[2] === undefined ? 0 : Number(match[2])] : [name, 0];
  };
  const [baseA, copyA] = split(a);
  const [baseB, copyB] = split(b);
  if (baseA !== baseB) return baseA < baseB ? -1 : 1;
  if (copyA !== copyB) return copyA - copyB;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Pair each note with the first note of the next later date, where a plain
 * name comes before its `(N)` copies.
 * Notes sharing a date all point at the same successor; the last date gets none.
 */
export function planNextLinks(notes: readonly DatedNote[]): Array<{ note: DatedNote; next: DatedNote | null }> {
  const byDate = new Map<string, DatedNote[]>();
  for (const note of notes) {
    const group = byDate.get(note.key) ?? [];
    group.push(note);
    byDate.set(note.key, group);
  }

  const keys = [...byDate.keys()].sort();
  for (const key of keys) {
    byDate.get(key)?.sort((a, b) => compareNoteNames(a.name, b.name));
  }

  const plan: Array<{ note: DatedNote; next: DatedNote | null }> = [];
  keys.forEach((key, index) => {
    const nextKey = keys[index + 1];
    const next = nextKey === undefined ? null : byDate.get(nextKey)?.[0] ?? null;
    for (const note of byDate.get(key) ?? []) {
      plan.push({ note, next });
    }
  });
  return plan;
}

// Appends the link unless the note already has one to the same target.
export async function appendNextLink(filePath: string, target: string): Promise<boolean> {
  const content = await fs.readFile(filePath, "utf-8");
  if (content.includes(`[[${linkName(target)}]]`)) {
    return false;
  }
  await fs.appendFile(filePath, nextLinkBlock(target), "utf-8");
  return true;
}

async function linkGroup(notes: DatedNote[], logger: Logger, summary: LinkSummary): Promise<void> {
  for (const { note, next } of planNextLinks(notes)) {
    summary.notes++;
    if (!next) {
      logger.info(`No next note for '${note.name}' (last chronological note)`);
      summary.skipped++;
      continue;
    }

    try {
      if (await appendNextLink(note.path, next.name)) {
        logger.success(`Linked '${note.name}' → '${next.name}'`);
        summary.links.push({ from: note.path, to: next.path });
        summary.linked++;
      } else {
        logger.info(`Skipped '${note.name}' (link already exists)`);
        summary.skipped++;
      }
    } catch (error) {
      const message = `Error adding link to '${note.name}': ${errorMessage(error)}`;
      logger.error(message);
      summary.errors.push(message);
    }
  }
}

/**
 * Append a `**Next:** [[...]]` link to every daily note. With scope "folder"
 * each YYYY-MM folder is chained separately.
 */
export async function linkNotes(vaultDir: string, scope: LinkScope, logger: Logger): Promise<LinkSummary> {
  const summary: LinkSummary = { notes: 0, linked: 0, skipped: 0, links: [], errors: [] };

  if (scope === "vault") {
    const notes = await collectDatedNotes(vaultDir, true, logger);
    if (notes.length === 0) {
      logger.warn("No valid date files found in vault");
      return summary;
    }
    logger.info(`Found ${notes.length} dated notes across all directories`);
    await linkGroup(notes, logger, summary);
    return summary;
  }

  const entries = await fs.readdir(vaultDir, { withFileTypes: true });
  const folders = entries
    .filter((entry) => entry.isDirectory() && BUCKET_PATTERN.test(entry.name))
    .map((entry) => entry.name)
    .sort();

  for (const folder of folders) {
    logger.info(`Processing folder: ${folder}`);
    let notes: DatedNote[];
    try {
      notes = await collectDatedNotes(path.join(vaultDir, folder), false, logger);
    } catch (error) {
      logger.warn(`Skipping unreadable directory '${folder}': ${errorMessage(error)}`);
      continue;
    }
    if (notes.length === 0) {
      logger.warn(`No valid date files found in ${folder}`);
      continue;
    }
    await linkGroup(notes, logger, summary);
  }
  return summary;
}
