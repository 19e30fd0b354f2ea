import fs from "fs/promises";
import path from "path";
import { BUCKET_PATTERN, bucketLabel, parseNoteDate } from "./date.js";
import { errorMessage } from "./errors.js";
import { ensureHeading } from "./heading.js";
import type { Logger } from "./log.js";
import { moveWithoutClobber, resolveFreePath } from "./move.js";

export interface OrganizeOptions {
  fixHeadings?: boolean;
  dryRun?: boolean;
  logger: Logger;
}

export interface PlannedMove {
  file: string;
  bucket: string;
  destination: string;
}

export interface BucketCount {
  name: string;
  files: number;
}

export interface OrganizeSummary {
  total: number;
  organized: number;
  skipped: number;
  fixed: number;
  errors: string[];
  moves: PlannedMove[];
  folders: BucketCount[];
}

export async function listMarkdownFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(".md"))
    .map((entry) => entry.name)
    .sort();
}

export async function listBuckets(dir: string): Promise<BucketCount[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const buckets = entries
    .filter((entry) => entry.isDirectory() && BUCKET_PATTERN.test(entry.name))
    .map((entry) => entry.name)
    .sort();

  const counts: BucketCount[] = [];
  for (const name of buckets) {
    const files = await listMarkdownFiles(path.join(dir, name));
    counts.push({ name, files: files.length });
  }
  return counts;
}

/**
 * File every top-level `M-D-YYYY.md` note in `dir` into its `YYYY-MM` folder.
 * Unparseable names are skipped; a failed move is recorded and the run continues.
 */
export async function organizeNotes(dir: string, options: OrganizeOptions): Promise<OrganizeSummary> {
  const { logger } = options;
  const fixHeadings = options.fixHeadings ?? true;
  const dryRun = options.dryRun ?? false;

  const files = await listMarkdownFiles(dir);
  const summary: OrganizeSummary = {
    total: files.length,
    organized: 0,
    skipped: 0,
    fixed: 0,
    errors: [],
    moves: [],
    folders: [],
  };

  if (files.length === 0) {
    logger.warn("No markdown files found in the directory");
    return summary;
  }
  logger.info(`Found ${files.length} markdown files`);

  // Dry runs move nothing, so planned destinations are reserved here instead.
  const planned = new Set<string>();

  for (const file of files) {
    const date = parseNoteDate(file);
    if (!date) {
      logger.warn(`Skipping '${file}' - could not parse date`);
      summary.skipped++;
      continue;
    }

    const bucket = bucketLabel(date);
    const bucketDir = path.join(dir, bucket);
    const source = path.join(dir, file);

    if (dryRun) {
      const destination = await resolveFreePath(bucketDir, file, planned);
      planned.add(destination);
      summary.moves.push({ file, bucket, destination });
      logger.info(`Would move '${file}' to '${path.relative(dir, destination)}'`);
      summary.organized++;
      continue;
    }

    if (fixHeadings) {
      try {
        if (await ensureHeading(source)) summary.fixed++;
      } catch (error) {
        logger.warn(`Could not fix heading in '${file}': ${errorMessage(error)}`);
      }
    }

    try {
      const destination = await moveWithoutClobber(source, bucketDir);
      summary.moves.push({ file, bucket, destination });
      logger.success(`Moved '${file}' to '${bucket}/'`);
      summary.organized++;
    } catch (error) {
      const message = `Error moving '${file}': ${errorMessage(error)}`;
      logger.error(message);
      summary.errors.push(message);
    }
  }

  summary.folders = await listBuckets(dir);
  return summary;
}

export function printOrganizeSummary(summary: OrganizeSummary, logger: Logger): void {
  logger.plain("");
  logger.plain("=".repeat(50));
  logger.plain("ORGANIZATION SUMMARY");
  logger.plain("=".repeat(50));
  logger.info(`Files organized: ${summary.organized}`);
  logger.info(`Files skipped: ${summary.skipped}`);
  logger.info(`Files fixed (markdown headings): ${summary.fixed}`);

  if (summary.errors.length > 0) {
    logger.error(`Errors encountered: ${summary.errors.length}`);
    for (const error of summary.errors) {
      logger.plain(`  - ${error}`);
    }
  }

  if (summary.folders.length > 0) {
    logger.plain("");
    logger.info("Bucket folders:");
    for (const folder of summary.folders) {
      logger.plain(`  - ${folder.name}/ (${folder.files} files)`);
    }
  }
}
