import fs from "fs/promises";
import { formatBackupStamp } from "./date.js";
import { isDirectory, pathExists } from "./fsutil.js";

export interface InstallOptions {
  source: string;
  backup?: boolean;
  now?: () => Date;
}

export interface InstallResult {
  target: string;
  backupPath?: string;
}

// `<target>_backup_YYYYMMDD_HHMMSS`, with `_1`, `_2`, ... if that name is taken.
export async function backupPathFor(target: string, now: Date): Promise<string> {
  const base = `${target.replace(/[\\/]+$/, "")}_backup_${formatBackupStamp(now)}`;
  let candidate = base;
  let counter = 1;
  while (await pathExists(candidate)) {
    candidate = `${base}_${counter}`;
    counter++;
  }
  return candidate;
}

/**
 * Copy the contents of `options.source` over `target`, overwriting files that
 * already exist. When `backup` is on (the default) and the target exists, it is
 * copied aside first. A failure part-way leaves the target as-is; nothing is
 * rolled back.
 */
export async function installDotfiles(target: string, options: InstallOptions): Promise<InstallResult> {
  const backup = options.backup ?? true;
  const now = options.now ?? (() => new Date());
  const result: InstallResult = { target };

  if (backup && (await isDirectory(target))) {
    const backupPath = await backupPathFor(target, now());
    await fs.cp(target, backupPath, { recursive: true, errorOnExist: true, force: false });
    result.backupPath = backupPath;
  }

  await fs.mkdir(target, { recursive: true });
  await fs.cp(options.source, target, { recursive: true, force: true });
  return result;
}
