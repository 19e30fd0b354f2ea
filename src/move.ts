import fs from "fs/promises";
import path from "path";
import { isErrnoCode } from "./errors.js";
import { pathExists } from "./fsutil.js";

/**
 * First free name in `dir` for `fileName`, trying `stem(1).ext`, `stem(2).ext`, ...
 * after the plain name. Paths in `reserved` count as taken.
 */
export async function resolveFreePath(
  dir: string,
  fileName: string,
  reserved: ReadonlySet<string> = new Set(),
): Promise<string> {
  const ext = path.extname(fileName);
  const stem = path.basename(fileName, ext);

  let candidate = path.join(dir, fileName);
  let counter = 1;
  while (reserved.has(candidate) || (await pathExists(candidate))) {
    candidate = path.join(dir, `${stem}(${counter})${ext}`);
    counter++;
  }
  return candidate;
}

async function renameAcrossDevices(source: string, destination: string): Promise<void> {
  try {
    await fs.rename(source, destination);
  } catch (error) {
    if (!isErrnoCode(error, "EXDEV")) throw error;
    await fs.copyFile(source, destination);
    await fs.unlink(source);
  }
}

/**
 * Move `source` into `destDir`, creating the folder if needed and never
 * overwriting an existing file. Returns the final path.
 */
export async function moveWithoutClobber(source: string, destDir: string): Promise<string> {
  await fs.mkdir(destDir, { recursive: true });
  const destination = await resolveFreePath(destDir, path.basename(source));
  await renameAcrossDevices(source, destination);
  return destination;
}
