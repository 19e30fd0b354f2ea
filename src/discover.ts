import type { Dirent } from "fs";
import fs from "fs/promises";
import path from "path";
import { SYSTEM_EXCLUDES } from "./config.js";

export type SearchMode = "local" | "system";

export interface DiscoveryOptions {
  root: string;
  mode: SearchMode;
  // The config folder being installed from; never reported as a target
  sourceDir: string;
  name?: string;
  maxResults?: number;
  excludes?: readonly string[];
}

export interface DiscoveryResult {
  directories: string[];
  truncated: boolean;
  // Subtrees skipped because they could not be listed
  unreadable: number;
}

async function realpathOrSelf(target: string): Promise<string> {
  try {
    return await fs.realpath(target);
  } catch {
    return path.resolve(target);
  }
}

export function isExcludedPath(dir: string, excludes: readonly string[]): boolean {
  const normalized = path.resolve(dir).split(path.sep).join("/") + "/";
  return excludes.some((segment) => normalized.includes(`/${segment}/`));
}

/**
 * Depth-first search for directories named `name` (default `.obsidian`).
 * Children are visited in sorted order, symlinks are not followed and a
 * match is not descended into. In system mode excluded trees are pruned.
 */
export async function discoverVaultConfigs(options: DiscoveryOptions): Promise<DiscoveryResult> {
  const name = options.name ?? ".obsidian";
  const maxResults = options.maxResults ?? 100;
  const excludes = options.mode === "system" ? options.excludes ?? SYSTEM_EXCLUDES : [];
  const source = await realpathOrSelf(options.sourceDir);

  const result: DiscoveryResult = { directories: [], truncated: false, unreadable: 0 };

  async function walk(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch {
      result.unreadable++;
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (result.truncated) return;
      if (!entry.isDirectory()) continue;

      const fullPath = path.join(dir, entry.name);
      if (isExcludedPath(fullPath, excludes)) continue;

      if (entry.name !== name) {
        await walk(fullPath);
        continue;
      }

      if ((await realpathOrSelf(fullPath)) === source) continue;
      if (result.directories.length >= maxResults) {
        result.truncated = true;
        return;
      }
      result.directories.push(fullPath);
    }
  }

  await walk(options.root);
  return result;
}
