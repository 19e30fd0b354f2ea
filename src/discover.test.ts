import { afterEach, describe, it, expect } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { discoverVaultConfigs, isExcludedPath } from './discover.js';

const tempDirs: string[] = [];

async function mkTempDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vault-tidy-discover-'));
  tempDirs.push(dir);
  return dir;
}

afterEach(async () => {
  for (const dir of tempDirs.splice(0)) {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

async function mkdirs(root: string, ...dirs: string[]): Promise<void> {
  for (const dir of dirs) {
    await fs.mkdir(path.join(root, dir), { recursive: true });
  }
}

describe('isExcludedPath', () => {
  it('should match whole path segments', () => {
    expect(isExcludedPath('/var/lib/vault/.obsidian', ['var'])).toBe(true);
    expect(isExcludedPath('/proc', ['proc'])).toBe(true);
    expect(isExcludedPath('/home/me/vars/.obsidian', ['var'])).toBe(false);
    expect(isExcludedPath('/home/me/.obsidian', [])).toBe(false);
  });
});

describe('discoverVaultConfigs', () => {
  it('should find vault configs in sorted order and skip the source', async () => {
    const root = await mkTempDir();
    await mkdirs(root, '.obsidian/plugins', 'b/nested/.obsidian', 'a/.obsidian', 'c/notes');

    const result = await discoverVaultConfigs({
      root,
      mode: 'local',
      sourceDir: path.join(root, '.obsidian'),
    });

    expect(result).toEqual({
      directories: [path.join(root, 'a', '.obsidian'), path.join(root, 'b', 'nested', '.obsidian')],
      truncated: false,
      unreadable: 0,
    });
  });

  it('should not descend into a match', async () => {
    const root = await mkTempDir();
    await mkdirs(root, 'vault/.obsidian/backup/.obsidian');

    const result = await discoverVaultConfigs({ root, mode: 'local', sourceDir: path.join(root, 'src') });

    expect(result.directories).toEqual([path.join(root, 'vault', '.obsidian')]);
  });

  it('should stop at the result cap and flag truncation', async () => {
    const root = await mkTempDir();
    await mkdirs(root, 'v1/.obsidian', 'v2/.obsidian', 'v3/.obsidian');
    const sourceDir = path.join(root, 'none');

    const capped = await discoverVaultConfigs({ root, mode: 'local', sourceDir, maxResults: 2 });
    expect(capped.directories).toEqual([path.join(root, 'v1', '.obsidian'), path.join(root, 'v2', '.obsidian')]);
    expect(capped.truncated).toBe(true);

    const exact = await discoverVaultConfigs({ root, mode: 'local', sourceDir, maxResults: 3 });
    expect(exact.directories).toHaveLength(3);
    expect(exact.truncated).toBe(false);
  });

  it('should prune excluded trees only in system mode', async () => {
    const root = await mkTempDir();
    await mkdirs(root, 'cache/.obsidian', 'home/u/.obsidian');
    const sourceDir = path.join(root, 'none');

    const system = await discoverVaultConfigs({ root, mode: 'system', sourceDir, excludes: ['cache'] });
    expect(system.directories).toEqual([path.join(root, 'home', 'u', '.obsidian')]);

    const local = await discoverVaultConfigs({ root, mode: 'local', sourceDir, excludes: ['cache'] });
    expect(local.directories).toEqual([
      path.join(root, 'cache', '.obsidian'),
      path.join(root, 'home', 'u', '.obsidian'),
    ]);
  });

  it('should not follow symlinks', async () => {
    const root = await mkTempDir();
    await mkdirs(root, 'a/.obsidian');
    await fs.symlink(path.join(root, 'a'), path.join(root, 'link'), 'dir');

    const result = await discoverVaultConfigs({ root, mode: 'local', sourceDir: path.join(root, 'none') });

    expect(result.directories).toEqual([path.join(root, 'a', '.obsidian')]);
  });

  it('should count a root it cannot read instead of throwing', async () => {
    const root = await mkTempDir();

    const result = await discoverVaultConfigs({
      root: path.join(root, 'missing'),
      mode: 'local',
      sourceDir: path.join(root, '.obsidian'),
    });

    expect(result).toEqual({ directories: [], truncated: false, unreadable: 1 });
  });

  it('should match a custom folder name', async () => {
    const root = await mkTempDir();
    await mkdirs(root, 'x/.config-vault', 'y/.obsidian');

    const result = await discoverVaultConfigs({
      root,
      mode: 'local',
      sourceDir: path.join(root, 'none'),
      name: '.config-vault',
    });

    expect(result.directories).toEqual([path.join(root, 'x', '.config-vault')]);
  });
});
