import { afterEach, describe, it, expect, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { runLink } from './link.js';
import { testIO } from './testio.js';

const tempDirs: string[] = [];

async function mkTempDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vault-tidy-link-cmd-'));
  tempDirs.push(dir);
  return dir;
}

afterEach(async () => {
  for (const dir of tempDirs.splice(0)) {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

describe('runLink', () => {
  it('should link notes and print a summary', async () => {
    const cwd = await mkTempDir();
    await fs.mkdir(path.join(cwd, '2025-06'));
    await fs.mkdir(path.join(cwd, '2025-07'));
    await fs.writeFile(path.join(cwd, '2025-06', '6-30-2025.md'), '# a');
    await fs.writeFile(path.join(cwd, '2025-07', '7-1-2025.md'), '# b');
    const io = testIO(cwd);

    expect(await runLink([], io)).toBe(0);

    expect(io.lines.slice(-2)).toEqual([
      '[INFO] Summary: 1 links added, 1 files skipped',
      '[SUCCESS] Linking complete!',
    ]);
    expect(await fs.readFile(path.join(cwd, '2025-06', '6-30-2025.md'), 'utf-8')).toBe(
      '# a\n\n---\n**Next:** [[7-1-2025]]',
    );
  });

  it('should not link across folders with --per-folder', async () => {
    const cwd = await mkTempDir();
    await fs.mkdir(path.join(cwd, '2025-06'));
    await fs.mkdir(path.join(cwd, '2025-07'));
    await fs.writeFile(path.join(cwd, '2025-06', '6-30-2025.md'), '# a');
    await fs.writeFile(path.join(cwd, '2025-07', '7-1-2025.md'), '# b');
    const io = testIO(cwd);

    expect(await runLink(['--per-folder', '.'], io)).toBe(0);

    expect(io.lines).toContain('[INFO] Summary: 0 links added, 2 files skipped');
    expect(await fs.readFile(path.join(cwd, '2025-06', '6-30-2025.md'), 'utf-8')).toBe('# a');
  });

  it('should exit 1 when a link cannot be written', async () => {
    const cwd = await mkTempDir();
    await fs.writeFile(path.join(cwd, '6-30-2025.md'), '# a');
    await fs.writeFile(path.join(cwd, '7-1-2025.md'), '# b');
    vi.spyOn(fs, 'appendFile').mockRejectedValue(Object.assign(new Error('EACCES: denied'), { code: 'EACCES' }));
    const io = testIO(cwd);

    expect(await runLink([], io)).toBe(1);

    expect(io.lines.slice(-2)).toEqual([
      '[INFO] Summary: 0 links added, 1 files skipped',
      '[ERROR] Errors encountered: 1',
    ]);
  });

  it('should exit 1 for a missing directory', async () => {
    const io = testIO(await mkTempDir());

    expect(await runLink(['missing'], io)).toBe(1);
    expect(io.lines).toEqual(["[ERROR] Directory 'missing' does not exist"]);
  });
});
