import { afterEach, describe, it, expect } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { runOrganize } from './organize.js';
import { testIO } from './testio.js';

const tempDirs: string[] = [];

async function mkTempDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vault-tidy-organize-cmd-'));
  tempDirs.push(dir);
  return dir;
}

afterEach(async () => {
  for (const dir of tempDirs.splice(0)) {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

async function setup(): Promise<string> {
  const cwd = await mkTempDir();
  await fs.mkdir(path.join(cwd, 'vault'));
  await fs.writeFile(path.join(cwd, 'vault', '6-29-2025.md'), 'walk');
  await fs.writeFile(path.join(cwd, 'vault', 'todo.md'), 'misc');
  return cwd;
}

describe('runOrganize', () => {
  it('should stop when the user does not confirm', async () => {
    const cwd = await setup();
    const io = testIO(cwd, ['n']);

    expect(await runOrganize(['vault'], io)).toBe(0);

    expect(io.questions).toEqual(['Do you want to proceed? (y/N): ']);
    expect(io.lines.at(-1)).toBe('[INFO] Operation cancelled');
    expect((await fs.readdir(path.join(cwd, 'vault'))).sort()).toEqual(['6-29-2025.md', 'todo.md']);
  });

  it('should organize after confirmation', async () => {
    const cwd = await setup();
    const io = testIO(cwd, [' Yes ']);

    expect(await runOrganize(['vault'], io)).toBe(0);

    expect(io.lines).toContain('[INFO] Files organized: 1');
    expect(io.lines).toContain('[INFO] Files skipped: 1');
    expect(io.lines).toContain('  - 2025-06/ (1 files)');
    expect(io.lines.at(-1)).toBe('[SUCCESS] Organization complete!');
    expect(await fs.readFile(path.join(cwd, 'vault', '2025-06', '6-29-2025.md'), 'utf-8')).toBe(
      '# June 29, 2025\n\nwalk',
    );
  });

  it('should skip the prompt with --yes and honour --no-headings', async () => {
    const cwd = await setup();
    const io = testIO(cwd);

    expect(await runOrganize(['-y', '--no-headings', 'vault'], io)).toBe(0);

    expect(io.questions).toEqual([]);
    expect(await fs.readFile(path.join(cwd, 'vault', '2025-06', '6-29-2025.md'), 'utf-8')).toBe('walk');
  });

  it('should not ask or move anything on a dry run', async () => {
    const cwd = await setup();
    const io = testIO(cwd);

    expect(await runOrganize(['--dry-run', 'vault'], io)).toBe(0);

    expect(io.questions).toEqual([]);
    expect(io.lines.at(-1)).toBe('[SUCCESS] Dry run complete; no files were changed');
    expect((await fs.readdir(path.join(cwd, 'vault'))).sort()).toEqual(['6-29-2025.md', 'todo.md']);
  });

  it('should use the configured vault directory', async () => {
    const cwd = await setup();
    const io = testIO(cwd, [], { VAULT_TIDY_VAULT_DIR: 'vault' });

    expect(await runOrganize(['-y', '-q'], io)).toBe(0);

    expect(io.lines).toEqual([]);
    expect(await fs.readdir(path.join(cwd, 'vault', '2025-06'))).toEqual(['6-29-2025.md']);
  });

  it('should exit 1 for a missing directory', async () => {
    const io = testIO(await mkTempDir());

    expect(await runOrganize(['nope'], io)).toBe(1);
    expect(io.lines).toEqual(["[ERROR] Directory 'nope' does not exist"]);
  });

  it('should exit 1 when a move fails', async () => {
    const cwd = await setup();
    await fs.writeFile(path.join(cwd, 'vault', '2025-06'), 'not a folder');
    const io = testIO(cwd);

    expect(await runOrganize(['-y', '--no-headings', 'vault'], io)).toBe(1);
    expect(io.lines).toContain('[ERROR] Errors encountered: 1');
  });
});
