/**
 * ABOUTME: Tests for committing audit records to the workspace repository.
 * Skipped when git is not installed.
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { execFileSync } from 'node:child_process';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { commitRecord, isGitRepository } from '../../src/engine/auto-commit.js';
import { runProcess } from '../../src/utils/process.js';

function gitAvailable(): boolean {
  try {
    execFileSync('git', ['--version'], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

describe.runIf(gitAvailable())('auto-commit', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'loopbench-git-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('isGitRepository tells a work tree from a plain directory', async () => {
    expect(await isGitRepository(dir)).toBe(false);
    await runProcess('git', ['init', '-q'], { cwd: dir });
    expect(await isGitRepository(dir)).toBe(true);
  });

  test('commits workspace changes but not the control directory', async () => {
    await runProcess('git', ['init', '-q'], { cwd: dir });
    await writeFile(join(dir, 'hello.txt'), 'hello\n');
    await mkdir(join(dir, '.loopbench'));
    await writeFile(join(dir, '.loopbench', 'manifest.json'), '{}\n');

    const result = await commitRecord(dir, '[loopbench] edit: wrote hello.txt\n\nHarness: test\nIteration: 1\n');

    expect(result.error).toBeUndefined();
    expect(result.committed).toBe(true);
    expect(result.commitSha).toMatch(/^[0-9a-f]{4,}$/);

    const show = await runProcess('git', ['show', '--name-only', '--format=%s', 'HEAD'], { cwd: dir });
    expect(show.stdout.trim().split('\n').filter(Boolean)).toEqual(['[loopbench] edit: wrote hello.txt', 'hello.txt']);
  });

  test('allows an empty commit so every record gets one', async () => {
    await runProcess('git', ['init', '-q'], { cwd: dir });
    await commitRecord(dir, 'first');
    const second = await commitRecord(dir, 'second');
    expect(second.committed).toBe(true);
  });
});
