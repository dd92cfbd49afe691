/**
 * ABOUTME: Tests for workspace fingerprinting and diffing.
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, symlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  diffFingerprints,
  fingerprintWorkspace,
  fingerprintsEqual,
  isExcluded,
} from '../../src/workspace/fingerprint.js';

describe('isExcluded', () => {
  test('bare names match any segment', () => {
    expect(isExcluded('node_modules/x/index.js', ['node_modules'])).toBe(true);
    expect(isExcluded('src/node_modules/y.js', ['node_modules'])).toBe(true);
    expect(isExcluded('src/app.ts', ['node_modules'])).toBe(false);
  });

  test('patterns with a slash match from the root', () => {
    expect(isExcluded('build/out/a.js', ['build/out'])).toBe(true);
    expect(isExcluded('src/build/out/a.js', ['build/out'])).toBe(false);
    expect(isExcluded('logs/today.log', ['logs/*.log'])).toBe(true);
  });

  test('wildcards apply to single segments', () => {
    expect(isExcluded('src/a.pyc', ['*.pyc'])).toBe(true);
    expect(isExcluded('src/a.py', ['*.pyc'])).toBe(false);
  });
});

describe('fingerprintWorkspace', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(join(tmpdir(), 'loopbench-fp-'));
    await mkdir(join(workspace, 'src'));
    await writeFile(join(workspace, 'src', 'b.txt'), 'b');
    await writeFile(join(workspace, 'a.txt'), 'a');
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  test('lists files by sorted relative path', async () => {
    const fingerprint = await fingerprintWorkspace(workspace);
    expect(Object.keys(fingerprint.files)).toEqual(['a.txt', 'src/b.txt']);
    expect(fingerprint.files['a.txt']).toBe('ca978112ca1bbdcafac231b39a23dc4da786eff8147c4e72b9807785afee48bb');
  });

  test('is stable for an unchanged workspace', async () => {
    const first = await fingerprintWorkspace(workspace);
    const second = await fingerprintWorkspace(workspace);
    expect(fingerprintsEqual(first, second)).toBe(true);
    expect(second.digest).toBe(first.digest);
  });

  test('ignores the control directory, .git and configured exclusions', async () => {
    const before = await fingerprintWorkspace(workspace, { exclude: ['tmp'] });
    await mkdir(join(workspace, '.loopbench'));
    await writeFile(join(workspace, '.loopbench', 'manifest.json'), '{}');
    await mkdir(join(workspace, '.git'));
    await writeFile(join(workspace, '.git', 'HEAD'), 'ref');
    await mkdir(join(workspace, 'tmp'));
    await writeFile(join(workspace, 'tmp', 'scratch'), 'x');

    const after = await fingerprintWorkspace(workspace, { exclude: ['tmp'] });
    expect(fingerprintsEqual(before, after)).toBe(true);
  });

  test('identifies symlinks by target without following them', async () => {
    await symlink('a.txt', join(workspace, 'link'));
    const before = await fingerprintWorkspace(workspace);
    await writeFile(join(workspace, 'a.txt'), 'changed');
    const after = await fingerprintWorkspace(workspace);

    expect(after.files['link']).toBe(before.files['link']);
    expect(after.files['a.txt']).not.toBe(before.files['a.txt']);
  });

  test('diff reports created, modified, deleted and unchanged paths', async () => {
    const initial = await fingerprintWorkspace(workspace);
    await writeFile(join(workspace, 'a.txt'), 'a2');
    await rm(join(workspace, 'src', 'b.txt'));
    await writeFile(join(workspace, 'c.txt'), 'c');
    await writeFile(join(workspace, 'src', 'd.txt'), 'd');
    await writeFile(join(workspace, 'src', 'b2.txt'), 'b');

    const diff = diffFingerprints(initial, await fingerprintWorkspace(workspace));
    expect(diff).toEqual({
      created: ['c.txt', 'src/b2.txt', 'src/d.txt'],
      modified: ['a.txt'],
      deleted: ['src/b.txt'],
      unchanged: [],
    });
  });

  test('treats built-in object property names as ordinary paths', async () => {
    const names = ['__proto__', 'constructor', 'toString'];
    const initial = await fingerprintWorkspace(workspace);
    for (const name of names) {
      await writeFile(join(workspace, name), name);
    }
    const withNames = await fingerprintWorkspace(workspace);

    expect(Object.keys(withNames.files)).toEqual(['__proto__', 'a.txt', 'constructor', 'src/b.txt', 'toString']);
    expect(diffFingerprints(initial, withNames)).toEqual({
      created: names,
      modified: [],
      deleted: [],
      unchanged: ['a.txt', 'src/b.txt'],
    });

    for (const name of names) {
      await rm(join(workspace, name));
    }
    const removed = diffFingerprints(withNames, await fingerprintWorkspace(workspace));
    expect(removed.deleted).toEqual(names);
    expect(removed.created).toEqual([]);
    expect(fingerprintsEqual(initial, await fingerprintWorkspace(workspace))).toBe(true);
  });
});
