/**
 * ABOUTME: Workspace fingerprinting.
 * Hashes every file under a workspace (minus the control directory, .git and
 * configured exclusions) into an ordered path -> SHA-256 map plus an aggregate
 * digest, and diffs two fingerprints into created/modified/deleted paths.
 */

import { createHash } from 'node:crypto';
import { readdir, readFile, readlink } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import { globMatch } from '../utils/files.js';
import { CONTROL_DIR } from './paths.js';

/**
 * Content identity of a workspace at one point in time.
 */
export interface WorkspaceFingerprint {
  /** SHA-256 over the ordered (path, digest) entries */
  readonly digest: string;
  /** Relative POSIX path -> SHA-256 of the file content, sorted by path */
  readonly files: Readonly<Record<string, string>>;
}

export interface FingerprintOptions {
  /** Extra exclusions: bare names match any path segment, patterns with '/' match from the root */
  exclude?: readonly string[];
}

/**
 * File provenance relative to an earlier fingerprint.
 */
export interface FingerprintDiff {
  created: string[];
  modified: string[];
  deleted: string[];
  unchanged: string[];
}

/** Always excluded, whatever the configuration says. */
export const ALWAYS_EXCLUDED: readonly string[] = [CONTROL_DIR, '.git'];

function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Whether a workspace-relative POSIX path falls under an exclusion pattern.
 */
export function isExcluded(relPath: string, patterns: readonly string[]): boolean {
  const segments = relPath.split('/');
  for (const pattern of patterns) {
    const normalized = pattern.replace(/\\/g, '/').replace(/^\.\//, '').replace(/\/+$/, '');
    if (!normalized) continue;

    if (normalized.includes('/')) {
      if (globMatch(normalized, relPath)) return true;
      // Prefix match: a directory pattern excludes everything beneath it
      for (let i = 1; i < segments.length; i++) {
        if (globMatch(normalized, segments.slice(0, i).join('/'))) return true;
      }
      continue;
    }

    if (segments.some((segment) => globMatch(normalized, segment))) return true;
  }
  return false;
}

async function walk(
  root: string,
  dir: string,
  patterns: readonly string[],
  out: Map<string, string>,
): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const absolute = join(dir, entry.name);
    const relPath = relative(root, absolute).split(sep).join('/');
    if (isExcluded(relPath, patterns)) continue;

    if (entry.isDirectory()) {
      await walk(root, absolute, patterns, out);
    } else if (entry.isSymbolicLink()) {
      // Links are identified by target, never followed
      out.set(relPath, sha256(`symlink:${await readlink(absolute)}`));
    } else if (entry.isFile()) {
      out.set(relPath, sha256(await readFile(absolute)));
    }
  }
}

/**
 * Fingerprint a workspace directory.
 */
export async function fingerprintWorkspace(
  root: string,
  options: FingerprintOptions = {},
): Promise<WorkspaceFingerprint> {
  const patterns = [...ALWAYS_EXCLUDED, ...(options.exclude ?? [])];
  const collected = new Map<string, string>();
  await walk(root, root, patterns, collected);

  const paths = [...collected.keys()].sort();
  const files: Record<string, string> = Object.create(null);
  const aggregate = createHash('sha256');
  for (const path of paths) {
    const digest = collected.get(path) ?? '';
    files[path] = digest;
    aggregate.update(`${path}\0${digest}\n`);
  }

  return Object.freeze({ digest: aggregate.digest('hex'), files: Object.freeze(files) });
}

/**
 * Equal iff every path and every digest match.
 */
export function fingerprintsEqual(a: WorkspaceFingerprint, b: WorkspaceFingerprint): boolean {
  if (a.digest !== b.digest) return false;
  const aPaths = Object.keys(a.files);
  if (aPaths.length !== Object.keys(b.files).length) return false;
  return aPaths.every((path) => Object.hasOwn(b.files, path) && a.files[path] === b.files[path]);
}

/**
 * Compare `current` against `initial` path by path.
 */
export function diffFingerprints(
  initial: WorkspaceFingerprint,
  current: WorkspaceFingerprint,
): FingerprintDiff {
  const diff: FingerprintDiff = { created: [], modified: [], deleted: [], unchanged: [] };
  for (const [path, digest] of Object.entries(current.files)) {
    if (!Object.hasOwn(initial.files, path)) diff.created.push(path);
    else if (initial.files[path] !== digest) diff.modified.push(path);
    else diff.unchanged.push(path);
  }
  for (const path of Object.keys(initial.files)) {
    if (!Object.hasOwn(current.files, path)) diff.deleted.push(path);
  }
  return diff;
}
