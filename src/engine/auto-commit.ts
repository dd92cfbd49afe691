/**
 * ABOUTME: Git commits for the audit trail.
 * When audit.gitCommits is on, every commit record is also committed to the
 * workspace repository, with the control directory left out of the commit.
 */

import { runProcess } from '../utils/process.js';
import { CONTROL_DIR } from '../workspace/paths.js';

/**
 * Result of an auto-commit operation
 */
export interface AutoCommitResult {
  /** Whether a commit was actually created */
  committed: boolean;
  /** The short SHA of the created commit (if committed) */
  commitSha?: string;
  /** Error message if the commit failed */
  error?: string;
}

const GIT_IDENTITY_FALLBACK = {
  GIT_AUTHOR_NAME: 'loopbench',
  GIT_AUTHOR_EMAIL: 'loopbench@localhost',
  GIT_COMMITTER_NAME: 'loopbench',
  GIT_COMMITTER_EMAIL: 'loopbench@localhost',
} as const;

function gitEnv(): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(GIT_IDENTITY_FALLBACK)) {
    env[key] = process.env[key] ?? value;
  }
  return env;
}

function failure(step: string, stderr: string, exitCode: number | null): string {
  return `${step} failed: ${stderr.trim() || `unknown error (exit code ${exitCode ?? 'none'})`}`;
}

/**
 * Whether `cwd` lies inside a git work tree.
 */
export async function isGitRepository(cwd: string): Promise<boolean> {
  const result = await runProcess('git', ['rev-parse', '--is-inside-work-tree'], { cwd });
  return result.success && result.stdout.trim() === 'true';
}

/**
 * Stage every workspace change except the control directory and commit it
 * with `message`. Empty commits are allowed so each record has one.
 */
export async function commitRecord(cwd: string, message: string): Promise<AutoCommitResult> {
  const addResult = await runProcess('git', ['add', '-A', '--', '.', `:(exclude)${CONTROL_DIR}`], { cwd });
  if (!addResult.success) {
    return { committed: false, error: failure('git add', addResult.stderr, addResult.exitCode) };
  }

  const commitResult = await runProcess('git', ['commit', '--allow-empty', '--no-verify', '-F', '-'], {
    cwd,
    env: gitEnv(),
    input: message,
  });
  if (!commitResult.success) {
    return { committed: false, error: failure('git commit', commitResult.stderr, commitResult.exitCode) };
  }

  const shaResult = await runProcess('git', ['rev-parse', '--short', 'HEAD'], { cwd });
  return shaResult.success
    ? { committed: true, commitSha: shaResult.stdout.trim() }
    : { committed: true };
}
