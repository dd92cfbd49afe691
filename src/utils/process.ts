/**
 * ABOUTME: Process utility functions.
 * Runs one external command with a bounded lifetime: the child leads its own
 * process group so a timeout or cancellation kills every descendant, and the
 * outcome is classified instead of thrown.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { accessSync, existsSync, readFileSync } from 'node:fs';
import { isAbsolute } from 'node:path';
import { platform } from 'node:os';
import { errorCode, errorMessage } from '../errors.js';

/**
 * How a process run ended.
 * `error:<detail>` covers launch failures other than a missing executable,
 * and `error:interrupted` a run cancelled through its abort signal.
 */
export type ExitClassification =
  | 'completed'
  | 'timeout'
  | 'nonzero_exit'
  | 'not_found'
  | `error:${string}`;

/**
 * Classification given to runs cancelled through an AbortSignal.
 */
export const INTERRUPTED_CLASSIFICATION = 'error:interrupted' satisfies ExitClassification;

/**
 * Result of running a process
 */
export interface ProcessResult {
  /** How the run ended */
  classification: ExitClassification;
  /** Exit code (null if killed by signal or never started) */
  exitCode: number | null;
  /** Signal that killed the process (if any) */
  signal: string | null;
  /** Stdout output, captured in full */
  stdout: string;
  /** Stderr output, captured in full */
  stderr: string;
  /** Wall-clock time from spawn to settlement */
  durationMs: number;
  /** Whether the process completed successfully (exit code 0) */
  success: boolean;
  /** Whether the timeout fired */
  timedOut: boolean;
  /** Whether the abort signal fired */
  interrupted: boolean;
}

/**
 * Options for running a process
 */
export interface RunProcessOptions {
  /** Working directory */
  cwd?: string;
  /** Environment variables merged over (or replacing) process.env */
  env?: NodeJS.ProcessEnv;
  /** Use `env` as the whole environment instead of merging it */
  replaceEnv?: boolean;
  /** Timeout in milliseconds (0 = no timeout) */
  timeout?: number;
  /** Time between SIGTERM and SIGKILL when terminating (default: 2000) */
  graceMs?: number;
  /** Cancels the run through the same kill path as a timeout */
  signal?: AbortSignal;
  /** Text written to stdin before it is closed; stdin is closed immediately otherwise */
  input?: string;
  /** Streaming callbacks */
  onStdout?: (data: string) => void;
  onStderr?: (data: string) => void;
}

/** Default grace period between SIGTERM and SIGKILL. */
export const DEFAULT_GRACE_MS = 2000;

const isWindows = (): boolean => platform() === 'win32';

/**
 * Run a command and collect output.
 * Never rejects: launch failures, timeouts and cancellations are all
 * reported through `classification`.
 */
export async function runProcess(
  command: string,
  args: string[] = [],
  options: RunProcessOptions = {},
): Promise<ProcessResult> {
  const {
    cwd,
    env,
    replaceEnv = false,
    timeout = 0,
    graceMs = DEFAULT_GRACE_MS,
    signal,
    input,
    onStdout,
    onStderr,
  } = options;
  const startedAt = Date.now();

  const unstarted = (classification: ExitClassification, stderr: string, interrupted = false): ProcessResult => ({
    classification,
    exitCode: null,
    signal: null,
    stdout: '',
    stderr,
    durationMs: Date.now() - startedAt,
    success: false,
    timedOut: false,
    interrupted,
  });

  if (signal?.aborted) {
    return unstarted(INTERRUPTED_CLASSIFICATION, 'Run cancelled before the process started', true);
  }

  return new Promise((resolve) => {
    let child: ChildProcess;
    try {
      child = spawn(command, args, {
        cwd,
        env: env ? (replaceEnv ? env : { ...process.env, ...env }) : process.env,
        stdio: [input !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
        detached: !isWindows(),
        windowsHide: true,
      });
    } catch (error) {
      resolve(launchFailure(error, cwd, unstarted));
      return;
    }

    let stdout = '';
    let stderr = '';
    let settled = false;
    let timedOut = false;
    let interrupted = false;
    let terminating = false;
    let exitCode: number | null = null;
    let exitSignal: string | null = null;
    let timeoutHandle: NodeJS.Timeout | undefined;
    let killHandle: NodeJS.Timeout | undefined;
    let abandonHandle: NodeJS.Timeout | undefined;

    const finish = (result: ProcessResult): void => {
      if (settled) return;
      settled = true;
      if (timeoutHandle) clearTimeout(timeoutHandle);
      if (killHandle) clearTimeout(killHandle);
      if (abandonHandle) clearTimeout(abandonHandle);
      signal?.removeEventListener('abort', onAbort);
      resolve(result);
    };

    const settle = (): void => {
      let classification: ExitClassification;
      if (timedOut) classification = 'timeout';
      else if (interrupted) classification = INTERRUPTED_CLASSIFICATION;
      else if (exitCode === 0) classification = 'completed';
      else classification = 'nonzero_exit';

      finish({
        classification,
        exitCode,
        signal: exitSignal,
        stdout,
        stderr,
        durationMs: Date.now() - startedAt,
        success: classification === 'completed',
        timedOut,
        interrupted,
      });
    };

    // SIGTERM the group, then SIGKILL it once the grace period lapses.
    const terminate = (): void => {
      if (terminating || child.pid === undefined) return;
      terminating = true;
      const pid = child.pid;
      killProcessTree(pid, 'SIGTERM');
      killHandle = setTimeout(() => {
        killProcessTree(pid, 'SIGKILL');
        // A descendant that escaped the group may still hold the pipes open.
        abandonHandle = setTimeout(() => {
          child.stdout?.destroy();
          child.stderr?.destroy();
          settle();
        }, graceMs);
      }, graceMs);
    };

    function onAbort(): void {
      if (settled) return;
      interrupted = true;
      terminate();
    }

    if (timeout > 0) {
      timeoutHandle = setTimeout(() => {
        timedOut = true;
        terminate();
      }, timeout);
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout?.on('data', (data: Buffer) => {
      const text = data.toString();
      stdout += text;
      onStdout?.(text);
    });

    child.stderr?.on('data', (data: Buffer) => {
      const text = data.toString();
      stderr += text;
      onStderr?.(text);
    });

    if (child.stdin) {
      child.stdin.on('error', (error) => {
        // EPIPE when the child exits without reading its input
        if (errorCode(error) !== 'EPIPE') {
          stderr += `\n[stdin] ${error.message}`;
        }
      });
      child.stdin.end(input);
    }

    child.on('error', (error) => {
      if (child.pid === undefined) {
        finish(launchFailure(error, cwd, unstarted));
        return;
      }
      stderr += `\n${error.message}`;
    });

    child.on('exit', (code, sig) => {
      exitCode = code;
      exitSignal = sig;
      // Reap anything the leader left behind so the pipes close with it.
      if (child.pid !== undefined && !isWindows()) {
        killProcessTree(child.pid, 'SIGKILL');
      }
    });

    child.on('close', () => {
      settle();
    });
  });
}

function launchFailure(
  error: unknown,
  cwd: string | undefined,
  unstarted: (classification: ExitClassification, stderr: string) => ProcessResult,
): ProcessResult {
  const message = errorMessage(error);
  if (errorCode(error) === 'ENOENT') {
    if (cwd !== undefined && !existsSync(cwd)) {
      return unstarted(`error:working directory not found: ${cwd}`, message);
    }
    return unstarted('not_found', message);
  }
  return unstarted(`error:${message}`, message);
}

/**
 * Signal a process and all of its descendants.
 * On POSIX the process must lead its own group (spawned `detached`).
 * Returns false when nothing was left to signal.
 */
export function killProcessTree(
  pid: number,
  signal: NodeJS.Signals = 'SIGTERM',
): boolean {
  if (isWindows()) {
    const args = ['/pid', String(pid), '/T'];
    if (signal === 'SIGKILL') args.push('/F');
    const killer = spawn('taskkill', args, { stdio: 'ignore', windowsHide: true });
    killer.on('error', () => {
      // taskkill unavailable; the caller's grace timer still settles the run
      killer.removeAllListeners('error');
    });
    return true;
  }

  try {
    process.kill(-pid, signal);
    return true;
  } catch (groupError) {
    if (errorCode(groupError) === 'ESRCH') return false;
    // Not a group leader: fall back to the single process
    try {
      process.kill(pid, signal);
      return true;
    } catch {
      return false;
    }
  }
}

/**
 * Check if a process is running.
 * Zombies (exited, not yet reaped) count as not running.
 */
export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
  } catch (error) {
    return errorCode(error) === 'EPERM';
  }

  const statPath = `/proc/${pid}/stat`;
  if (existsSync(statPath)) {
    const stat = readFileSync(statPath, 'utf-8');
    // Format: pid (comm) state ...; comm may contain spaces and parens
    const state = stat.slice(stat.lastIndexOf(')') + 2, stat.lastIndexOf(')') + 3);
    return state !== 'Z' && state !== 'X';
  }
  return true;
}

/**
 * Parse a command string into command and arguments
 */
export function parseCommand(commandStr: string): {
  command: string;
  args: string[];
} {
  const parts = commandStr.match(/(?:[^\s"']+|"[^"]*"|'[^']*')+/g) || [];

  // Remove quotes from parts
  const cleanParts = parts.map((part) => {
    if (
      (part.startsWith('"') && part.endsWith('"')) ||
      (part.startsWith("'") && part.endsWith("'"))
    ) {
      return part.slice(1, -1);
    }
    return part;
  });

  const [command, ...args] = cleanParts;
  return { command: command || '', args };
}

/**
 * Find a command's path using the platform-appropriate utility.
 * Uses `where` on Windows and `which` on Unix-like systems.
 * @param command The command name to find
 * @returns Promise with found status and path
 */
export async function findCommandPath(
  command: string,
): Promise<{ found: boolean; path: string }> {
  const trimmed = command.trim();
  const normalized =
    trimmed.startsWith('"') && trimmed.endsWith('"') ? trimmed.slice(1, -1) : trimmed;
  if (!normalized) return { found: false, path: '' };

  const isPathLike =
    isAbsolute(normalized) || normalized.includes('/') || normalized.includes('\\');

  if (isPathLike) {
    try {
      accessSync(normalized);
      return { found: true, path: normalized };
    } catch {
      return { found: false, path: '' };
    }
  }

  const result = await runProcess(isWindows() ? 'where' : 'which', [normalized], {
    timeout: 15_000,
  });
  if (result.classification !== 'completed' || !result.stdout.trim()) {
    return { found: false, path: '' };
  }
  // 'where' may return multiple paths (one per line)
  const firstPath = result.stdout.trim().split(/\r?\n/)[0] ?? '';
  return { found: true, path: firstPath.trim() };
}
