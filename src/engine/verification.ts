/**
 * ABOUTME: Verification runner for post-iteration checks.
 * Runs the task's verification command against the workspace and turns its
 * outcome into a VerificationResult: a structured JSON payload on stdout wins,
 * the exit code is the fallback. Never throws.
 */

import { z } from 'zod';
import { platform } from 'node:os';
import { runProcess, DEFAULT_GRACE_MS } from '../utils/process.js';
import { lastLine, truncate, truncateTail } from '../utils/logger.js';

/**
 * Verification settings after defaults are applied.
 */
export interface ResolvedVerificationConfig {
  /** Shell command run in the workspace */
  command: string;
  timeoutMs: number;
  /** Directory holding private evaluation assets, exposed through `evalDirEnv` */
  evalDir?: string;
  /** Name of the variable carrying `evalDir` (default EVAL_DIR) */
  evalDirEnv: string;
}

export interface VerificationCheckpoint {
  name: string;
  passed: boolean;
  message?: string;
  details?: unknown;
}

export type VerificationSource = 'payload' | 'exit-code' | 'timeout' | 'error';

export interface VerificationResult {
  success: boolean;
  /** Clamped to [0, 1] */
  score: number;
  message: string;
  checkpoints: VerificationCheckpoint[];
  source: VerificationSource;
  exitCode: number | null;
  durationMs: number;
  stdout: string;
  stderr: string;
}

export interface RunVerificationOptions {
  /** Overrides config.timeoutMs */
  timeoutMs?: number;
  graceMs?: number;
  signal?: AbortSignal;
}

export const DEFAULT_EVAL_DIR_ENV = 'EVAL_DIR';

const CheckpointSchema = z
  .object({
    name: z.string(),
    passed: z.boolean(),
    message: z.string().optional(),
    details: z.unknown().optional(),
  })
  .passthrough();

const VerificationPayloadSchema = z
  .object({
    success: z.boolean(),
    score: z.number().finite().optional(),
    message: z.string().optional(),
    checkpoints: z.array(CheckpointSchema).optional(),
    details: z
      .object({ checkpoints: z.array(CheckpointSchema).optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type VerificationPayload = z.infer<typeof VerificationPayloadSchema>;

function tryParse(candidate: string): VerificationPayload | null {
  const text = candidate.trim();
  if (!text.startsWith('{')) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = VerificationPayloadSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Find the structured result a verification script printed.
 * Tries the whole of stdout, then its last non-empty line, then the block
 * starting at the last line that opens with '{'.
 */
export function extractVerificationPayload(stdout: string): VerificationPayload | null {
  const whole = tryParse(stdout);
  if (whole) return whole;

  const lines = stdout.split(/\r?\n/);
  const nonEmpty = lines.filter((line) => line.trim().length > 0);
  const last = nonEmpty[nonEmpty.length - 1];
  if (last !== undefined) {
    const fromLast = tryParse(last);
    if (fromLast) return fromLast;
  }

  for (let i = lines.length - 1; i >= 0; i--) {
    if ((lines[i] ?? '').trimStart().startsWith('{')) {
      return tryParse(lines.slice(i).join('\n'));
    }
  }
  return null;
}

function clampScore(score: number): number {
  return Math.min(1, Math.max(0, score));
}

function fromPayload(payload: VerificationPayload): Pick<VerificationResult, 'success' | 'score' | 'message' | 'checkpoints'> {
  const checkpoints = payload.checkpoints ?? payload.details?.checkpoints ?? [];
  return {
    success: payload.success,
    score: clampScore(payload.score ?? (payload.success ? 1 : 0)),
    message: payload.message ?? (payload.success ? 'Verification passed' : 'Verification failed'),
    checkpoints: checkpoints.map((checkpoint) => ({
      name: checkpoint.name,
      passed: checkpoint.passed,
      ...(checkpoint.message !== undefined ? { message: checkpoint.message } : {}),
      ...(checkpoint.details !== undefined ? { details: checkpoint.details } : {}),
    })),
  };
}

function shellInvocation(command: string): { command: string; args: string[] } {
  if (platform() === 'win32') {
    return { command: 'cmd', args: ['/d', '/s', '/c', command] };
  }
  return { command: 'sh', args: ['-c', command] };
}

/**
 * Run the verification command in `workspace`.
 */
export async function runVerification(
  workspace: string,
  config: ResolvedVerificationConfig,
  options: RunVerificationOptions = {},
): Promise<VerificationResult> {
  const timeoutMs = options.timeoutMs ?? config.timeoutMs;
  const env: NodeJS.ProcessEnv = { LOOPBENCH_WORKSPACE: workspace };
  if (config.evalDir) {
    env[config.evalDirEnv] = config.evalDir;
  }

  const shell = shellInvocation(config.command);
  const result = await runProcess(shell.command, shell.args, {
    cwd: workspace,
    env,
    timeout: timeoutMs,
    graceMs: options.graceMs ?? DEFAULT_GRACE_MS,
    signal: options.signal,
  });

  const base = {
    exitCode: result.exitCode,
    durationMs: result.durationMs,
    stdout: result.stdout,
    stderr: result.stderr,
  };

  if (result.classification === 'timeout') {
    return {
      ...base,
      success: false,
      score: 0,
      message: `Verification timed out after ${Math.round(timeoutMs / 1000)}s`,
      checkpoints: [],
      source: 'timeout',
    };
  }

  if (result.classification !== 'completed' && result.classification !== 'nonzero_exit') {
    return {
      ...base,
      success: false,
      score: 0,
      message: `Verification could not run: ${result.classification}${result.stderr ? ` (${lastLine(result.stderr)})` : ''}`,
      checkpoints: [],
      source: 'error',
    };
  }

  const payload = extractVerificationPayload(result.stdout);
  if (payload) {
    return { ...base, ...fromPayload(payload), source: 'payload' };
  }

  const success = result.classification === 'completed';
  const summaryLine = lastLine(result.stdout) || lastLine(result.stderr);
  return {
    ...base,
    success,
    score: success ? 1 : 0,
    message: summaryLine || `Verification command exited with code ${result.exitCode ?? 'unknown'}`,
    checkpoints: [],
    source: 'exit-code',
  };
}

const MAX_DETAIL_CHARS = 1500;
const MAX_OUTPUT_CHARS = 2048;

function checkpointDetail(checkpoint: VerificationCheckpoint): string {
  const { details } = checkpoint;
  if (typeof details === 'string') return details;
  if (typeof details === 'object' && details !== null) {
    for (const key of ['stderr', 'error', 'output'] as const) {
      if (key in details) {
        const value: unknown = Reflect.get(details, key);
        if (typeof value === 'string' && value.trim()) return value;
      }
    }
    return checkpoint.message ?? JSON.stringify(details);
  }
  return checkpoint.message ?? '';
}

/**
 * Format a failed verification into text suitable for injection into the
 * agent's next instruction. Empty for a passing result.
 */
export function formatVerificationFeedback(result: VerificationResult): string {
  if (result.success) return '';

  const lines = [`Verification failed (score ${result.score.toFixed(2)}): ${result.message}`];
  const failing = result.checkpoints.filter((checkpoint) => !checkpoint.passed);
  const passing = result.checkpoints.filter((checkpoint) => checkpoint.passed);

  for (const checkpoint of failing) {
    const detail = checkpointDetail(checkpoint).trim();
    lines.push(`- FAIL ${checkpoint.name}${detail ? `: ${truncate(detail, MAX_DETAIL_CHARS)}` : ''}`);
  }
  for (const checkpoint of passing) {
    lines.push(`- PASS ${checkpoint.name}`);
  }

  if (result.checkpoints.length === 0 && result.source === 'exit-code') {
    const output = [result.stdout.trim(), result.stderr.trim()].filter(Boolean).join('\n');
    if (output) {
      lines.push('', 'Verification output:', truncateTail(output, MAX_OUTPUT_CHARS));
    }
  }

  return lines.join('\n');
}
