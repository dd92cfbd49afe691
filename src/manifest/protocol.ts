/**
 * ABOUTME: Audit protocol: version, commit actions and the commit-message convention.
 * Every iteration leaves one record of the form
 *   [loopbench] <action>: <description>
 *
 *   Harness: <id>
 *   Iteration: <n>
 *   ---            (optional)
 *   <body>
 */

import type { IterationRecord, RunStatus } from '../engine/types.js';

export const PROTOCOL_VERSION = '1.0.0';

export const COMMIT_PREFIX = '[loopbench]';

export const COMMIT_ACTIONS = ['start', 'edit', 'fix', 'test', 'complete', 'fail', 'timeout'] as const;

export type CommitAction = (typeof COMMIT_ACTIONS)[number];

/**
 * Well-known harness ids and their vendors.
 */
export const KNOWN_HARNESSES: Readonly<Record<string, { vendor: string; description: string }>> = {
  'claude-code': { vendor: 'anthropic', description: 'Claude Code CLI' },
  codex: { vendor: 'openai', description: 'OpenAI Codex CLI' },
  aider: { vendor: 'aider', description: 'Aider chat' },
  cursor: { vendor: 'cursor', description: 'Cursor agent' },
};

export interface ParsedVersion {
  major: number;
  minor: number;
  patch: number;
}

export function parseProtocolVersion(version: string): ParsedVersion | null {
  const match = /^(\d+)\.(\d+)\.(\d+)$/.exec(version.trim());
  if (!match) return null;
  return { major: Number(match[1]), minor: Number(match[2]), patch: Number(match[3]) };
}

/**
 * Versions are compatible when their major versions match.
 */
export function isProtocolCompatible(version: string, current: string = PROTOCOL_VERSION): boolean {
  const a = parseProtocolVersion(version);
  const b = parseProtocolVersion(current);
  return a !== null && b !== null && a.major === b.major;
}

export interface CommitMessage {
  action: CommitAction;
  description: string;
  harness: string;
  iteration: number;
  body?: string;
}

export function isCommitAction(value: string): value is CommitAction {
  return COMMIT_ACTIONS.some((action) => action === value);
}

export function formatCommitMessage(message: CommitMessage): string {
  const lines = [
    `${COMMIT_PREFIX} ${message.action}: ${message.description.replace(/\s*\n\s*/g, ' ').trim()}`,
    '',
    `Harness: ${message.harness}`,
    `Iteration: ${message.iteration}`,
  ];
  if (message.body) {
    lines.push('---', message.body);
  }
  return lines.join('\n');
}

/**
 * Parse a protocol commit message. Returns null for anything else.
 */
export function parseCommitMessage(text: string): CommitMessage | null {
  const lines = text.trim().split('\n');
  const first = lines[0] ?? '';
  if (!first.startsWith(COMMIT_PREFIX)) return null;

  const rest = first.slice(COMMIT_PREFIX.length).trim();
  const colon = rest.indexOf(':');
  if (colon === -1) return null;
  const action = rest.slice(0, colon).trim();
  if (!isCommitAction(action)) return null;
  const description = rest.slice(colon + 1).trim();

  let harness: string | undefined;
  let iteration: number | undefined;
  let body: string | undefined;
  for (let i = 1; i < lines.length; i++) {
    const line = (lines[i] ?? '').trim();
    if (line === '---') {
      body = lines.slice(i + 1).join('\n');
      break;
    }
    if (line.startsWith('Harness:')) {
      harness = line.slice('Harness:'.length).trim();
    } else if (line.startsWith('Iteration:')) {
      const parsed = Number.parseInt(line.slice('Iteration:'.length).trim(), 10);
      if (Number.isFinite(parsed)) iteration = parsed;
    }
  }

  if (harness === undefined || iteration === undefined) return null;
  return body !== undefined
    ? { action, description, harness, iteration, body }
    : { action, description, harness, iteration };
}

/**
 * Action recorded for an iteration. Terminal statuses name themselves; otherwise
 * an iteration after a failed verification is a fix, one that ran verification a
 * test, and anything else an edit.
 */
export function selectCommitAction(
  record: IterationRecord,
  previous: IterationRecord | undefined,
  status: RunStatus,
): CommitAction {
  if (status === 'completed') return 'complete';
  if (status === 'failed') return 'fail';
  if (status === 'timeout') return 'timeout';
  if (previous?.verification && !previous.verification.success) return 'fix';
  if (record.verification) return 'test';
  return 'edit';
}
