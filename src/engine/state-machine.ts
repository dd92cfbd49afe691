/**
 * ABOUTME: Task lifecycle state machine.
 * pending -> in_progress -> completed | failed | timeout, with the transition
 * rules that turn one iteration record into the next run state. Everything here
 * is pure, so a run's terminal state can be rebuilt from its records alone.
 */

import { IllegalTransitionError } from '../errors.js';
import { INTERRUPTED_CLASSIFICATION } from '../utils/process.js';
import type {
  IterationRecord,
  RunState,
  RunStatus,
  TerminalStatus,
  TransitionLimits,
} from './types.js';

/**
 * Allowed targets per status. Terminal statuses have none.
 */
export const LEGAL_TRANSITIONS: Readonly<Record<RunStatus, readonly RunStatus[]>> = {
  pending: ['in_progress'],
  in_progress: ['completed', 'failed', 'timeout'],
  completed: [],
  failed: [],
  timeout: [],
};

export function isTerminal(status: RunStatus): status is TerminalStatus {
  return status === 'completed' || status === 'failed' || status === 'timeout';
}

export function createRunState(): RunState {
  return Object.freeze({
    status: 'pending',
    startedAt: null,
    completedAt: null,
    iteration: 0,
    usage: 0,
    reason: null,
    consecutiveErrors: 0,
  });
}

function assertTransition(from: RunStatus, to: RunStatus): void {
  if (!LEGAL_TRANSITIONS[from].includes(to)) {
    throw new IllegalTransitionError(from, to);
  }
}

/**
 * pending -> in_progress
 */
export function start(state: RunState, at: Date): RunState {
  assertTransition(state.status, 'in_progress');
  return Object.freeze({ ...state, status: 'in_progress', startedAt: at.toISOString() });
}

function terminate(state: RunState, to: TerminalStatus, reason: string, at: Date): RunState {
  assertTransition(state.status, to);
  return Object.freeze({ ...state, status: to, reason, completedAt: at.toISOString() });
}

export function complete(state: RunState, reason: string, at: Date): RunState {
  return terminate(state, 'completed', reason, at);
}

export function fail(state: RunState, reason: string, at: Date): RunState {
  return terminate(state, 'failed', reason, at);
}

export function timeOut(state: RunState, reason: string, at: Date): RunState {
  return terminate(state, 'timeout', reason, at);
}

/**
 * Force a terminal status on a run that left its loop while still in progress.
 * Terminal states pass through unchanged.
 */
export function finalize(state: RunState, at: Date, reason = 'Run ended without reaching a verdict'): RunState {
  if (state.status === 'in_progress') {
    return timeOut(state, reason, at);
  }
  return state;
}

function isLaunchError(classification: IterationRecord['classification']): boolean {
  return classification.startsWith('error:') && classification !== INTERRUPTED_CLASSIFICATION;
}

/**
 * Apply one iteration record to an in-progress run. Rules, first match wins:
 * verification success, launch failure, stagnation, agent completion without
 * verification, time budget, iteration limit.
 */
export function applyIteration(
  state: RunState,
  record: IterationRecord,
  limits: TransitionLimits,
): RunState {
  if (state.status !== 'in_progress') {
    throw new IllegalTransitionError(state.status, state.status, `cannot apply iteration ${record.iteration}`);
  }
  if (record.iteration !== state.iteration + 1) {
    throw new IllegalTransitionError(
      state.status,
      state.status,
      `iteration ${record.iteration} does not follow ${state.iteration}`,
    );
  }

  const at = new Date(record.endedAt);
  const consecutiveErrors = isLaunchError(record.classification) ? state.consecutiveErrors + 1 : 0;
  const next: RunState = {
    ...state,
    iteration: record.iteration,
    usage: state.usage + (record.usage ?? 0),
    consecutiveErrors,
  };
  const n = record.iteration;

  if (record.verification?.success) {
    return complete(
      next,
      `Verification passed on iteration ${n} (score ${record.verification.score.toFixed(2)})`,
      at,
    );
  }

  if (record.classification === 'not_found') {
    return fail(next, `Agent executable not found on iteration ${n}`, at);
  }

  if (consecutiveErrors >= limits.maxConsecutiveErrors) {
    return fail(
      next,
      `Agent failed to launch ${consecutiveErrors} times in a row (${record.classification})`,
      at,
    );
  }

  if (record.progress === 'stagnant') {
    return fail(
      next,
      `No workspace changes across ${limits.stagnationLimit} consecutive observations`,
      at,
    );
  }

  if (record.agentSignaledCompletion && !limits.verificationConfigured) {
    return complete(next, `Agent signaled completion on iteration ${n}`, at);
  }

  if (state.startedAt !== null && at.getTime() - Date.parse(state.startedAt) >= limits.totalTimeoutMs) {
    return timeOut(next, `Time budget of ${limits.totalTimeoutMs / 1000}s exhausted after iteration ${n}`, at);
  }

  if (n >= limits.maxIterations) {
    return timeOut(next, `Iteration limit of ${limits.maxIterations} reached without success`, at);
  }

  return Object.freeze(next);
}

/**
 * Rebuild a run state from its iteration records.
 * A run whose records stop short of a verdict is finalized at the last record's end.
 */
export function deriveRunState(
  records: readonly IterationRecord[],
  limits: TransitionLimits,
): RunState {
  const first = records[0];
  if (!first) {
    return createRunState();
  }

  let state = start(createRunState(), new Date(first.startedAt));
  for (const record of records) {
    if (isTerminal(state.status)) {
      throw new IllegalTransitionError(state.status, state.status, `record ${record.iteration} follows a terminal state`);
    }
    state = applyIteration(state, record, limits);
  }

  const last = records[records.length - 1] ?? first;
  return finalize(state, new Date(last.endedAt));
}
