/**
 * ABOUTME: Types for the run pool.
 */

import type { RunStatus, RunSummary } from '../engine/types.js';

/**
 * Outcome of one run in a pool.
 */
export interface PoolRunResult {
  taskId: string;
  runId: string;
  workspace: string;
  /** Terminal record, null when the run could not start */
  summary: RunSummary | null;
  /** Why the run could not start or was rejected */
  error?: string;
}

export type PoolEvent =
  | { type: 'run:queued'; runId: string; taskId: string }
  | { type: 'run:rejected'; runId: string; taskId: string; error: string }
  | { type: 'run:started'; runId: string; taskId: string }
  | { type: 'run:finished'; runId: string; taskId: string; status: RunStatus | null; error?: string };
