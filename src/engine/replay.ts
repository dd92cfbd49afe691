/**
 * ABOUTME: Replay of a run from its audit trail.
 * Rebuilds the terminal run state from iterations.jsonl alone and compares it
 * with what the manifest and summary.json recorded.
 */

import { z } from 'zod';
import { ManifestError } from '../errors.js';
import { loadManifest, getManifestPath, type Manifest } from '../manifest/index.js';
import { loadIterationRecords, loadRunSummary } from '../logs/index.js';
import { deriveRunState } from './state-machine.js';
import type { IterationRecord, RunState, TransitionLimits } from './types.js';

const LimitsSchema = z.object({
  maxIterations: z.number().int().positive(),
  totalTimeoutMs: z.number().positive(),
  stagnationLimit: z.number().int().positive(),
  maxConsecutiveErrors: z.number().int().positive(),
  verificationConfigured: z.boolean(),
});

export interface ReplayResult {
  manifest: Manifest;
  records: IterationRecord[];
  limits: TransitionLimits;
  /** State rebuilt from the records */
  state: RunState;
  /** Rebuilt state agrees with the manifest (and summary.json, when present) */
  matches: boolean;
  /** One line per disagreement */
  differences: string[];
}

/**
 * Limits the run was started with, as stored in the manifest's run metadata.
 */
export function readTransitionLimits(manifest: Manifest): TransitionLimits {
  const parsed = LimitsSchema.safeParse(manifest.run.metadata ?? {});
  if (!parsed.success) {
    throw new ManifestError(`Manifest of run ${manifest.run.id} does not record its limits`);
  }
  return parsed.data;
}

function compare(differences: string[], label: string, recorded: unknown, rebuilt: unknown): void {
  if (recorded !== rebuilt) {
    differences.push(`${label}: recorded ${String(recorded)}, replayed ${String(rebuilt)}`);
  }
}

/**
 * Recompute a workspace's run state from its iteration records.
 * @throws ManifestError when the workspace has no manifest
 */
export async function replayRun(workspace: string): Promise<ReplayResult> {
  const manifest = await loadManifest(workspace);
  if (!manifest) {
    throw new ManifestError('No manifest found', getManifestPath(workspace));
  }

  const limits = readTransitionLimits(manifest);
  const records = await loadIterationRecords(workspace);
  const state = deriveRunState(records, limits);

  const differences: string[] = [];
  compare(differences, 'status', manifest.run.status, state.status);
  compare(differences, 'started_at', manifest.run.startedAt ?? null, state.startedAt);
  compare(differences, 'completed_at', manifest.run.completedAt ?? null, state.completedAt);

  const summary = await loadRunSummary(workspace);
  if (summary) {
    compare(differences, 'summary iterations', summary.iterations, state.iteration);
    compare(differences, 'summary status', summary.status, state.status);
  }

  return { manifest, records, limits, state, matches: differences.length === 0, differences };
}
