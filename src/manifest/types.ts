/**
 * ABOUTME: Manifest types.
 * The manifest identifies the harness, the task and the run; it lives at
 * .loopbench/manifest.json and is serialized with snake_case keys.
 */

import type { RunStatus } from '../engine/types.js';

export interface HarnessInfo {
  /** Harness identifier, e.g. 'claude-code'; third parties use 'vendor/name' */
  id: string;
  version?: string;
  vendor?: string;
  model?: string;
  config?: Record<string, unknown>;
}

export interface TaskInfo {
  id: string;
  name?: string;
  domain?: string;
  /** Difficulty level, 1 (foundation) to 4 (expert) */
  level?: number;
}

export interface RunInfo {
  id: string;
  status: RunStatus;
  startedAt?: string;
  completedAt?: string;
  metadata?: Record<string, unknown>;
}

export interface EnvironmentInfo {
  os: string;
  arch: string;
  nodeVersion: string;
}

export interface Manifest {
  protocolVersion: string;
  harness: HarnessInfo;
  task: TaskInfo;
  run: RunInfo;
  environment?: EnvironmentInfo;
}
