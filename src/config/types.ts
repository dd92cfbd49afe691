/**
 * ABOUTME: Type definitions for loopbench configuration.
 * Defines the structure of configuration files, run overrides and defaults.
 */

import type { StoredConfigValidated } from './schema.js';
import type { CompletionStrategyName } from '../engine/completion-strategies.js';

/**
 * Configuration as stored in TOML files, after validation.
 */
export type StoredConfig = StoredConfigValidated;

/**
 * Per-run values from the command line or a batch plan entry.
 * These override the stored configuration.
 */
export interface RunOverrides {
  taskId: string;
  taskName?: string;
  taskDomain?: string;
  taskLevel?: number;

  /** Absolute or cwd-relative workspace path */
  workspace: string;

  /** Agent name (entry in `agents`) or built-in plugin id */
  agent?: string;

  /** Task prompt given to the agent */
  instructions?: string;

  runId?: string;
  model?: string;
  maxIterations?: number;
  totalTimeoutSeconds?: number;
  iterationTimeoutSeconds?: number;
  stagnationLimit?: number;
  verifyCommand?: string;
  verifyTimeoutSeconds?: number;
  evalDir?: string;
  promptTemplate?: string;
  gitCommits?: boolean;
}

/**
 * Result of validating a run configuration.
 */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Defaults applied when neither config files nor overrides set a value.
 */
export interface ConfigDefaults {
  maxIterations: number;
  totalTimeoutSeconds: number;
  iterationTimeoutSeconds: number;
  stagnationLimit: number;
  maxConsecutiveErrors: number;
  maxWorkers: number;
  graceSeconds: number;
  verificationTimeoutSeconds: number;
  completionStrategies: readonly CompletionStrategyName[];
  agent: string;
}

export const DEFAULT_CONFIG: Readonly<ConfigDefaults> = Object.freeze<ConfigDefaults>({
  maxIterations: 10,
  totalTimeoutSeconds: 300,
  iterationTimeoutSeconds: 300,
  stagnationLimit: 3,
  maxConsecutiveErrors: 3,
  maxWorkers: 1,
  graceSeconds: 2,
  verificationTimeoutSeconds: 120,
  completionStrategies: ['promise-tag', 'exit-code'],
  agent: 'command',
});
