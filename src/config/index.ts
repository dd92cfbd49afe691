/**
 * ABOUTME: Configuration loading and validation for loopbench.
 * Handles loading global and project configs, merging them with per-run
 * overrides, validating the result and freezing it into a TaskRun.
 * Supports: ~/.config/loopbench/config.toml (global) and .loopbench/config.toml (project).
 */

import { homedir } from 'node:os';
import { join, dirname, resolve } from 'node:path';
import { readFile } from 'node:fs/promises';
import { parse as parseToml, stringify as stringifyToml } from 'smol-toml';
import { ConfigurationError, errorCode, errorMessage } from '../errors.js';
import { generateRunId } from '../manifest/index.js';
import { DEFAULT_EVAL_DIR_ENV } from '../engine/verification.js';
import { CONFIG_FILE, CONTROL_DIR } from '../workspace/paths.js';
import type { AgentRegistry } from '../plugins/agents/registry.js';
import type { AgentAdapterConfig } from '../plugins/agents/types.js';
import type { TaskRun } from '../engine/types.js';
import type { StoredConfig, RunOverrides, ConfigValidationResult } from './types.js';
import { DEFAULT_CONFIG } from './types.js';
import {
  validateStoredConfig,
  validateBatchPlan,
  formatConfigErrors,
  type BatchPlanValidated,
} from './schema.js';

/**
 * Global config file path (~/.config/loopbench/config.toml)
 */
export const GLOBAL_CONFIG_PATH = join(homedir(), '.config', 'loopbench', CONFIG_FILE);

const ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Config source information for debugging
 */
export interface ConfigSource {
  /** Path to the global config (if it exists) */
  globalPath: string | null;
  /** Path to the project config (if it exists) */
  projectPath: string | null;
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return null;
    throw new ConfigurationError(`Cannot read ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

function parseTomlFile(content: string, configPath: string): unknown {
  try {
    return parseToml(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid TOML in ${configPath}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Load and validate a single TOML config file.
 * @returns Parsed config, or null if the file doesn't exist
 * @throws ConfigurationError when the file is unparseable or invalid
 */
export async function loadConfigFile(configPath: string): Promise<StoredConfig | null> {
  const content = await readOptional(configPath);
  if (content === null) return null;
  if (!content.trim()) return {};

  const result = validateStoredConfig(parseTomlFile(content, configPath));
  if (!result.success || !result.data) {
    throw new ConfigurationError(formatConfigErrors(result.errors ?? [], configPath));
  }
  return result.data;
}

/**
 * Find the project config file by searching up from cwd.
 * Looks for .loopbench/config.toml in each directory up to root.
 */
export async function findProjectConfigPath(startDir: string): Promise<string | null> {
  let dir = resolve(startDir);

  for (;;) {
    const configPath = join(dir, CONTROL_DIR, CONFIG_FILE);
    if ((await readOptional(configPath)) !== null) {
      return configPath;
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Merge two config objects; `override` wins.
 * Arrays are replaced (not merged), nested tables are merged key by key.
 */
export function mergeConfigs(base: StoredConfig, override: StoredConfig): StoredConfig {
  const merged: StoredConfig = { ...base };

  if (override.maxIterations !== undefined) merged.maxIterations = override.maxIterations;
  if (override.totalTimeoutSeconds !== undefined) merged.totalTimeoutSeconds = override.totalTimeoutSeconds;
  if (override.iterationTimeoutSeconds !== undefined) {
    merged.iterationTimeoutSeconds = override.iterationTimeoutSeconds;
  }
  if (override.stagnationLimit !== undefined) merged.stagnationLimit = override.stagnationLimit;
  if (override.maxConsecutiveErrors !== undefined) merged.maxConsecutiveErrors = override.maxConsecutiveErrors;
  if (override.maxWorkers !== undefined) merged.maxWorkers = override.maxWorkers;
  if (override.graceSeconds !== undefined) merged.graceSeconds = override.graceSeconds;
  if (override.agent !== undefined) merged.agent = override.agent;
  if (override.promptTemplate !== undefined) merged.promptTemplate = override.promptTemplate;
  if (override.logLevel !== undefined) merged.logLevel = override.logLevel;

  // Replace arrays entirely
  if (override.completionStrategies !== undefined) merged.completionStrategies = override.completionStrategies;
  if (override.agents !== undefined) merged.agents = override.agents;

  // Merge nested tables
  if (override.verification !== undefined) {
    merged.verification = { ...merged.verification, ...override.verification };
  }
  if (override.fingerprint !== undefined) {
    merged.fingerprint = { ...merged.fingerprint, ...override.fingerprint };
  }
  if (override.audit !== undefined) {
    merged.audit = { ...merged.audit, ...override.audit };
  }

  return merged;
}

/**
 * Load stored configuration with source information.
 * Project config overrides global config.
 * @param globalConfigPath Override global config path (for testing)
 */
export async function loadStoredConfigWithSource(
  cwd: string = process.cwd(),
  globalConfigPath: string = GLOBAL_CONFIG_PATH,
): Promise<{ config: StoredConfig; source: ConfigSource }> {
  const globalConfig = await loadConfigFile(globalConfigPath);
  const projectPath = await findProjectConfigPath(cwd);
  const projectConfig = projectPath ? await loadConfigFile(projectPath) : null;

  return {
    config: mergeConfigs(globalConfig ?? {}, projectConfig ?? {}),
    source: {
      globalPath: globalConfig ? globalConfigPath : null,
      projectPath: projectConfig && projectPath ? projectPath : null,
    },
  };
}

export async function loadStoredConfig(
  cwd: string = process.cwd(),
  globalConfigPath: string = GLOBAL_CONFIG_PATH,
): Promise<StoredConfig> {
  const { config } = await loadStoredConfigWithSource(cwd, globalConfigPath);
  return config;
}

/**
 * Load and validate a batch plan file.
 */
export async function loadBatchPlan(planPath: string): Promise<BatchPlanValidated> {
  const content = await readOptional(planPath);
  if (content === null) {
    throw new ConfigurationError(`Batch plan not found: ${planPath}`);
  }
  const result = validateBatchPlan(parseTomlFile(content, planPath));
  if (!result.success || !result.data) {
    throw new ConfigurationError(formatConfigErrors(result.errors ?? [], planPath));
  }
  return result.data;
}

/**
 * Serialize configuration to TOML string.
 */
export function serializeConfig(config: StoredConfig): string {
  return stringifyToml(config);
}

/**
 * Resolve the agent a run uses.
 * A name matching an `agents` entry selects it; otherwise a registered plugin
 * id is used with its defaults.
 */
export function resolveAgentConfig(
  config: StoredConfig,
  registry: AgentRegistry,
  requested?: string,
): AgentAdapterConfig | string {
  const name = requested ?? config.agent ?? config.agents?.[0]?.name ?? DEFAULT_CONFIG.agent;

  const configured = config.agents?.find((agent) => agent.name === name);
  if (configured) {
    if (!registry.hasAdapter(configured.plugin)) {
      return `Agent '${name}' uses unknown plugin '${configured.plugin}'`;
    }
    return { ...configured };
  }

  if (registry.hasAdapter(name)) {
    return { name, plugin: name };
  }

  const known = [
    ...(config.agents ?? []).map((agent) => agent.name),
    ...registry.getRegisteredAdapters().map((meta) => meta.id),
  ];
  return `Unknown agent '${name}' (available: ${known.join(', ')})`;
}

function checkNumber(
  errors: string[],
  label: string,
  value: number | undefined,
  { min, max, integer }: { min: number; max: number; integer: boolean },
): void {
  if (value === undefined) return;
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    errors.push(`${label} must be ${integer ? 'an integer' : 'a number'} (got ${value})`);
  } else if (value < min || value > max) {
    errors.push(`${label} must be between ${min} and ${max} (got ${value})`);
  }
}

/**
 * Validate merged configuration and per-run overrides before a run starts.
 * Collects every problem instead of stopping at the first.
 */
export function validateRunConfig(
  config: StoredConfig,
  overrides: RunOverrides,
  registry: AgentRegistry,
): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!overrides.taskId.trim()) {
    errors.push('Task id is required');
  } else if (!ID_PATTERN.test(overrides.taskId)) {
    errors.push(`Task id '${overrides.taskId}' may only contain letters, digits, '.', '_' and '-'`);
  }
  if (overrides.runId !== undefined && !ID_PATTERN.test(overrides.runId)) {
    errors.push(`Run id '${overrides.runId}' may only contain letters, digits, '.', '_' and '-'`);
  }
  if (!overrides.workspace.trim()) {
    errors.push('Workspace path is required');
  }
  if (overrides.instructions === undefined || !overrides.instructions.trim()) {
    errors.push('Task instructions are empty');
  }

  checkNumber(errors, 'Max iterations', overrides.maxIterations, { min: 1, max: 1000, integer: true });
  checkNumber(errors, 'Total timeout', overrides.totalTimeoutSeconds, { min: 0.001, max: 604_800, integer: false });
  checkNumber(errors, 'Iteration timeout', overrides.iterationTimeoutSeconds, {
    min: 0.001,
    max: 86_400,
    integer: false,
  });
  checkNumber(errors, 'Stagnation limit', overrides.stagnationLimit, { min: 1, max: 50, integer: true });
  checkNumber(errors, 'Verification timeout', overrides.verifyTimeoutSeconds, {
    min: 0.001,
    max: 86_400,
    integer: false,
  });
  if (overrides.taskLevel !== undefined && !Number.isInteger(overrides.taskLevel)) {
    errors.push(`Task level must be an integer (got ${overrides.taskLevel})`);
  }

  const agent = resolveAgentConfig(config, registry, overrides.agent);
  if (typeof agent === 'string') {
    errors.push(agent);
  } else if (agent.plugin === 'command' && !agent.command) {
    errors.push(`Agent '${agent.name}' uses the command plugin but sets no command`);
  }

  const verifyCommand = overrides.verifyCommand ?? config.verification?.command;
  if (verifyCommand !== undefined && !verifyCommand.trim()) {
    errors.push('Verification command cannot be empty');
  }
  if (overrides.evalDir !== undefined && !verifyCommand) {
    warnings.push('An eval directory is set but no verification command will use it');
  }

  const total = overrides.totalTimeoutSeconds ?? config.totalTimeoutSeconds ?? DEFAULT_CONFIG.totalTimeoutSeconds;
  const perIteration =
    overrides.iterationTimeoutSeconds ?? config.iterationTimeoutSeconds ?? DEFAULT_CONFIG.iterationTimeoutSeconds;
  if (perIteration > total) {
    warnings.push(
      `Iteration timeout (${perIteration}s) exceeds the total budget (${total}s); iterations are bounded by the remaining budget`,
    );
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Build the frozen TaskRun for one run.
 * @throws ConfigurationError listing every problem found
 */
export function createTaskRun(
  config: StoredConfig,
  overrides: RunOverrides,
  registry: AgentRegistry,
  cwd: string = process.cwd(),
): TaskRun {
  const validation = validateRunConfig(config, overrides, registry);
  const agent = resolveAgentConfig(config, registry, overrides.agent);
  if (!validation.valid || typeof agent === 'string' || overrides.instructions === undefined) {
    throw new ConfigurationError(validation.errors);
  }

  const workspace = resolve(cwd, overrides.workspace);
  const seconds = (value: number): number => Math.round(value * 1000);

  const verifyCommand = overrides.verifyCommand ?? config.verification?.command;
  const evalDir = overrides.evalDir ?? config.verification?.evalDir;
  const verification = verifyCommand
    ? Object.freeze({
        command: verifyCommand,
        timeoutMs: seconds(
          overrides.verifyTimeoutSeconds ??
            config.verification?.timeoutSeconds ??
            DEFAULT_CONFIG.verificationTimeoutSeconds,
        ),
        ...(evalDir ? { evalDir: resolve(cwd, evalDir) } : {}),
        evalDirEnv: config.verification?.evalDirEnv ?? DEFAULT_EVAL_DIR_ENV,
      })
    : null;

  const promptTemplate = overrides.promptTemplate ?? config.promptTemplate;
  const model = overrides.model ?? agent.model;

  return Object.freeze({
    taskId: overrides.taskId,
    ...(overrides.taskName !== undefined ? { taskName: overrides.taskName } : {}),
    ...(overrides.taskDomain !== undefined ? { taskDomain: overrides.taskDomain } : {}),
    ...(overrides.taskLevel !== undefined ? { taskLevel: overrides.taskLevel } : {}),
    agentId: agent.name,
    runId: overrides.runId ?? generateRunId(),
    workspace,
    instructions: overrides.instructions,
    maxIterations: overrides.maxIterations ?? config.maxIterations ?? DEFAULT_CONFIG.maxIterations,
    totalTimeoutMs: seconds(
      overrides.totalTimeoutSeconds ?? config.totalTimeoutSeconds ?? DEFAULT_CONFIG.totalTimeoutSeconds,
    ),
    iterationTimeoutMs: seconds(
      overrides.iterationTimeoutSeconds ?? config.iterationTimeoutSeconds ?? DEFAULT_CONFIG.iterationTimeoutSeconds,
    ),
    stagnationLimit: overrides.stagnationLimit ?? config.stagnationLimit ?? DEFAULT_CONFIG.stagnationLimit,
    maxConsecutiveErrors: config.maxConsecutiveErrors ?? DEFAULT_CONFIG.maxConsecutiveErrors,
    graceMs: seconds(config.graceSeconds ?? DEFAULT_CONFIG.graceSeconds),
    verification,
    completionStrategies: Object.freeze([
      ...(config.completionStrategies ?? DEFAULT_CONFIG.completionStrategies),
    ]),
    fingerprintExclude: Object.freeze([...(config.fingerprint?.exclude ?? [])]),
    audit: Object.freeze({
      gitCommits: overrides.gitCommits ?? config.audit?.gitCommits ?? false,
      iterationLogs: config.audit?.iterationLogs ?? true,
    }),
    ...(promptTemplate !== undefined ? { promptTemplate: resolve(cwd, promptTemplate) } : {}),
    agent: Object.freeze({ ...agent, ...(model !== undefined ? { model } : {}) }),
  });
}

export type { StoredConfig, RunOverrides, ConfigValidationResult, ConfigDefaults } from './types.js';
export { DEFAULT_CONFIG } from './types.js';

export {
  StoredConfigSchema,
  AgentConfigSchema,
  BatchPlanSchema,
  BatchRunSchema,
  validateStoredConfig,
  validateBatchPlan,
  formatConfigErrors,
} from './schema.js';

export type {
  BatchPlanValidated,
  BatchRunValidated,
  ConfigValidationError,
  ConfigParseResult,
} from './schema.js';
