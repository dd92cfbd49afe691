/**
 * ABOUTME: Zod schemas for loopbench configuration validation.
 * Provides runtime validation with helpful error messages for config files
 * and batch plans.
 */

import { z } from 'zod';
import { COMPLETION_STRATEGY_NAMES } from '../engine/completion-strategies.js';

const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const InstructionTransportSchema = z.enum(['arg', 'stdin', 'file']);

export const CompletionStrategySchema = z.enum(COMPLETION_STRATEGY_NAMES);

export const LogLevelSchema = z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']);

/**
 * Agent adapter options schema (flexible for adapter-specific settings)
 */
export const AgentOptionsSchema = z.record(z.string(), z.unknown());

/**
 * Agent configuration schema
 */
export const AgentConfigSchema = z
  .object({
    name: z.string().min(1, 'Agent name is required'),
    plugin: z.string().min(1, 'Agent plugin type is required').default('command'),
    command: z.string().min(1).optional(),
    args: z.array(z.string()).optional(),
    transport: InstructionTransportSchema.optional(),
    env: z.record(z.string().regex(ENV_NAME, 'Invalid environment variable name'), z.string()).optional(),
    envExclude: z.array(z.string().min(1)).optional(),
    model: z.string().min(1).optional(),
    vendor: z.string().min(1).optional(),
    version: z.string().min(1).optional(),
    options: AgentOptionsSchema.optional(),
  })
  .strict();

export const VerificationConfigSchema = z
  .object({
    command: z.string().min(1, 'Verification command cannot be empty'),
    timeoutSeconds: z.number().positive().max(86_400).optional(),
    evalDir: z.string().min(1).optional(),
    evalDirEnv: z.string().regex(ENV_NAME, 'Invalid environment variable name').optional(),
  })
  .strict();

export const FingerprintConfigSchema = z
  .object({
    exclude: z.array(z.string().min(1)).optional(),
  })
  .strict();

export const AuditConfigSchema = z
  .object({
    gitCommits: z.boolean().optional(),
    iterationLogs: z.boolean().optional(),
  })
  .strict();

/**
 * Stored configuration schema (global or project config file)
 * Both global (~/.config/loopbench/config.toml) and project (.loopbench/config.toml)
 * use this schema.
 */
export const StoredConfigSchema = z
  .object({
    maxIterations: z.number().int().min(1).max(1000).optional(),
    totalTimeoutSeconds: z.number().positive().max(604_800).optional(),
    iterationTimeoutSeconds: z.number().positive().max(86_400).optional(),
    stagnationLimit: z.number().int().min(1).max(50).optional(),
    maxConsecutiveErrors: z.number().int().min(1).max(100).optional(),
    maxWorkers: z.number().int().min(1).max(64).optional(),
    graceSeconds: z.number().min(0).max(600).optional(),
    completionStrategies: z.array(CompletionStrategySchema).min(1).optional(),

    // Name of the default entry in `agents`, or a built-in plugin id
    agent: z.string().min(1).optional(),
    agents: z.array(AgentConfigSchema).optional(),

    verification: VerificationConfigSchema.optional(),
    fingerprint: FingerprintConfigSchema.optional(),
    audit: AuditConfigSchema.optional(),

    // Custom instruction template path
    promptTemplate: z.string().min(1).optional(),

    logLevel: LogLevelSchema.optional(),
  })
  .strict();

export type StoredConfigValidated = z.infer<typeof StoredConfigSchema>;

/**
 * One run of a batch plan.
 */
export const BatchRunSchema = z
  .object({
    task: z.string().min(1, 'Task id is required'),
    taskName: z.string().optional(),
    workspace: z.string().min(1, 'Workspace is required'),
    agent: z.string().min(1).optional(),
    instructions: z.string().min(1).optional(),
    instructionsFile: z.string().min(1).optional(),
    runId: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    maxIterations: z.number().int().min(1).max(1000).optional(),
    totalTimeoutSeconds: z.number().positive().optional(),
    verify: z.string().min(1).optional(),
  })
  .strict();

/**
 * Batch plan: shared settings plus a list of runs.
 */
export const BatchPlanSchema = StoredConfigSchema.extend({
  runs: z.array(BatchRunSchema).min(1, 'A batch plan needs at least one [[runs]] entry'),
}).strict();

export type BatchRunValidated = z.infer<typeof BatchRunSchema>;
export type BatchPlanValidated = z.infer<typeof BatchPlanSchema>;

/**
 * Validation result with formatted error messages
 */
export interface ConfigValidationError {
  /** The path to the invalid field (e.g., "agents.0.name") */
  path: string;
  /** Human-readable error message */
  message: string;
}

/**
 * Result of validating a configuration
 */
export interface ConfigParseResult<T> {
  success: boolean;
  data?: T;
  errors?: ConfigValidationError[];
}

function toValidationErrors(error: z.ZodError): ConfigValidationError[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

/**
 * Validate a configuration object against the schema.
 */
export function validateStoredConfig(config: unknown): ConfigParseResult<StoredConfigValidated> {
  const result = StoredConfigSchema.safeParse(config);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: toValidationErrors(result.error) };
}

export function validateBatchPlan(plan: unknown): ConfigParseResult<BatchPlanValidated> {
  const result = BatchPlanSchema.safeParse(plan);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: toValidationErrors(result.error) };
}

/**
 * Format validation errors into a user-friendly string.
 */
export function formatConfigErrors(errors: ConfigValidationError[], configPath: string): string {
  const lines = [`Configuration error in ${configPath}:`];

  for (const error of errors) {
    lines.push(`  • ${error.path}: ${error.message}`);
  }

  return lines.join('\n');
}
