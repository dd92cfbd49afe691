/**
 * ABOUTME: Batch command for loopbench.
 * Loads a TOML plan of runs, validates every run before any starts, and
 * executes them through the RunPool.
 */

import { readFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { ConfigurationError, errorMessage } from '../errors.js';
import {
  DEFAULT_CONFIG,
  GLOBAL_CONFIG_PATH,
  createTaskRun,
  loadBatchPlan,
  loadStoredConfig,
  mergeConfigs,
} from '../config/index.js';
import type { BatchRunValidated, RunOverrides, StoredConfig } from '../config/index.js';
import type { TaskRun } from '../engine/types.js';
import { RunPool } from '../orchestrator/run-pool.js';
import type { PoolEvent, PoolRunResult } from '../orchestrator/types.js';
import { createAgentRegistry, type AgentRegistry } from '../plugins/agents/registry.js';
import { isFile } from '../utils/files.js';
import { formatDuration } from '../utils/logger.js';
import { TASK_FILE } from '../workspace/paths.js';
import { parseNumberFlag, printConfigurationError, readFlagValue } from './args.js';
import { TASK_FILE_INSTRUCTIONS, createCommandLogger, type CommandContext } from './run.js';

export interface BatchCommandOptions {
  planPath?: string;
  workers?: number;
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  fresh: boolean;
  help: boolean;
}

/**
 * Parse `loopbench batch` arguments.
 * @throws ConfigurationError on unknown flags or malformed values
 */
export function parseBatchArgs(args: string[]): BatchCommandOptions {
  const options: BatchCommandOptions = { json: false, quiet: false, verbose: false, fresh: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--workers':
        options.workers = parseNumberFlag(readFlagValue(args, i++, arg), arg, { integer: true });
        break;
      case '--json':
        options.json = true;
        break;
      case '--quiet':
      case '-q':
        options.quiet = true;
        break;
      case '--verbose':
        options.verbose = true;
        break;
      case '--fresh':
        options.fresh = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        if (arg === undefined || arg.startsWith('-') || options.planPath !== undefined) {
          throw new ConfigurationError(`Unexpected argument for batch: ${arg}`);
        }
        options.planPath = arg;
    }
  }

  return options;
}

async function readRunInstructions(run: BatchRunValidated, planDir: string): Promise<string | undefined> {
  if (run.instructions !== undefined) {
    return run.instructions;
  }
  if (run.instructionsFile !== undefined) {
    const path = resolve(planDir, run.instructionsFile);
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read instructions file ${path}: ${errorMessage(error)}`, { cause: error });
    }
  }
  const workspace = resolve(planDir, run.workspace);
  return (await isFile(join(workspace, TASK_FILE))) ? TASK_FILE_INSTRUCTIONS : undefined;
}

async function toOverrides(run: BatchRunValidated, planDir: string): Promise<RunOverrides> {
  const instructions = await readRunInstructions(run, planDir);
  return {
    taskId: run.task,
    workspace: run.workspace,
    ...(run.taskName !== undefined ? { taskName: run.taskName } : {}),
    ...(run.agent !== undefined ? { agent: run.agent } : {}),
    ...(instructions !== undefined ? { instructions } : {}),
    ...(run.runId !== undefined ? { runId: run.runId } : {}),
    ...(run.model !== undefined ? { model: run.model } : {}),
    ...(run.maxIterations !== undefined ? { maxIterations: run.maxIterations } : {}),
    ...(run.totalTimeoutSeconds !== undefined ? { totalTimeoutSeconds: run.totalTimeoutSeconds } : {}),
    ...(run.verify !== undefined ? { verifyCommand: run.verify } : {}),
  };
}

/**
 * Freeze every run of a plan. Workspace and file paths are relative to the
 * plan file's directory.
 * @throws ConfigurationError listing the problems of every run
 */
export async function buildBatchTasks(
  planPath: string,
  stored: StoredConfig,
  registry: AgentRegistry,
): Promise<{ tasks: TaskRun[]; config: StoredConfig }> {
  const { runs, ...shared } = await loadBatchPlan(planPath);
  const config = mergeConfigs(stored, shared);
  const planDir = dirname(planPath);

  const tasks: TaskRun[] = [];
  const problems: string[] = [];
  for (const [index, run] of runs.entries()) {
    try {
      tasks.push(createTaskRun(config, await toOverrides(run, planDir), registry, planDir));
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      problems.push(...error.problems.map((problem) => `runs[${index}] (${run.task}): ${problem}`));
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return { tasks, config };
}

function resultIcon(result: PoolRunResult): string {
  if (result.summary?.status === 'completed') return '✓';
  if (result.summary?.status === 'timeout') return '⏱';
  return '✗';
}

/**
 * Print one line per run plus totals.
 */
export function printBatchResults(results: readonly PoolRunResult[]): void {
  console.log('');
  console.log('═══════════════════════════════════════════════════════════════');
  console.log('                      loopbench batch results                   ');
  console.log('═══════════════════════════════════════════════════════════════');
  for (const result of results) {
    const { summary } = result;
    const detail = summary
      ? `${summary.status} after ${summary.iterations} iteration(s) in ${formatDuration(summary.elapsedMs)}${
          summary.score !== null ? `, score ${summary.score.toFixed(2)}` : ''
        }`
      : `not run: ${result.error ?? 'unknown error'}`;
    console.log(`  ${resultIcon(result)} ${result.taskId} [${result.runId}] ${detail}`);
  }
  const completed = results.filter((result) => result.summary?.status === 'completed').length;
  console.log('───────────────────────────────────────────────────────────────');
  console.log(`  ${completed}/${results.length} completed`);
  console.log('');
}

interface PreparedBatch {
  options: BatchCommandOptions;
  pool: RunPool;
  tasks: TaskRun[];
}

async function prepareBatch(args: string[], context: CommandContext): Promise<PreparedBatch | number> {
  const cwd = context.cwd ?? process.cwd();
  try {
    const options = parseBatchArgs(args);
    if (options.help) {
      printBatchHelp();
      return 0;
    }
    if (!options.planPath) {
      throw new ConfigurationError('A batch plan file is required');
    }

    const stored = await loadStoredConfig(cwd, context.globalConfigPath ?? GLOBAL_CONFIG_PATH);
    const registry = context.registry ?? createAgentRegistry();
    const { tasks, config } = await buildBatchTasks(resolve(cwd, options.planPath), stored, registry);
    const pool = new RunPool({
      maxWorkers: options.workers ?? config.maxWorkers ?? DEFAULT_CONFIG.maxWorkers,
      logger: createCommandLogger(config, options),
      controller: { registry, fresh: options.fresh },
    });
    return { options, pool, tasks };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printConfigurationError(error);
      return 2;
    }
    throw error;
  }
}

/**
 * Execute `loopbench batch`.
 * @returns 0 when every run completed, 1 otherwise, 2 on configuration errors
 */
export async function executeBatchCommand(args: string[], context: CommandContext = {}): Promise<number> {
  const prepared = await prepareBatch(args, context);
  if (typeof prepared === 'number') {
    return prepared;
  }
  const { options, pool, tasks } = prepared;

  const events: PoolEvent[] = [];
  if (options.json) {
    pool.on('event', (event: PoolEvent) => events.push(event));
  }
  const onSigint = (): void => pool.abortAll('Batch aborted by operator (SIGINT)');
  process.on('SIGINT', onSigint);

  let results: PoolRunResult[];
  try {
    results = await pool.runAll(tasks);
  } finally {
    process.off('SIGINT', onSigint);
  }

  if (options.json) {
    console.log(JSON.stringify({ results, events }, null, 2));
  } else if (!options.quiet) {
    printBatchResults(results);
  }
  return results.every((result) => result.summary?.status === 'completed') ? 0 : 1;
}

/**
 * Print batch command help.
 */
export function printBatchHelp(): void {
  console.log(`
loopbench batch - Run a plan of task runs concurrently

Usage: loopbench batch <plan.toml> [options]

Options:
  --workers <n>       Runs in flight at once (default: maxWorkers or 1)
  --fresh             Replace earlier audit trails in the workspaces
  --json              Print results and pool events as JSON
  --quiet, -q         Only warnings and errors
  --verbose           Include agent output
  -h, --help          Show this help message

Plan format:
  maxWorkers = 4
  verification = { command = "npm test" }

  [[runs]]
  task = "fizzbuzz"
  workspace = "work/fizzbuzz-claude"
  agent = "claude"

  [[runs]]
  task = "fizzbuzz"
  workspace = "work/fizzbuzz-codex"
  agent = "codex"

Top-level keys take the same settings as config.toml and apply to every run.
Paths are relative to the plan file. Two runs may not share a workspace.

Exit codes:
  0   Every run completed
  1   At least one run failed, timed out or could not start
  2   Configuration error
`);
}
