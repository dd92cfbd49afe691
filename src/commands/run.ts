/**
 * ABOUTME: Run command for loopbench.
 * Parses run options, freezes them into a TaskRun and drives one
 * IterationController to a terminal status. Logs go to stderr when --json is
 * set so stdout carries only the summary.
 */

import { readFile } from 'node:fs/promises';
import { join, resolve, basename } from 'node:path';
import { ConfigurationError, errorMessage } from '../errors.js';
import { createTaskRun, loadStoredConfig, GLOBAL_CONFIG_PATH } from '../config/index.js';
import type { RunOverrides, StoredConfig } from '../config/index.js';
import { IterationController } from '../engine/index.js';
import type { RunEvent, RunSummary } from '../engine/types.js';
import { createStructuredLogger, type LogLevel, type StructuredLogger } from '../logs/index.js';
import { createAgentRegistry, type AgentRegistry } from '../plugins/agents/registry.js';
import { isFile } from '../utils/files.js';
import { formatDuration } from '../utils/logger.js';
import { TASK_FILE } from '../workspace/paths.js';
import { parseNumberFlag, printConfigurationError, readFlagValue } from './args.js';

/**
 * Instructions used when no prompt is given but the workspace has a TASK.md.
 */
export const TASK_FILE_INSTRUCTIONS = `Complete the task described in ${TASK_FILE}.`;

/**
 * Options parsed from `loopbench run` arguments.
 */
export interface RunCommandOptions {
  task?: string;
  taskName?: string;
  agent?: string;
  workspace?: string;
  /** File holding the task instructions */
  instructionsFile?: string;
  /** Inline task instructions */
  prompt?: string;
  runId?: string;
  model?: string;
  iterations?: number;
  timeoutSeconds?: number;
  iterationTimeoutSeconds?: number;
  stagnation?: number;
  verify?: string;
  verifyTimeoutSeconds?: number;
  evalDir?: string;
  template?: string;
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  fresh: boolean;
  gitCommits: boolean;
  help: boolean;
}

/**
 * Injection points for tests.
 */
export interface CommandContext {
  cwd?: string;
  globalConfigPath?: string;
  registry?: AgentRegistry;
}

/**
 * Parse `loopbench run` arguments.
 * @throws ConfigurationError on unknown flags or malformed values
 */
export function parseRunArgs(args: string[]): RunCommandOptions {
  const options: RunCommandOptions = {
    json: false,
    quiet: false,
    verbose: false,
    fresh: false,
    gitCommits: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--task':
        options.task = readFlagValue(args, i++, arg);
        break;
      case '--task-name':
        options.taskName = readFlagValue(args, i++, arg);
        break;
      case '--agent':
        options.agent = readFlagValue(args, i++, arg);
        break;
      case '--workspace':
      case '-w':
        options.workspace = readFlagValue(args, i++, arg);
        break;
      case '--instructions':
        options.instructionsFile = readFlagValue(args, i++, arg);
        break;
      case '--prompt':
        options.prompt = readFlagValue(args, i++, arg);
        break;
      case '--run-id':
        options.runId = readFlagValue(args, i++, arg);
        break;
      case '--model':
        options.model = readFlagValue(args, i++, arg);
        break;
      case '--iterations':
        options.iterations = parseNumberFlag(readFlagValue(args, i++, arg), arg, { integer: true });
        break;
      case '--timeout':
        options.timeoutSeconds = parseNumberFlag(readFlagValue(args, i++, arg), arg);
        break;
      case '--iteration-timeout':
        options.iterationTimeoutSeconds = parseNumberFlag(readFlagValue(args, i++, arg), arg);
        break;
      case '--stagnation':
        options.stagnation = parseNumberFlag(readFlagValue(args, i++, arg), arg, { integer: true });
        break;
      case '--verify':
        options.verify = readFlagValue(args, i++, arg);
        break;
      case '--verify-timeout':
        options.verifyTimeoutSeconds = parseNumberFlag(readFlagValue(args, i++, arg), arg);
        break;
      case '--eval-dir':
        options.evalDir = readFlagValue(args, i++, arg);
        break;
      case '--template':
        options.template = readFlagValue(args, i++, arg);
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
      case '--git-commits':
        options.gitCommits = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new ConfigurationError(`Unknown option for run: ${arg}`);
    }
  }

  return options;
}

async function readInstructions(options: RunCommandOptions, cwd: string, workspace: string): Promise<string | undefined> {
  if (options.instructionsFile) {
    const path = resolve(cwd, options.instructionsFile);
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read instructions file ${path}: ${errorMessage(error)}`, { cause: error });
    }
  }
  if (options.prompt !== undefined) {
    return options.prompt;
  }
  return (await isFile(join(workspace, TASK_FILE))) ? TASK_FILE_INSTRUCTIONS : undefined;
}

/**
 * Turn parsed options into run overrides.
 */
export async function buildRunOverrides(options: RunCommandOptions, cwd: string): Promise<RunOverrides> {
  const workspacePath = options.workspace ?? '.';
  const workspace = resolve(cwd, workspacePath);
  const instructions = await readInstructions(options, cwd, workspace);

  const overrides: RunOverrides = {
    taskId: options.task ?? basename(workspace),
    workspace: workspacePath,
  };
  if (options.taskName !== undefined) overrides.taskName = options.taskName;
  if (options.agent !== undefined) overrides.agent = options.agent;
  if (instructions !== undefined) overrides.instructions = instructions;
  if (options.runId !== undefined) overrides.runId = options.runId;
  if (options.model !== undefined) overrides.model = options.model;
  if (options.iterations !== undefined) overrides.maxIterations = options.iterations;
  if (options.timeoutSeconds !== undefined) overrides.totalTimeoutSeconds = options.timeoutSeconds;
  if (options.iterationTimeoutSeconds !== undefined) {
    overrides.iterationTimeoutSeconds = options.iterationTimeoutSeconds;
  }
  if (options.stagnation !== undefined) overrides.stagnationLimit = options.stagnation;
  if (options.verify !== undefined) overrides.verifyCommand = options.verify;
  if (options.verifyTimeoutSeconds !== undefined) overrides.verifyTimeoutSeconds = options.verifyTimeoutSeconds;
  if (options.evalDir !== undefined) overrides.evalDir = options.evalDir;
  if (options.template !== undefined) overrides.promptTemplate = options.template;
  if (options.gitCommits) overrides.gitCommits = true;
  return overrides;
}

/**
 * Logger for a command honoring --quiet, --verbose and the configured level.
 */
export function createCommandLogger(
  config: StoredConfig,
  flags: { quiet: boolean; verbose: boolean; json: boolean },
): StructuredLogger {
  let minLevel: LogLevel = config.logLevel ?? 'INFO';
  if (flags.verbose) minLevel = 'DEBUG';
  if (flags.quiet) minLevel = 'WARN';
  return createStructuredLogger({
    minLevel,
    ...(flags.json ? { stream: process.stderr } : {}),
  });
}

/**
 * Print the human-readable run summary.
 */
export function printRunSummary(summary: RunSummary): void {
  const icon = summary.status === 'completed' ? '✓' : '✗';
  console.log('');
  console.log('═══════════════════════════════════════════════════════════════');
  console.log(`  ${icon} ${summary.status.toUpperCase()}  ${summary.taskId} / ${summary.agentId} / ${summary.runId}`);
  console.log('═══════════════════════════════════════════════════════════════');
  if (summary.reason) {
    console.log(`  Reason:       ${summary.reason}`);
  }
  console.log(`  Iterations:   ${summary.iterations}/${summary.config.maxIterations}`);
  console.log(`  Elapsed:      ${formatDuration(summary.elapsedMs)}`);
  if (summary.score !== null) {
    console.log(`  Score:        ${summary.score.toFixed(2)}`);
  }
  if (summary.usage > 0) {
    console.log(`  Usage:        ${summary.usage}`);
  }
  console.log(
    `  Files:        ${summary.files.created.length} created, ${summary.files.modified.length} modified, ${summary.files.deleted.length} deleted`,
  );
  console.log('');
}

function forwardAgentOutput(logger: StructuredLogger): (event: RunEvent) => void {
  return (event) => {
    if (event.type !== 'agent:output') return;
    if (event.stream === 'stdout') {
      logger.agentOutput(event.data);
    } else {
      logger.agentError(event.data);
    }
  };
}

interface PreparedRun {
  options: RunCommandOptions;
  controller: IterationController;
  logger: StructuredLogger;
}

async function prepareRun(args: string[], context: CommandContext): Promise<PreparedRun | number> {
  const cwd = context.cwd ?? process.cwd();
  try {
    const options = parseRunArgs(args);
    if (options.help) {
      printRunHelp();
      return 0;
    }

    const config = await loadStoredConfig(cwd, context.globalConfigPath ?? GLOBAL_CONFIG_PATH);
    const registry = context.registry ?? createAgentRegistry();
    const task = createTaskRun(config, await buildRunOverrides(options, cwd), registry, cwd);
    const logger = createCommandLogger(config, options);
    const controller = new IterationController(task, { registry, logger, fresh: options.fresh });
    await controller.prepare();
    return { options, controller, logger };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printConfigurationError(error);
      return 2;
    }
    throw error;
  }
}

/**
 * Execute `loopbench run`.
 * @returns exit code: 0 completed, 1 failed or timed out, 2 configuration error
 */
export async function executeRunCommand(args: string[], context: CommandContext = {}): Promise<number> {
  const prepared = await prepareRun(args, context);
  if (typeof prepared === 'number') {
    return prepared;
  }
  const { options, controller, logger } = prepared;

  const unsubscribe = controller.on(forwardAgentOutput(logger));
  const onSigint = (): void => {
    logger.warn('system', 'Interrupted, stopping the run');
    controller.abort('Run aborted by operator (SIGINT)');
  };
  process.on('SIGINT', onSigint);

  let summary: RunSummary;
  try {
    summary = await controller.run();
  } finally {
    process.off('SIGINT', onSigint);
    unsubscribe();
  }

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
  } else if (!options.quiet) {
    printRunSummary(summary);
  }
  return summary.status === 'completed' ? 0 : 1;
}

/**
 * Print run command help.
 */
export function printRunHelp(): void {
  console.log(`
loopbench run - Run one task against one agent

Usage: loopbench run [options]

Options:
  --task <id>               Task id (default: workspace directory name)
  --task-name <name>        Human-readable task name
  --agent <name>            Agent from config, or built-in plugin id
  --workspace, -w <dir>     Workspace directory (default: current directory)
  --instructions <file>     Read task instructions from a file
  --prompt <text>           Task instructions inline
  --run-id <id>             Run id (default: run_<8 hex>)
  --model <name>            Model passed to the agent
  --iterations <n>          Maximum iterations (default: 10)
  --timeout <seconds>       Total time budget (default: 300)
  --iteration-timeout <s>   Per-iteration timeout (default: 300)
  --stagnation <n>          Unchanged observations before failing (default: 3)
  --verify <command>        Verification command run after each iteration
  --verify-timeout <s>      Verification timeout (default: 120)
  --eval-dir <dir>          Private evaluation assets exposed to verification
  --template <file>         Custom Handlebars instruction template
  --git-commits             Commit every audit record to the workspace repository
  --fresh                   Replace an earlier run's audit trail in the workspace
  --json                    Print the run summary as JSON
  --quiet, -q               Only warnings and errors
  --verbose                 Include agent output
  -h, --help                Show this help message

Without --instructions or --prompt, a workspace holding ${TASK_FILE} is given
"${TASK_FILE_INSTRUCTIONS}"

Exit codes:
  0   Run completed
  1   Run failed or timed out
  2   Configuration error

Examples:
  loopbench run --task fizzbuzz --agent claude -w ./work --verify "npm test"
  loopbench run --prompt "Fix the failing test" --iterations 3 --json
`);
}
