/**
 * ABOUTME: Verify command for loopbench.
 * Runs the verification step once against a workspace, outside of any run.
 */

import { resolve } from 'node:path';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_CONFIG, GLOBAL_CONFIG_PATH, loadStoredConfig } from '../config/index.js';
import {
  DEFAULT_EVAL_DIR_ENV,
  formatVerificationFeedback,
  runVerification,
  type ResolvedVerificationConfig,
  type VerificationResult,
} from '../engine/verification.js';
import { isDirectory } from '../utils/files.js';
import { formatDuration } from '../utils/logger.js';
import { parseNumberFlag, printConfigurationError, readFlagValue } from './args.js';
import type { CommandContext } from './run.js';

export interface VerifyCommandOptions {
  workspace: string;
  command?: string;
  timeoutSeconds?: number;
  evalDir?: string;
  json: boolean;
  help: boolean;
}

export function parseVerifyArgs(args: string[]): VerifyCommandOptions {
  const options: VerifyCommandOptions = { workspace: '.', json: false, help: false };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--workspace':
      case '-w':
        options.workspace = readFlagValue(args, i++, arg);
        break;
      case '--command':
      case '-c':
        options.command = readFlagValue(args, i++, arg);
        break;
      case '--timeout':
        options.timeoutSeconds = parseNumberFlag(readFlagValue(args, i++, arg), arg);
        break;
      case '--eval-dir':
        options.evalDir = readFlagValue(args, i++, arg);
        break;
      case '--json':
        options.json = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new ConfigurationError(`Unknown option for verify: ${arg}`);
    }
  }
  return options;
}

/**
 * Resolve the verification to run from flags and stored configuration.
 * @throws ConfigurationError when no command is available or a path is missing
 */
export async function resolveVerifyConfig(
  options: VerifyCommandOptions,
  cwd: string,
  globalConfigPath: string,
): Promise<{ workspace: string; config: ResolvedVerificationConfig }> {
  const stored = await loadStoredConfig(cwd, globalConfigPath);
  const workspace = resolve(cwd, options.workspace);
  const command = options.command ?? stored.verification?.command;
  const evalDirOption = options.evalDir ?? stored.verification?.evalDir;
  const evalDir = evalDirOption !== undefined ? resolve(cwd, evalDirOption) : undefined;
  const timeoutSeconds =
    options.timeoutSeconds ?? stored.verification?.timeoutSeconds ?? DEFAULT_CONFIG.verificationTimeoutSeconds;

  const problems: string[] = [];
  if (!command?.trim()) {
    problems.push('No verification command: pass --command or set verification.command in config.toml');
  }
  if (!(timeoutSeconds > 0)) {
    problems.push(`Verification timeout must be positive (got ${timeoutSeconds})`);
  }
  if (!(await isDirectory(workspace))) {
    problems.push(`Workspace does not exist: ${workspace}`);
  }
  if (evalDir !== undefined && !(await isDirectory(evalDir))) {
    problems.push(`Eval directory does not exist: ${evalDir}`);
  }
  if (problems.length > 0 || command === undefined) {
    throw new ConfigurationError(problems);
  }

  return {
    workspace,
    config: {
      command,
      timeoutMs: Math.round(timeoutSeconds * 1000),
      ...(evalDir !== undefined ? { evalDir } : {}),
      evalDirEnv: stored.verification?.evalDirEnv ?? DEFAULT_EVAL_DIR_ENV,
    },
  };
}

function printVerification(result: VerificationResult): void {
  console.log('');
  console.log(
    `${result.success ? '✓ PASSED' : '✗ FAILED'}  score ${result.score.toFixed(2)}  (${result.source}, ${formatDuration(result.durationMs)})`,
  );
  console.log(`  ${result.message}`);
  for (const checkpoint of result.checkpoints) {
    console.log(`  ${checkpoint.passed ? '✓' : '✗'} ${checkpoint.name}${checkpoint.message ? `: ${checkpoint.message}` : ''}`);
  }
  const feedback = formatVerificationFeedback(result);
  if (feedback && result.checkpoints.length === 0) {
    console.log('');
    console.log(feedback);
  }
  console.log('');
}

/**
 * Execute the verify command.
 * @returns 0 when verification passed, 1 when it failed, 2 on configuration errors
 */
export async function executeVerifyCommand(args: string[], context: CommandContext = {}): Promise<number> {
  const cwd = context.cwd ?? process.cwd();
  let options: VerifyCommandOptions;
  let resolved: { workspace: string; config: ResolvedVerificationConfig };
  try {
    options = parseVerifyArgs(args);
    if (options.help) {
      printVerifyHelp();
      return 0;
    }
    resolved = await resolveVerifyConfig(options, cwd, context.globalConfigPath ?? GLOBAL_CONFIG_PATH);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printConfigurationError(error);
      return 2;
    }
    throw error;
  }

  const abortController = new AbortController();
  const onSigint = (): void => abortController.abort();
  process.on('SIGINT', onSigint);
  let result: VerificationResult;
  try {
    result = await runVerification(resolved.workspace, resolved.config, { signal: abortController.signal });
  } finally {
    process.off('SIGINT', onSigint);
  }

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    printVerification(result);
  }
  return result.success ? 0 : 1;
}

export function printVerifyHelp(): void {
  console.log(`
loopbench verify - Run verification once against a workspace

Usage: loopbench verify [options]

Options:
  --workspace, -w <dir>   Workspace directory (default: current directory)
  --command, -c <cmd>     Verification command (default: verification.command)
  --timeout <seconds>     Verification timeout (default: 120)
  --eval-dir <dir>        Private evaluation assets exposed as EVAL_DIR
  --json                  Output the verification result as JSON
  -h, --help              Show this help message

A command whose stdout ends with a JSON object holding "success" (and
optionally "score", "message", "checkpoints") is scored from that payload.
Otherwise exit code 0 passes with score 1.

Exit codes:
  0   Verification passed
  1   Verification failed
  2   Configuration error
`);
}
