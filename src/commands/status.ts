/**
 * ABOUTME: Status command for loopbench (headless).
 * Reports the run recorded in a workspace's manifest for CI/scripts.
 * Supports JSON output with --json and exit codes that mirror the run status.
 */

import { resolve } from 'node:path';
import { ConfigurationError, ManifestError, errorMessage } from '../errors.js';
import type { RunStatus } from '../engine/types.js';
import { getBranchName, loadManifest, type Manifest } from '../manifest/index.js';
import { loadIterationRecords, loadRunSummary, type RunSummaryHead } from '../logs/index.js';
import { formatDuration } from '../utils/logger.js';
import { printConfigurationError, readFlagValue } from './args.js';
import type { CommandContext } from './run.js';

/**
 * Overall status of a workspace
 */
export type WorkspaceStatus = RunStatus | 'no-run';

/**
 * Exit codes for CI/scripts
 * - 0: completed
 * - 1: pending or in progress
 * - 2: failed, timed out, or no run
 */
export type StatusExitCode = 0 | 1 | 2;

/**
 * JSON output structure for --json flag
 */
export interface StatusJsonOutput {
  status: WorkspaceStatus;
  workspace: string;
  run?: {
    id: string;
    taskId: string;
    agentId: string;
    model?: string;
    startedAt?: string;
    completedAt?: string;
    iterations: number;
    maxIterations?: number;
    reason?: string | null;
    score?: number | null;
    branch: string;
  };
}

export interface StatusCommandOptions {
  workspace: string;
  json: boolean;
  help: boolean;
}

export function parseStatusArgs(args: string[]): StatusCommandOptions {
  const options: StatusCommandOptions = { workspace: '.', json: false, help: false };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--workspace':
      case '-w':
        options.workspace = readFlagValue(args, i++, arg);
        break;
      case '--json':
        options.json = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new ConfigurationError(`Unknown option for status: ${arg}`);
    }
  }
  return options;
}

/**
 * Get the exit code for a given status
 */
export function getStatusExitCode(status: WorkspaceStatus): StatusExitCode {
  switch (status) {
    case 'completed':
      return 0;
    case 'pending':
    case 'in_progress':
      return 1;
    case 'failed':
    case 'timeout':
    case 'no-run':
      return 2;
  }
}

function getStatusIcon(status: WorkspaceStatus): string {
  switch (status) {
    case 'in_progress':
      return '▶';
    case 'pending':
      return '○';
    case 'completed':
      return '✓';
    case 'failed':
      return '✗';
    case 'timeout':
      return '⏱';
    case 'no-run':
      return '○';
  }
}

function maxIterationsOf(manifest: Manifest): number | undefined {
  const value = manifest.run.metadata?.['maxIterations'];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Build JSON output from the manifest and summary
 */
export function buildStatusOutput(
  workspace: string,
  manifest: Manifest | null,
  iterations: number,
  summary: RunSummaryHead | null,
): StatusJsonOutput {
  if (!manifest) {
    return { status: 'no-run', workspace };
  }
  const maxIterations = maxIterationsOf(manifest);
  return {
    status: manifest.run.status,
    workspace,
    run: {
      id: manifest.run.id,
      taskId: manifest.task.id,
      agentId: manifest.harness.id,
      ...(manifest.harness.model ? { model: manifest.harness.model } : {}),
      ...(manifest.run.startedAt ? { startedAt: manifest.run.startedAt } : {}),
      ...(manifest.run.completedAt ? { completedAt: manifest.run.completedAt } : {}),
      iterations,
      ...(maxIterations !== undefined ? { maxIterations } : {}),
      ...(summary ? { reason: summary.reason, score: summary.score } : {}),
      branch: getBranchName(manifest),
    },
  };
}

function elapsed(startedAt: string | undefined, completedAt: string | undefined): string {
  if (!startedAt) return '-';
  const end = completedAt ? Date.parse(completedAt) : Date.now();
  return formatDuration(Math.max(0, end - Date.parse(startedAt)));
}

/**
 * Print human-readable status output
 */
function printHumanStatus(output: StatusJsonOutput): void {
  const { run } = output;
  if (!run) {
    console.log(`No run found in ${output.workspace}.`);
    console.log('');
    console.log('Start one with: loopbench run --workspace <dir>');
    return;
  }

  console.log('');
  console.log('═══════════════════════════════════════════════════════════════');
  console.log('                      loopbench run status                      ');
  console.log('═══════════════════════════════════════════════════════════════');
  console.log('');
  console.log(`  Status:          ${getStatusIcon(output.status)} ${output.status.toUpperCase()}`);
  console.log(`  Run ID:          ${run.id}`);
  console.log(`  Task:            ${run.taskId}`);
  console.log(`  Agent:           ${run.agentId}${run.model ? ` (${run.model})` : ''}`);
  console.log(`  Started:         ${run.startedAt ?? '-'}`);
  if (run.completedAt) {
    console.log(`  Completed:       ${run.completedAt}`);
  }
  console.log(`  Elapsed:         ${elapsed(run.startedAt, run.completedAt)}`);
  console.log(`  Iterations:      ${run.iterations}${run.maxIterations !== undefined ? `/${run.maxIterations}` : ''}`);
  if (run.score !== undefined && run.score !== null) {
    console.log(`  Score:           ${run.score.toFixed(2)}`);
  }
  if (run.reason) {
    console.log(`  Reason:          ${run.reason}`);
  }
  console.log(`  Branch:          ${run.branch}`);
  console.log('');
}

/**
 * Execute the status command
 */
export async function executeStatusCommand(args: string[], context: CommandContext = {}): Promise<number> {
  let options: StatusCommandOptions;
  try {
    options = parseStatusArgs(args);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printConfigurationError(error);
      return 2;
    }
    throw error;
  }
  if (options.help) {
    printStatusHelp();
    return 0;
  }

  const workspace = resolve(context.cwd ?? process.cwd(), options.workspace);
  let manifest: Manifest | null;
  try {
    manifest = await loadManifest(workspace);
  } catch (error) {
    if (!(error instanceof ManifestError)) throw error;
    console.error(`Cannot read manifest: ${errorMessage(error)}`);
    return 2;
  }

  const iterations = manifest ? (await loadIterationRecords(workspace)).length : 0;
  const summary = manifest ? await loadRunSummary(workspace) : null;
  const output = buildStatusOutput(workspace, manifest, iterations, summary);

  if (options.json) {
    console.log(JSON.stringify(output, null, 2));
  } else {
    printHumanStatus(output);
  }
  return getStatusExitCode(output.status);
}

/**
 * Print status command help
 */
export function printStatusHelp(): void {
  console.log(`
loopbench status - Check the run recorded in a workspace

Usage: loopbench status [options]

Options:
  --workspace, -w <dir>   Workspace directory (default: current directory)
  --json                  Output in JSON format for CI/scripts
  -h, --help              Show this help message

Exit Codes:
  0   Run completed
  1   Run pending or in progress
  2   Run failed, timed out, or no run found
`);
}
