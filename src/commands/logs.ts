/**
 * ABOUTME: Logs command for loopbench.
 * Lists a workspace's iteration records or shows one iteration in full.
 */

import { resolve } from 'node:path';
import { ConfigurationError } from '../errors.js';
import type { IterationRecord } from '../engine/types.js';
import { getIterationLogPath, loadCommitRecords, loadIterationRecords } from '../logs/index.js';
import { formatDuration, truncate } from '../utils/logger.js';
import { parseNumberFlag, printConfigurationError, readFlagValue } from './args.js';
import type { CommandContext } from './run.js';

export interface LogsCommandOptions {
  workspace: string;
  iteration?: number;
  json: boolean;
  help: boolean;
}

/**
 * Parse logs command arguments.
 */
export function parseLogsArgs(args: string[]): LogsCommandOptions {
  const options: LogsCommandOptions = { workspace: '.', json: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--workspace':
      case '-w':
        options.workspace = readFlagValue(args, i++, arg);
        break;
      case '--iteration':
      case '-i':
        options.iteration = parseNumberFlag(readFlagValue(args, i++, arg), arg, { integer: true });
        break;
      case '--json':
        options.json = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new ConfigurationError(`Unknown option for logs: ${arg}`);
    }
  }

  return options;
}

/**
 * Get status icon for an iteration.
 */
function getRecordIcon(record: IterationRecord): string {
  if (record.verification?.success) return '✓';
  if (record.classification === 'timeout') return '⏱';
  if (record.classification === 'completed') return '○';
  return '✗';
}

/**
 * One line per iteration.
 */
export function formatRecordLine(record: IterationRecord): string {
  const verification = record.verification
    ? ` verify ${record.verification.success ? 'PASSED' : 'FAILED'} ${record.verification.score.toFixed(2)}`
    : '';
  const iteration = String(record.iteration).padStart(3);
  return `  ${getRecordIcon(record)} ${iteration}  ${record.classification.padEnd(14)} ${formatDuration(record.durationMs).padStart(8)}  ${record.progress}${verification}`;
}

function printRecordList(workspace: string, records: readonly IterationRecord[]): void {
  if (records.length === 0) {
    console.log(`No iteration records in ${workspace}.`);
    return;
  }

  console.log('');
  console.log(`Iteration records (${records.length})`);
  console.log('─'.repeat(60));
  for (const record of records) {
    console.log(formatRecordLine(record));
  }
  console.log('─'.repeat(60));
  console.log('');
  console.log('View one iteration: loopbench logs --iteration <n>');
}

function printRecordDetail(workspace: string, record: IterationRecord): void {
  console.log('');
  console.log(`Iteration ${record.iteration}`);
  console.log('═'.repeat(60));
  console.log(`  Classification:  ${record.classification}`);
  console.log(`  Exit code:       ${record.exitCode ?? 'none'}`);
  console.log(`  Duration:        ${formatDuration(record.durationMs)}`);
  console.log(`  Progress:        ${record.progress}`);
  console.log(`  Fingerprint:     ${record.fingerprint.slice(0, 16)}`);
  console.log(`  Completion:      ${record.agentSignaledCompletion ? 'signaled' : 'not signaled'}`);
  if (record.usage !== undefined) {
    console.log(`  Usage:           ${record.usage}`);
  }
  if (record.verification) {
    const { verification } = record;
    console.log(
      `  Verification:    ${verification.success ? 'PASSED' : 'FAILED'} (score ${verification.score.toFixed(2)}) ${verification.message}`,
    );
  }
  if (record.files) {
    console.log(
      `  Files:           ${record.files.created.length} created, ${record.files.modified.length} modified, ${record.files.deleted.length} deleted`,
    );
  }
  console.log(`  Log file:        ${getIterationLogPath(workspace, record.iteration)}`);
  console.log('');
  console.log('── Instruction ' + '─'.repeat(45));
  console.log(truncate(record.instruction, 2000));
  console.log('── Output ' + '─'.repeat(50));
  console.log(record.stdout.trimEnd() || '(no output)');
  if (record.stderr.trim()) {
    console.log('── Stderr ' + '─'.repeat(50));
    console.log(record.stderr.trimEnd());
  }
  console.log('');
}

/**
 * Execute the logs command.
 */
export async function executeLogsCommand(args: string[], context: CommandContext = {}): Promise<number> {
  let options: LogsCommandOptions;
  try {
    options = parseLogsArgs(args);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printConfigurationError(error);
      return 2;
    }
    throw error;
  }
  if (options.help) {
    printLogsHelp();
    return 0;
  }

  const workspace = resolve(context.cwd ?? process.cwd(), options.workspace);
  const records = await loadIterationRecords(workspace);

  if (options.iteration !== undefined) {
    const record = records.find((entry) => entry.iteration === options.iteration);
    if (!record) {
      console.error(`Iteration ${options.iteration} not found (${records.length} recorded).`);
      return 1;
    }
    if (options.json) {
      console.log(JSON.stringify(record, null, 2));
    } else {
      printRecordDetail(workspace, record);
    }
    return 0;
  }

  if (options.json) {
    const commits = await loadCommitRecords(workspace);
    console.log(JSON.stringify({ records, commits }, null, 2));
  } else {
    printRecordList(workspace, records);
  }
  return 0;
}

/**
 * Print logs command help.
 */
export function printLogsHelp(): void {
  console.log(`
loopbench logs - View iteration records

Usage: loopbench logs [options]

Options:
  --workspace, -w <dir>   Workspace directory (default: current directory)
  --iteration, -i <n>     Show one iteration with its instruction and output
  --json                  Output records (and commit records) as JSON
  -h, --help              Show this help message

Examples:
  loopbench logs                    # List iterations of the run here
  loopbench logs -w work/task-1 -i 2
  loopbench logs --json
`);
}
