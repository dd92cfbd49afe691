/**
 * ABOUTME: Replay command for loopbench.
 * Recomputes a run's terminal state from its iteration records and reports
 * whether it agrees with the manifest.
 */

import { resolve } from 'node:path';
import { ConfigurationError, LoopbenchError, errorMessage } from '../errors.js';
import { replayRun, type ReplayResult } from '../engine/index.js';
import { printConfigurationError, readFlagValue } from './args.js';
import type { CommandContext } from './run.js';

export interface ReplayCommandOptions {
  workspace: string;
  json: boolean;
  help: boolean;
}

export function parseReplayArgs(args: string[]): ReplayCommandOptions {
  const options: ReplayCommandOptions = { workspace: '.', json: false, help: false };
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
        throw new ConfigurationError(`Unknown option for replay: ${arg}`);
    }
  }
  return options;
}

function printReplay(result: ReplayResult): void {
  const { state, manifest } = result;
  console.log('');
  console.log(`Replay of run ${manifest.run.id} (${result.records.length} record(s))`);
  console.log('─'.repeat(60));
  console.log(`  Recorded:   ${manifest.run.status}`);
  console.log(`  Replayed:   ${state.status}${state.reason ? ` (${state.reason})` : ''}`);
  console.log(`  Iterations: ${state.iteration}`);
  console.log(`  Usage:      ${state.usage}`);
  console.log('─'.repeat(60));
  if (result.matches) {
    console.log('  ✓ Audit trail matches the manifest');
  } else {
    console.log('  ✗ Audit trail disagrees with the manifest:');
    for (const difference of result.differences) {
      console.log(`    - ${difference}`);
    }
  }
  console.log('');
}

/**
 * Execute the replay command.
 * @returns 0 when the replayed state matches, 1 when it differs, 2 when there is nothing to replay
 */
export async function executeReplayCommand(args: string[], context: CommandContext = {}): Promise<number> {
  let options: ReplayCommandOptions;
  try {
    options = parseReplayArgs(args);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printConfigurationError(error);
      return 2;
    }
    throw error;
  }
  if (options.help) {
    printReplayHelp();
    return 0;
  }

  let result: ReplayResult;
  try {
    result = await replayRun(resolve(context.cwd ?? process.cwd(), options.workspace));
  } catch (error) {
    if (!(error instanceof LoopbenchError)) throw error;
    console.error(`Cannot replay: ${errorMessage(error)}`);
    return 2;
  }

  if (options.json) {
    console.log(
      JSON.stringify(
        { runId: result.manifest.run.id, state: result.state, matches: result.matches, differences: result.differences },
        null,
        2,
      ),
    );
  } else {
    printReplay(result);
  }
  return result.matches ? 0 : 1;
}

export function printReplayHelp(): void {
  console.log(`
loopbench replay - Recompute a run's outcome from its audit trail

Usage: loopbench replay [options]

Options:
  --workspace, -w <dir>   Workspace directory (default: current directory)
  --json                  Output the replayed state as JSON
  -h, --help              Show this help message

Exit codes:
  0   Replayed state matches the manifest
  1   Replayed state differs
  2   No run or unreadable audit trail
`);
}
