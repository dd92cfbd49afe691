#!/usr/bin/env node
/**
 * ABOUTME: CLI entry point for loopbench.
 * Dispatches subcommands; each command resolves to the process exit code.
 */

import {
  executeAgentsCommand,
  executeBatchCommand,
  executeConfigCommand,
  executeLogsCommand,
  executeReplayCommand,
  executeRunCommand,
  executeStatusCommand,
  executeVerifyCommand,
} from './commands/index.js';
import { LoopbenchError, errorMessage } from './errors.js';
import { VERSION } from './version.js';

/**
 * Show CLI help message.
 */
function showHelp(): void {
  console.log(`
loopbench - Iteration engine for benchmarking AI coding agents

Usage: loopbench <command> [options]

Commands:
  run [options]         Run one task against one agent
  batch <plan.toml>     Run a plan of task runs concurrently
  status [options]      Show the run recorded in a workspace (exit codes for CI)
  logs [options]        List iteration records or show one iteration
  replay [options]      Recompute a run's outcome from its audit trail
  verify [options]      Run verification once against a workspace
  agents                List agent plugins and configured agents
  config show           Display merged configuration
  help, --help, -h      Show this help message
  version, --version, -v  Show version number

Run '<command> --help' for the options of a command.

Examples:
  loopbench run --task fizzbuzz --agent claude -w ./work --verify "npm test"
  loopbench run --prompt "Make the tests pass" --iterations 5 --timeout 900
  loopbench batch plan.toml --workers 4
  loopbench status -w ./work --json
  loopbench logs -w ./work --iteration 2
  loopbench replay -w ./work
  loopbench verify -w ./work --command "npm test"
`);
}

type CommandHandler = (args: string[]) => Promise<number>;

const COMMANDS: Readonly<Record<string, CommandHandler>> = {
  run: (args) => executeRunCommand(args),
  batch: (args) => executeBatchCommand(args),
  status: (args) => executeStatusCommand(args),
  logs: (args) => executeLogsCommand(args),
  replay: (args) => executeReplayCommand(args),
  verify: (args) => executeVerifyCommand(args),
  agents: (args) => executeAgentsCommand(args),
  config: (args) => executeConfigCommand(args),
};

/**
 * Dispatch a command line.
 * @returns exit code
 */
async function main(args: string[]): Promise<number> {
  const command = args[0];

  if (command === 'version' || command === '--version' || command === '-v') {
    console.log(`loopbench ${VERSION}`);
    return 0;
  }

  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    showHelp();
    return 0;
  }

  const handler = Object.hasOwn(COMMANDS, command) ? COMMANDS[command] : undefined;
  if (!handler) {
    console.error(`Unknown command: ${command}`);
    showHelp();
    return 2;
  }
  return handler(args.slice(1));
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error instanceof LoopbenchError ? errorMessage(error) : error);
    process.exitCode = 1;
  });
