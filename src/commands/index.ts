/**
 * ABOUTME: Commands module for loopbench CLI commands.
 * Exports all CLI command handlers; each resolves to a process exit code.
 */

export type { CommandContext, RunCommandOptions } from './run.js';

export {
  executeRunCommand,
  parseRunArgs,
  buildRunOverrides,
  printRunHelp,
  printRunSummary,
  TASK_FILE_INSTRUCTIONS,
} from './run.js';

export {
  executeBatchCommand,
  parseBatchArgs,
  buildBatchTasks,
  printBatchHelp,
} from './batch.js';

export {
  executeStatusCommand,
  parseStatusArgs,
  buildStatusOutput,
  getStatusExitCode,
  printStatusHelp,
} from './status.js';

export {
  executeLogsCommand,
  parseLogsArgs,
  printLogsHelp,
} from './logs.js';

export {
  executeReplayCommand,
  parseReplayArgs,
  printReplayHelp,
} from './replay.js';

export {
  executeVerifyCommand,
  parseVerifyArgs,
  resolveVerifyConfig,
  printVerifyHelp,
} from './verify.js';

export {
  executeConfigCommand,
  executeConfigShowCommand,
  printConfigHelp,
} from './config.js';

export {
  executeAgentsCommand,
  formatAgentList,
} from './agents.js';
