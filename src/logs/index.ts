/**
 * ABOUTME: Audit trail and logging module exports.
 */

export type { IterationLogHeader, CommitRecord } from './types.js';

export type { RunSummaryHead } from './persistence.js';

export {
  appendCommitRecord,
  appendIterationRecord,
  generateLogFilename,
  getCommitsPath,
  getIterationLogPath,
  getIterationsDir,
  getRecordsPath,
  getSummaryPath,
  loadCommitRecords,
  loadIterationLogOutput,
  loadIterationRecords,
  loadRunSummary,
  saveIterationLog,
  saveRunSummary,
} from './persistence.js';

export type { LogLevel, LogComponent, StructuredLoggerConfig } from './structured-logger.js';

export { StructuredLogger, createStructuredLogger, isLogLevel } from './structured-logger.js';

export type { ProgressEntry } from './progress.js';

export {
  MAX_PROGRESS_ENTRIES,
  appendProgress,
  countProgressEntries,
  createProgressEntry,
  getRecentProgressSummary,
  readProgress,
} from './progress.js';
