/**
 * ABOUTME: Type definitions for audit trail persistence.
 */

/**
 * Run-level fields printed at the top of each iteration log file.
 */
export interface IterationLogHeader {
  runId: string;
  taskId: string;
  agentId: string;
}

/**
 * One entry of .loopbench/commits.log.
 */
export interface CommitRecord {
  /** ISO 8601 timestamp when the record was written */
  at: string;

  /** Full protocol commit message (see formatCommitMessage) */
  message: string;

  /** Git commit hash, when the record was also committed */
  sha?: string;
}
