/**
 * ABOUTME: Type definitions for the iteration engine.
 * Covers the frozen task run, the run state, iteration records, the terminal
 * run summary and the events the controller emits.
 */

import type { AgentAdapterConfig } from '../plugins/agents/types.js';
import type { ExitClassification } from '../utils/process.js';
import type { ProgressSignal } from './progress-tracker.js';
import type { VerificationResult, ResolvedVerificationConfig } from './verification.js';
import type { CompletionStrategyName } from './completion-strategies.js';

/**
 * Lifecycle status of a task run.
 */
export type RunStatus = 'pending' | 'in_progress' | 'completed' | 'failed' | 'timeout';

export type TerminalStatus = Extract<RunStatus, 'completed' | 'failed' | 'timeout'>;

/**
 * Audit trail switches.
 */
export interface AuditSettings {
  /** Also create a git commit per record (workspace must be a repository) */
  gitCommits: boolean;
  /** Write the human-readable iteration-NNN.log files */
  iterationLogs: boolean;
}

/**
 * Everything one run needs, fixed before it starts.
 */
export interface TaskRun {
  readonly taskId: string;
  readonly taskName?: string;
  readonly taskDomain?: string;
  readonly taskLevel?: number;
  readonly agentId: string;
  readonly runId: string;
  /** Absolute path to the workspace directory */
  readonly workspace: string;
  /** Task prompt given to the agent every iteration */
  readonly instructions: string;
  readonly maxIterations: number;
  readonly totalTimeoutMs: number;
  readonly iterationTimeoutMs: number;
  readonly stagnationLimit: number;
  readonly maxConsecutiveErrors: number;
  readonly graceMs: number;
  readonly verification: ResolvedVerificationConfig | null;
  readonly completionStrategies: readonly CompletionStrategyName[];
  readonly fingerprintExclude: readonly string[];
  readonly audit: Readonly<AuditSettings>;
  /** Path to a custom Handlebars instruction template */
  readonly promptTemplate?: string;
  readonly agent: Readonly<AgentAdapterConfig>;
}

/**
 * Mutable-by-replacement state of one run. Owned by its controller.
 */
export interface RunState {
  readonly status: RunStatus;
  /** ISO timestamp set when the run enters in_progress */
  readonly startedAt: string | null;
  /** ISO timestamp set iff the status is terminal */
  readonly completedAt: string | null;
  /** Number of iterations applied so far */
  readonly iteration: number;
  /** Accumulated usage reported by the agent (cost units) */
  readonly usage: number;
  /** Human-readable reason for the terminal status */
  readonly reason: string | null;
  /** Launch failures in a row, reset by any launched iteration */
  readonly consecutiveErrors: number;
}

/**
 * Limits the transition rules consult.
 */
export interface TransitionLimits {
  maxIterations: number;
  totalTimeoutMs: number;
  stagnationLimit: number;
  maxConsecutiveErrors: number;
  verificationConfigured: boolean;
}

/**
 * Files changed relative to the workspace as it was before iteration 1.
 */
export interface FileProvenance {
  created: string[];
  modified: string[];
  deleted: string[];
}

/**
 * One agent invocation and what followed it. Frozen after creation.
 */
export interface IterationRecord {
  /** 1-based, strictly increasing */
  readonly iteration: number;
  readonly instruction: string;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationMs: number;
  readonly classification: ExitClassification;
  readonly exitCode: number | null;
  readonly fingerprint: string;
  readonly progress: ProgressSignal;
  readonly verification?: VerificationResult;
  /** Agent output matched a completion strategy */
  readonly agentSignaledCompletion: boolean;
  readonly usage?: number;
  readonly files?: FileProvenance;
  readonly startedAt: string;
  readonly endedAt: string;
}

/**
 * Compact per-iteration line of the run summary.
 */
export interface IterationSummaryEntry {
  iteration: number;
  classification: ExitClassification;
  durationMs: number;
  progress: ProgressSignal;
  verificationSuccess?: boolean;
  verificationScore?: number;
  filesCreated: number;
  filesModified: number;
}

/**
 * Instruction and output of one iteration, as kept in the run summary.
 */
export interface ConversationTurn {
  iteration: number;
  instruction: string;
  stdout: string;
  stderr: string;
}

/**
 * Terminal record of a run, written to summary.json.
 */
export interface RunSummary {
  taskId: string;
  agentId: string;
  runId: string;
  model?: string;
  status: RunStatus;
  reason: string | null;
  success: boolean;
  startedAt: string | null;
  completedAt: string | null;
  elapsedMs: number;
  iterations: number;
  usage: number;
  /** Score of the last verification, if any ran */
  score: number | null;
  /** Files created or modified over the whole run */
  files: FileProvenance & { unchanged: string[] };
  iterationSummaries: IterationSummaryEntry[];
  conversation: ConversationTurn[];
  config: {
    maxIterations: number;
    totalTimeoutMs: number;
    iterationTimeoutMs: number;
    stagnationLimit: number;
    verification: boolean;
  };
}

/**
 * Event types emitted by the controller.
 */
export type RunEventType =
  | 'run:started'
  | 'iteration:started'
  | 'agent:output'
  | 'verification:completed'
  | 'progress:stagnant'
  | 'iteration:completed'
  | 'run:transition'
  | 'run:finished';

export interface RunEventBase {
  type: RunEventType;
  /** Timestamp of the event (ISO 8601) */
  timestamp: string;
  runId: string;
}

export interface RunStartedEvent extends RunEventBase {
  type: 'run:started';
  taskId: string;
  agentId: string;
}

export interface IterationStartedEvent extends RunEventBase {
  type: 'iteration:started';
  iteration: number;
  timeoutMs: number;
}

export interface AgentOutputEvent extends RunEventBase {
  type: 'agent:output';
  iteration: number;
  stream: 'stdout' | 'stderr';
  data: string;
}

export interface VerificationCompletedEvent extends RunEventBase {
  type: 'verification:completed';
  iteration: number;
  result: VerificationResult;
}

export interface ProgressStagnantEvent extends RunEventBase {
  type: 'progress:stagnant';
  iteration: number;
}

export interface IterationCompletedEvent extends RunEventBase {
  type: 'iteration:completed';
  record: IterationRecord;
}

export interface RunTransitionEvent extends RunEventBase {
  type: 'run:transition';
  from: RunStatus;
  to: RunStatus;
  reason: string | null;
}

export interface RunFinishedEvent extends RunEventBase {
  type: 'run:finished';
  summary: RunSummary;
}

export type RunEvent =
  | RunStartedEvent
  | IterationStartedEvent
  | AgentOutputEvent
  | VerificationCompletedEvent
  | ProgressStagnantEvent
  | IterationCompletedEvent
  | RunTransitionEvent
  | RunFinishedEvent;

export type RunEventListener = (event: RunEvent) => void;
