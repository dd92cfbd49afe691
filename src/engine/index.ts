/**
 * ABOUTME: Iteration controller for one task run.
 * Drives the loop: build the instruction, invoke the agent with a bounded
 * timeout, fingerprint the workspace, verify, record the iteration and apply
 * the lifecycle rules, until the run reaches a terminal status.
 */

import { createWriteStream, type WriteStream } from 'node:fs';
import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError, LoopbenchError, errorCode, errorMessage } from '../errors.js';
import { createAgentRegistry, type AgentRegistry } from '../plugins/agents/registry.js';
import type { AgentAdapter, AgentInvocationResult } from '../plugins/agents/types.js';
import type { UsageSummary } from '../plugins/agents/usage.js';
import {
  applyRunState,
  createManifest,
  formatCommitMessage,
  loadManifest,
  saveManifest,
  selectCommitAction,
  type CommitAction,
  type Manifest,
} from '../manifest/index.js';
import {
  appendCommitRecord,
  appendIterationRecord,
  appendProgress,
  createProgressEntry,
  createStructuredLogger,
  getRecentProgressSummary,
  saveIterationLog,
  saveRunSummary,
  type StructuredLogger,
} from '../logs/index.js';
import { loadTemplate, renderInstruction } from '../templates/index.js';
import { isDirectory, isWritableDirectory } from '../utils/files.js';
import {
  diffFingerprints,
  fingerprintWorkspace,
  type FingerprintDiff,
  type WorkspaceFingerprint,
} from '../workspace/fingerprint.js';
import {
  COMMITS_FILE,
  INSTRUCTIONS_DIR,
  ITERATIONS_DIR,
  PROGRESS_FILE,
  RECORDS_FILE,
  RUN_LOG_FILE,
  SUMMARY_FILE,
  TASK_FILE,
  getControlPath,
} from '../workspace/paths.js';
import { commitRecord, isGitRepository } from './auto-commit.js';
import { detectCompletion } from './completion-strategies.js';
import { ProgressTracker } from './progress-tracker.js';
import {
  applyIteration,
  createRunState,
  fail,
  finalize,
  isTerminal,
  start,
} from './state-machine.js';
import { formatVerificationFeedback, runVerification, type VerificationResult } from './verification.js';
import type {
  IterationRecord,
  RunEvent,
  RunEventListener,
  RunState,
  RunSummary,
  TaskRun,
  TransitionLimits,
} from './types.js';

export interface IterationControllerOptions {
  /** Registry the agent adapter is created from (default: built-in adapters) */
  registry?: AgentRegistry;
  /** Use this adapter instead of creating one from the registry */
  adapter?: AgentAdapter;
  logger?: StructuredLogger;
  /** Delete the audit trail of an earlier run in the same workspace */
  fresh?: boolean;
}

/**
 * Files of a run's audit trail, relative to the control directory.
 */
const RUN_FILES = [
  RECORDS_FILE,
  COMMITS_FILE,
  SUMMARY_FILE,
  PROGRESS_FILE,
  RUN_LOG_FILE,
  ITERATIONS_DIR,
  INSTRUCTIONS_DIR,
];

const RECENT_PROGRESS_ENTRIES = 5;

/**
 * Transition limits of a task run.
 */
export function getTransitionLimits(task: TaskRun): TransitionLimits {
  return {
    maxIterations: task.maxIterations,
    totalTimeoutMs: task.totalTimeoutMs,
    stagnationLimit: task.stagnationLimit,
    maxConsecutiveErrors: task.maxConsecutiveErrors,
    verificationConfigured: task.verification !== null,
  };
}

/**
 * Opaque usage counter for one invocation: cost when reported, else tokens.
 */
export function usageValue(usage: UsageSummary | undefined): number | undefined {
  if (!usage) return undefined;
  if (usage.costUsd !== undefined) return usage.costUsd;
  const tokens = usage.inputTokens + usage.outputTokens;
  return tokens > 0 ? tokens : undefined;
}

function checkLimits(task: TaskRun): string[] {
  const problems: string[] = [];
  if (!Number.isInteger(task.maxIterations) || task.maxIterations < 1) {
    problems.push(`maxIterations must be a positive integer (got ${task.maxIterations})`);
  }
  if (!(task.totalTimeoutMs > 0)) {
    problems.push(`total timeout must be positive (got ${task.totalTimeoutMs}ms)`);
  }
  if (!(task.iterationTimeoutMs > 0)) {
    problems.push(`iteration timeout must be positive (got ${task.iterationTimeoutMs}ms)`);
  }
  if (!Number.isInteger(task.stagnationLimit) || task.stagnationLimit < 1) {
    problems.push(`stagnationLimit must be a positive integer (got ${task.stagnationLimit})`);
  }
  if (!Number.isInteger(task.maxConsecutiveErrors) || task.maxConsecutiveErrors < 1) {
    problems.push(`maxConsecutiveErrors must be a positive integer (got ${task.maxConsecutiveErrors})`);
  }
  if (!(task.graceMs >= 0)) {
    problems.push(`grace period cannot be negative (got ${task.graceMs}ms)`);
  }
  if (task.verification && !(task.verification.timeoutMs > 0)) {
    problems.push(`verification timeout must be positive (got ${task.verification.timeoutMs}ms)`);
  }
  return problems;
}

async function readTaskFile(workspace: string): Promise<string | undefined> {
  try {
    return await readFile(join(workspace, TASK_FILE), 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT' || errorCode(error) === 'EISDIR') return undefined;
    throw error;
  }
}

function closeStream(stream: WriteStream): Promise<void> {
  return new Promise((resolve) => {
    stream.end(() => resolve());
  });
}

/**
 * Runs one TaskRun to a terminal status.
 */
export class IterationController {
  private readonly task: TaskRun;
  private readonly options: IterationControllerOptions;
  private readonly logger: StructuredLogger;
  private readonly limits: TransitionLimits;
  private readonly abortController = new AbortController();
  private listeners: RunEventListener[] = [];
  private state: RunState = createRunState();
  private records: IterationRecord[] = [];
  private adapter: AgentAdapter | null = null;
  private manifest: Manifest | null = null;
  private initialFingerprint: WorkspaceFingerprint | null = null;
  private lastDiff: FingerprintDiff | null = null;
  private stopReason: string | null = null;
  private prepared = false;
  private started = false;

  constructor(task: TaskRun, options: IterationControllerOptions = {}) {
    this.task = task;
    this.options = options;
    this.logger = (options.logger ?? createStructuredLogger()).child(task.runId);
    this.limits = getTransitionLimits(task);
  }

  /**
   * Add event listener
   */
  on(listener: RunEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) {
        this.listeners.splice(index, 1);
      }
    };
  }

  private emit(event: RunEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.debug('engine', `Listener failed on ${event.type}: ${errorMessage(error)}`);
      }
    }
  }

  private timestamp(): string {
    return new Date().toISOString();
  }

  getTask(): TaskRun {
    return this.task;
  }

  getState(): RunState {
    return this.state;
  }

  getRecords(): readonly IterationRecord[] {
    return [...this.records];
  }

  getManifest(): Manifest | null {
    return this.manifest;
  }

  /**
   * Finish the current iteration, then stop. The run ends as timeout.
   */
  stop(reason = 'Run stopped by operator'): void {
    this.stopReason ??= reason;
  }

  /**
   * Stop immediately: the running agent or verification process group is
   * killed and the run ends as timeout.
   */
  abort(reason = 'Run aborted by operator'): void {
    this.stopReason ??= reason;
    if (!this.abortController.signal.aborted) {
      this.abortController.abort();
    }
  }

  get aborted(): boolean {
    return this.abortController.signal.aborted;
  }

  /**
   * Check everything that can be checked before the run starts and write the
   * pending manifest.
   * @throws ConfigurationError listing every problem found
   */
  async prepare(): Promise<void> {
    if (this.prepared) return;
    const { task } = this;
    const problems = checkLimits(task);

    const workspaceExists = await isDirectory(task.workspace);
    if (!workspaceExists) {
      problems.push(`Workspace does not exist: ${task.workspace}`);
    } else if (!(await isWritableDirectory(task.workspace))) {
      problems.push(`Workspace is not writable: ${task.workspace}`);
    }

    if (task.verification?.evalDir && !(await isDirectory(task.verification.evalDir))) {
      problems.push(`Eval directory does not exist: ${task.verification.evalDir}`);
    }

    if (task.promptTemplate) {
      const loaded = loadTemplate(task.promptTemplate, task.workspace);
      if (!loaded.success) {
        problems.push(loaded.error ?? `Cannot load template ${task.promptTemplate}`);
      }
    }

    try {
      const adapter =
        this.options.adapter ?? (await (this.options.registry ?? createAgentRegistry()).createAdapter(task.agent));
      if (this.options.adapter) {
        await adapter.initialize(task.agent);
      }
      const detected = await adapter.detect();
      if (!detected.available) {
        problems.push(detected.error ?? `Agent '${task.agentId}' is not available`);
      }
      this.adapter = adapter;
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      problems.push(...error.problems);
    }

    if (task.audit.gitCommits && workspaceExists && !(await isGitRepository(task.workspace))) {
      problems.push(`audit.gitCommits is on but ${task.workspace} is not a git repository`);
    }

    if (workspaceExists && problems.length === 0 && !this.options.fresh) {
      try {
        const existing = await loadManifest(task.workspace);
        if (existing && existing.run.status !== 'pending') {
          problems.push(
            `Workspace already holds run ${existing.run.id} (${existing.run.status}); use a fresh workspace or --fresh`,
          );
        }
      } catch (error) {
        problems.push(`Workspace holds an unreadable manifest: ${errorMessage(error)}`);
      }
    }

    if (problems.length > 0) {
      throw new ConfigurationError(problems);
    }

    await Promise.all(
      RUN_FILES.map((file) => rm(getControlPath(task.workspace, file), { recursive: true, force: true })),
    );

    this.manifest = createManifest({
      harness: {
        id: task.agentId,
        ...(task.agent.version ? { version: task.agent.version } : {}),
        ...(task.agent.vendor ? { vendor: task.agent.vendor } : {}),
        ...(task.agent.model ? { model: task.agent.model } : {}),
        config: { plugin: task.agent.plugin, transport: task.agent.transport ?? this.adapterTransport() },
      },
      task: {
        id: task.taskId,
        ...(task.taskName ? { name: task.taskName } : {}),
        ...(task.taskDomain ? { domain: task.taskDomain } : {}),
        ...(task.taskLevel !== undefined ? { level: task.taskLevel } : {}),
      },
      runId: task.runId,
      metadata: { ...this.limits, iterationTimeoutMs: task.iterationTimeoutMs },
    });
    await saveManifest(task.workspace, this.manifest);
    this.prepared = true;
  }

  private adapterTransport(): string {
    return this.adapter?.meta.defaultTransport ?? 'arg';
  }

  /**
   * Run to a terminal status. Expected outcomes (failure, timeout) resolve;
   * only configuration problems found by prepare() reject.
   */
  async run(): Promise<RunSummary> {
    await this.prepare();
    if (this.started) {
      throw new LoopbenchError(`Run ${this.task.runId} has already been started`);
    }
    this.started = true;

    const runLog = createWriteStream(getControlPath(this.task.workspace, RUN_LOG_FILE), { flags: 'a' });
    const detach = this.logger.tee(runLog);
    runLog.on('error', (error) => {
      detach();
      this.logger.warn('system', `Run log unavailable: ${errorMessage(error)}`);
    });

    try {
      this.logger.runStarted(this.task.runId, this.task.taskId, this.task.agentId, this.task.workspace);
      this.emit({
        type: 'run:started',
        timestamp: this.timestamp(),
        runId: this.task.runId,
        taskId: this.task.taskId,
        agentId: this.task.agentId,
      });

      try {
        await this.loop();
      } catch (error) {
        this.logger.error('engine', `Run failed unexpectedly: ${errorMessage(error)}`);
        await this.failInternally(error);
      }

      return await this.finish();
    } finally {
      detach();
      await closeStream(runLog);
    }
  }

  private async failInternally(error: unknown): Promise<void> {
    const now = new Date();
    let state = this.state;
    if (state.status === 'pending') {
      state = start(state, now);
    }
    if (!isTerminal(state.status)) {
      state = fail(state, `Internal error: ${errorMessage(error)}`, now);
    }
    await this.transition(state);
  }

  private deadline(): number {
    const started = this.state.startedAt ? Date.parse(this.state.startedAt) : Date.now();
    return started + this.task.totalTimeoutMs;
  }

  private async loop(): Promise<void> {
    const { task } = this;
    const exclude = { exclude: task.fingerprintExclude };
    const initial = await fingerprintWorkspace(task.workspace, exclude);
    this.initialFingerprint = initial;
    const tracker = new ProgressTracker(task.stagnationLimit);
    tracker.observe(initial);

    let feedback = '';
    let feedbackIteration = 0;

    while (!isTerminal(this.state.status)) {
      if (this.stopReason !== null) break;

      const iteration = this.state.iteration + 1;
      const startedAt = new Date();
      if (this.state.status === 'pending') {
        await this.transition(start(this.state, startedAt));
        await this.writeCommitRecord('start', `${task.taskId} with ${task.agentId}`, 0);
      }

      const remainingMs = this.deadline() - startedAt.getTime();
      if (remainingMs <= 0) break;

      const instruction = await this.buildInstruction(iteration, remainingMs, feedback, feedbackIteration);
      const timeoutMs = Math.max(1, Math.min(task.iterationTimeoutMs, remainingMs));

      this.logger.iterationStarted(iteration, task.maxIterations, timeoutMs);
      this.emit({
        type: 'iteration:started',
        timestamp: this.timestamp(),
        runId: task.runId,
        iteration,
        timeoutMs,
      });

      const result = await this.invokeAgent(instruction, iteration, timeoutMs);

      const current = await fingerprintWorkspace(task.workspace, exclude);
      const progress = tracker.observe(current);
      const diff = diffFingerprints(initial, current);
      this.lastDiff = diff;
      this.logger.iterationFinished(iteration, result.classification, result.durationMs, progress);
      if (progress === 'stagnant') {
        this.logger.stagnationDetected(iteration, task.stagnationLimit);
        this.emit({ type: 'progress:stagnant', timestamp: this.timestamp(), runId: task.runId, iteration });
      }

      const verification = await this.verify(iteration);
      const completion = detectCompletion(result, task.completionStrategies);
      const usage = usageValue(result.usage);

      const record: IterationRecord = Object.freeze({
        iteration,
        instruction,
        stdout: result.stdout,
        stderr: result.stderr,
        durationMs: result.durationMs,
        classification: result.classification,
        exitCode: result.exitCode,
        fingerprint: current.digest,
        progress,
        ...(verification ? { verification } : {}),
        agentSignaledCompletion: completion.completed,
        ...(usage !== undefined ? { usage } : {}),
        files: { created: diff.created, modified: diff.modified, deleted: diff.deleted },
        startedAt: startedAt.toISOString(),
        endedAt: new Date().toISOString(),
      });

      const previous = this.records[this.records.length - 1];
      this.records.push(record);
      await this.persistRecord(record);
      await this.transition(applyIteration(this.state, record, this.limits));
      await this.writeCommitRecord(
        selectCommitAction(record, previous, this.state.status),
        this.describeIteration(record),
        iteration,
        this.describeFiles(diff),
      );

      this.emit({ type: 'iteration:completed', timestamp: this.timestamp(), runId: task.runId, record });

      feedback = verification ? formatVerificationFeedback(verification) : '';
      feedbackIteration = iteration;
    }
  }

  private async buildInstruction(
    iteration: number,
    remainingMs: number,
    feedback: string,
    feedbackIteration: number,
  ): Promise<string> {
    const { task } = this;
    const rendered = renderInstruction(
      {
        taskId: task.taskId,
        ...(task.taskName ? { taskName: task.taskName } : {}),
        instructions: task.instructions,
        taskMd: await readTaskFile(task.workspace),
        iteration,
        maxIterations: task.maxIterations,
        remainingMs,
        feedback,
        previousIteration: feedbackIteration,
        recentProgress: await getRecentProgressSummary(task.workspace, RECENT_PROGRESS_ENTRIES),
        agentName: task.agentId,
        ...(task.agent.model ? { model: task.agent.model } : {}),
        workspace: task.workspace,
      },
      task.promptTemplate,
    );
    if (!rendered.success || rendered.instruction === undefined) {
      throw new LoopbenchError(rendered.error ?? `Cannot render instruction from ${rendered.source}`);
    }
    return rendered.instruction;
  }

  private async invokeAgent(
    instruction: string,
    iteration: number,
    timeoutMs: number,
  ): Promise<AgentInvocationResult> {
    const adapter = this.adapter;
    if (!adapter) {
      throw new LoopbenchError('Agent adapter is not initialized');
    }
    const { runId } = this.task;
    return adapter.invoke(instruction, {
      cwd: this.task.workspace,
      iteration,
      timeoutMs,
      graceMs: this.task.graceMs,
      signal: this.abortController.signal,
      onStdout: (data) => {
        this.logger.agentOutput(data);
        this.emit({ type: 'agent:output', timestamp: this.timestamp(), runId, iteration, stream: 'stdout', data });
      },
      onStderr: (data) => {
        this.logger.agentError(data);
        this.emit({ type: 'agent:output', timestamp: this.timestamp(), runId, iteration, stream: 'stderr', data });
      },
    });
  }

  private async verify(iteration: number): Promise<VerificationResult | undefined> {
    const config = this.task.verification;
    if (!config || this.aborted) return undefined;

    const result = await runVerification(this.task.workspace, config, {
      timeoutMs: config.timeoutMs,
      graceMs: this.task.graceMs,
      signal: this.abortController.signal,
    });
    this.logger.verificationResult(iteration, result.success, result.score, result.message);
    this.emit({
      type: 'verification:completed',
      timestamp: this.timestamp(),
      runId: this.task.runId,
      iteration,
      result,
    });
    return result;
  }

  private async persistRecord(record: IterationRecord): Promise<void> {
    const { task } = this;
    await appendIterationRecord(task.workspace, record);
    if (task.audit.iterationLogs) {
      await saveIterationLog(
        task.workspace,
        { runId: task.runId, taskId: task.taskId, agentId: task.agentId },
        record,
      );
    }
    await appendProgress(task.workspace, createProgressEntry(task.taskId, record));
  }

  /**
   * Replace the run state; a status change is emitted and written to the manifest.
   */
  private async transition(next: RunState): Promise<void> {
    const previous = this.state;
    this.state = next;
    if (previous.status === next.status) return;

    this.logger.debug('engine', `Run ${previous.status} -> ${next.status}${next.reason ? `: ${next.reason}` : ''}`);
    this.emit({
      type: 'run:transition',
      timestamp: this.timestamp(),
      runId: this.task.runId,
      from: previous.status,
      to: next.status,
      reason: next.reason,
    });
    if (this.manifest) {
      this.manifest = applyRunState(this.manifest, next);
      await saveManifest(this.task.workspace, this.manifest);
    }
  }

  private describeIteration(record: IterationRecord): string {
    if (isTerminal(this.state.status) && this.state.reason) {
      return this.state.reason;
    }
    const parts = [`iteration ${record.iteration} ${record.classification}`, `workspace ${record.progress}`];
    if (record.verification) {
      parts.push(`verification score ${record.verification.score.toFixed(2)}`);
    }
    return parts.join(', ');
  }

  private describeFiles(diff: FingerprintDiff): string | undefined {
    const lines = [
      ...diff.created.map((path) => `A ${path}`),
      ...diff.modified.map((path) => `M ${path}`),
      ...diff.deleted.map((path) => `D ${path}`),
    ];
    if (lines.length === 0) return undefined;
    return lines.length > 50 ? [...lines.slice(0, 50), `... and ${lines.length - 50} more`].join('\n') : lines.join('\n');
  }

  private async writeCommitRecord(
    action: CommitAction,
    description: string,
    iteration: number,
    body?: string,
  ): Promise<void> {
    const message = formatCommitMessage({
      action,
      description,
      harness: this.task.agentId,
      iteration,
      ...(body ? { body } : {}),
    });

    let sha: string | undefined;
    if (this.task.audit.gitCommits) {
      const committed = await commitRecord(this.task.workspace, message);
      if (committed.error) {
        this.logger.warn('manifest', `Git commit for iteration ${iteration} skipped: ${committed.error}`);
      }
      sha = committed.commitSha;
    }

    await appendCommitRecord(this.task.workspace, {
      at: this.timestamp(),
      message,
      ...(sha ? { sha } : {}),
    });
  }

  private async finish(): Promise<RunSummary> {
    const last = this.records[this.records.length - 1];
    const at = last ? new Date(last.endedAt) : new Date();

    let state = this.state;
    if (state.status === 'pending') {
      state = start(state, at);
    }
    const reason =
      this.stopReason ??
      (Date.now() >= this.deadline()
        ? `Time budget of ${this.task.totalTimeoutMs / 1000}s exhausted`
        : undefined);
    await this.transition(finalize(state, at, reason));

    const summary = this.buildSummary();
    await saveRunSummary(this.task.workspace, summary);
    this.logger.runFinished(summary.runId, summary.status, summary.reason, summary.iterations, summary.elapsedMs);
    this.emit({ type: 'run:finished', timestamp: this.timestamp(), runId: this.task.runId, summary });
    return summary;
  }

  private buildSummary(): RunSummary {
    const { task, state, records } = this;
    const startedMs = state.startedAt ? Date.parse(state.startedAt) : 0;
    const completedMs = state.completedAt ? Date.parse(state.completedAt) : startedMs;
    const lastVerified = [...records].reverse().find((record) => record.verification !== undefined);
    const diff = this.lastDiff ?? {
      created: [],
      modified: [],
      deleted: [],
      unchanged: Object.keys(this.initialFingerprint?.files ?? {}),
    };

    return {
      taskId: task.taskId,
      agentId: task.agentId,
      runId: task.runId,
      ...(task.agent.model ? { model: task.agent.model } : {}),
      status: state.status,
      reason: state.reason,
      success: state.status === 'completed',
      startedAt: state.startedAt,
      completedAt: state.completedAt,
      elapsedMs: Math.max(0, completedMs - startedMs),
      iterations: state.iteration,
      usage: state.usage,
      score: lastVerified?.verification?.score ?? null,
      files: diff,
      iterationSummaries: records.map((record) => ({
        iteration: record.iteration,
        classification: record.classification,
        durationMs: record.durationMs,
        progress: record.progress,
        ...(record.verification
          ? { verificationSuccess: record.verification.success, verificationScore: record.verification.score }
          : {}),
        filesCreated: record.files?.created.length ?? 0,
        filesModified: record.files?.modified.length ?? 0,
      })),
      conversation: records.map((record) => ({
        iteration: record.iteration,
        instruction: record.instruction,
        stdout: record.stdout,
        stderr: record.stderr,
      })),
      config: {
        maxIterations: task.maxIterations,
        totalTimeoutMs: task.totalTimeoutMs,
        iterationTimeoutMs: task.iterationTimeoutMs,
        stagnationLimit: task.stagnationLimit,
        verification: task.verification !== null,
      },
    };
  }
}

export { replayRun, type ReplayResult } from './replay.js';
export type {
  IterationRecord,
  RunEvent,
  RunEventListener,
  RunState,
  RunStatus,
  RunSummary,
  TaskRun,
  TerminalStatus,
  TransitionLimits,
} from './types.js';
