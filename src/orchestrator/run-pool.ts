/**
 * ABOUTME: Pool that runs many task runs concurrently.
 * Each run gets its own IterationController and workspace; at most maxWorkers
 * run at once. A run that fails, or cannot start, yields a result instead of
 * rejecting, so one run never breaks another.
 */

import { EventEmitter } from 'node:events';
import { resolve } from 'node:path';
import { ConfigurationError, errorMessage } from '../errors.js';
import { IterationController, type IterationControllerOptions } from '../engine/index.js';
import { createStructuredLogger, type StructuredLogger } from '../logs/index.js';
import type { RunSummary, TaskRun } from '../engine/types.js';
import type { PoolEvent, PoolRunResult } from './types.js';

export interface RunPoolOptions {
  /** Runs in flight at once (default 1) */
  maxWorkers?: number;
  logger?: StructuredLogger;
  /** Options handed to every controller */
  controller?: Omit<IterationControllerOptions, 'logger'>;
  /** Build the controller for a run (tests substitute scripted adapters here) */
  createController?: (task: TaskRun, options: IterationControllerOptions) => IterationController;
}

export class RunPool extends EventEmitter {
  private readonly maxWorkers: number;
  private readonly logger: StructuredLogger;
  private readonly options: RunPoolOptions;
  private readonly active = new Map<string, IterationController>();
  private abortReason: string | null = null;

  constructor(options: RunPoolOptions = {}) {
    super();
    this.options = options;
    this.maxWorkers = Math.max(1, Math.floor(options.maxWorkers ?? 1));
    this.logger = options.logger ?? createStructuredLogger();
  }

  private emitEvent(event: PoolEvent): void {
    super.emit(event.type, event);
    super.emit('event', event);
  }

  get activeCount(): number {
    return this.active.size;
  }

  /**
   * Abort every in-flight run and skip the ones not yet started.
   */
  abortAll(reason = 'Run aborted by operator'): void {
    this.abortReason ??= reason;
    for (const controller of this.active.values()) {
      controller.abort(reason);
    }
  }

  /**
   * Run every task. Results come back in input order.
   */
  async runAll(tasks: readonly TaskRun[]): Promise<PoolRunResult[]> {
    const results: PoolRunResult[] = new Array(tasks.length);
    const queue: number[] = [];
    const claimed = new Map<string, string>();

    tasks.forEach((task, index) => {
      const workspace = resolve(task.workspace);
      const owner = claimed.get(workspace);
      if (owner !== undefined) {
        const error = `Workspace ${workspace} is already used by run ${owner}`;
        results[index] = { taskId: task.taskId, runId: task.runId, workspace, summary: null, error };
        this.logger.warn('pool', `Rejected run ${task.runId}: ${error}`);
        this.emitEvent({ type: 'run:rejected', runId: task.runId, taskId: task.taskId, error });
        return;
      }
      claimed.set(workspace, task.runId);
      queue.push(index);
      this.emitEvent({ type: 'run:queued', runId: task.runId, taskId: task.taskId });
    });

    const worker = async (): Promise<void> => {
      for (let index = queue.shift(); index !== undefined; index = queue.shift()) {
        const task = tasks[index];
        if (task) {
          results[index] = await this.runOne(task);
        }
      }
    };

    const workers = Array.from({ length: Math.min(this.maxWorkers, queue.length) }, () => worker());
    await Promise.all(workers);
    return results;
  }

  private async runOne(task: TaskRun): Promise<PoolRunResult> {
    const base = { taskId: task.taskId, runId: task.runId, workspace: resolve(task.workspace) };
    if (this.abortReason !== null) {
      const error = `Skipped: ${this.abortReason}`;
      this.emitEvent({ type: 'run:rejected', runId: task.runId, taskId: task.taskId, error });
      return { ...base, summary: null, error };
    }

    const controllerOptions: IterationControllerOptions = { ...this.options.controller, logger: this.logger };
    const controller = this.options.createController
      ? this.options.createController(task, controllerOptions)
      : new IterationController(task, controllerOptions);

    this.active.set(task.runId, controller);
    this.emitEvent({ type: 'run:started', runId: task.runId, taskId: task.taskId });
    this.logger.info('pool', `Started run ${task.runId} (${this.active.size}/${this.maxWorkers} active)`);

    let summary: RunSummary | null = null;
    let error: string | undefined;
    try {
      summary = await controller.run();
    } catch (err) {
      error = err instanceof ConfigurationError ? err.problems.join('; ') : errorMessage(err);
      this.logger.error('pool', `Run ${task.runId} could not run: ${error}`);
    } finally {
      this.active.delete(task.runId);
    }

    this.emitEvent({
      type: 'run:finished',
      runId: task.runId,
      taskId: task.taskId,
      status: summary?.status ?? null,
      ...(error !== undefined ? { error } : {}),
    });
    return error !== undefined ? { ...base, summary, error } : { ...base, summary };
  }
}
