/**
 * ABOUTME: Scripted agent adapter for controller and pool tests.
 * Each invocation plays the next step: optionally edits the workspace, then
 * returns the scripted output without starting a process.
 */

import type {
  AgentAdapter,
  AgentAdapterConfig,
  AgentAdapterMeta,
  AgentDetectResult,
  AgentInvocationResult,
  AgentInvokeOptions,
} from '../../src/plugins/agents/types.js';
import type { UsageSummary } from '../../src/plugins/agents/usage.js';
import type { ExitClassification } from '../../src/utils/process.js';

export interface ScriptedStep {
  stdout?: string;
  stderr?: string;
  exitCode?: number | null;
  classification?: ExitClassification;
  usage?: UsageSummary;
  /** Edit the workspace before the invocation returns */
  act?: (cwd: string, iteration: number) => Promise<void> | void;
  /** After `act`, wait until the invocation's timeout elapses (or the run is aborted) and report a timeout */
  hang?: boolean;
}

export interface RecordedInvocation {
  instruction: string;
  iteration: number;
  timeoutMs: number;
}

export class ScriptedAgentAdapter implements AgentAdapter {
  readonly meta: AgentAdapterMeta = {
    id: 'scripted',
    name: 'Scripted',
    description: 'Plays back scripted steps',
    defaultTransport: 'arg',
  };

  readonly invocations: RecordedInvocation[] = [];
  config: AgentAdapterConfig | null = null;
  private readonly steps: readonly ScriptedStep[];
  private readonly available: boolean;

  /**
   * @param steps Steps played in order; the last one repeats once they run out
   */
  constructor(steps: readonly ScriptedStep[], { available = true } = {}) {
    this.steps = steps;
    this.available = available;
  }

  async initialize(config: AgentAdapterConfig): Promise<void> {
    this.config = config;
  }

  async detect(): Promise<AgentDetectResult> {
    return this.available ? { available: true } : { available: false, error: 'scripted agent unavailable' };
  }

  async invoke(instruction: string, options: AgentInvokeOptions): Promise<AgentInvocationResult> {
    this.invocations.push({ instruction, iteration: options.iteration, timeoutMs: options.timeoutMs });
    const step = this.steps[Math.min(options.iteration, this.steps.length) - 1] ?? {};
    const startedAt = Date.now();

    await step.act?.(options.cwd, options.iteration);
    if (step.hang) {
      const interrupted = await waitForTimeoutOrAbort(options.timeoutMs, options.signal);
      return {
        classification: interrupted ? 'error:interrupted' : 'timeout',
        exitCode: null,
        stdout: step.stdout ?? '',
        stderr: '',
        durationMs: Date.now() - startedAt,
        interrupted,
      };
    }

    if (step.stdout) options.onStdout?.(step.stdout);
    if (step.stderr) options.onStderr?.(step.stderr);

    const exitCode = step.exitCode === undefined ? 0 : step.exitCode;
    return {
      classification: step.classification ?? (exitCode === 0 ? 'completed' : 'nonzero_exit'),
      exitCode,
      stdout: step.stdout ?? '',
      stderr: step.stderr ?? '',
      durationMs: Date.now() - startedAt,
      interrupted: false,
      ...(step.usage ? { usage: step.usage } : {}),
    };
  }
}

function waitForTimeoutOrAbort(timeoutMs: number, signal: AbortSignal | undefined): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(true);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(false);
    }, timeoutMs);
    function onAbort(): void {
      clearTimeout(timer);
      resolve(true);
    }
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
