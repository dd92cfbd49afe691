/**
 * ABOUTME: Type definitions for agent adapters.
 * An adapter turns one instruction into one bounded agent invocation; every
 * agent variant is an implementation of the same AgentAdapter interface.
 */

import type { ExitClassification } from '../../utils/process.js';
import type { UsageSummary } from './usage.js';

/**
 * How the instruction reaches the agent process.
 * - arg: substituted into the arguments ({instruction} placeholder, or appended)
 * - stdin: written to standard input, then closed
 * - file: written to a file whose path is substituted via {instructionFile}
 */
export type InstructionTransport = 'arg' | 'stdin' | 'file';

/**
 * Adapter configuration as it appears in config files.
 */
export interface AgentAdapterConfig {
  /** Name the agent is selected by; becomes the harness id */
  name: string;
  /** Adapter implementation id in the registry */
  plugin: string;
  /** Executable; adapters supply a default */
  command?: string;
  /** Argument template; may contain {instruction}, {instructionFile}, {workspace}, {model} */
  args?: string[];
  transport?: InstructionTransport;
  /** Extra environment for the agent process */
  env?: Record<string, string>;
  /** Variables removed from the inherited environment (exact names or globs) */
  envExclude?: string[];
  model?: string;
  vendor?: string;
  version?: string;
  /** Adapter-specific settings */
  options?: Record<string, unknown>;
}

export interface AgentAdapterMeta {
  /** Registry id, e.g. 'command' */
  id: string;
  name: string;
  description: string;
  /** Command used when the config names none */
  defaultCommand?: string;
  defaultTransport: InstructionTransport;
}

/**
 * Result of detecting whether the agent executable is available.
 */
export interface AgentDetectResult {
  /** Whether the agent CLI is available */
  available: boolean;
  /** Path to the agent executable if found */
  executablePath?: string;
  /** Error message if detection failed */
  error?: string;
}

/**
 * Per-invocation options supplied by the controller.
 */
export interface AgentInvokeOptions {
  /** Workspace directory the agent runs in */
  cwd: string;
  /** 1-based iteration index */
  iteration: number;
  timeoutMs: number;
  graceMs: number;
  signal?: AbortSignal;
  onStdout?: (data: string) => void;
  onStderr?: (data: string) => void;
}

export interface AgentInvocationResult {
  classification: ExitClassification;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  interrupted: boolean;
  /** Cost reported in the agent's output, when it reports one */
  usage?: UsageSummary;
}

/**
 * One agent variant.
 */
export interface AgentAdapter {
  readonly meta: AgentAdapterMeta;

  /** Apply configuration. Called once before any other method. */
  initialize(config: AgentAdapterConfig): Promise<void>;

  /** Locate the executable without running it. */
  detect(): Promise<AgentDetectResult>;

  /** Run the agent once with the given instruction. Never rejects. */
  invoke(instruction: string, options: AgentInvokeOptions): Promise<AgentInvocationResult>;
}

export type AgentAdapterFactory = () => AgentAdapter;
