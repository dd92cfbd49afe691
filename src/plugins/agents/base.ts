/**
 * ABOUTME: Abstract base class for agent adapters.
 * Resolves the executable, prepares the environment, delivers the instruction
 * through the configured transport and runs the agent through the process
 * runner's bounded, group-killing path.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { runProcess, findCommandPath, parseCommand } from '../../utils/process.js';
import { globMatch } from '../../utils/files.js';
import { errorMessage } from '../../errors.js';
import { getControlPath, INSTRUCTIONS_DIR } from '../../workspace/paths.js';
import { extractUsage } from './usage.js';
import type {
  AgentAdapter,
  AgentAdapterConfig,
  AgentAdapterMeta,
  AgentDetectResult,
  AgentInvocationResult,
  AgentInvokeOptions,
  InstructionTransport,
} from './types.js';

/**
 * Values substituted into argument templates.
 */
export interface ArgContext {
  instruction: string;
  instructionFile?: string;
  workspace: string;
  model?: string;
  iteration: number;
}

const PLACEHOLDER = /\{(instruction|instructionFile|workspace|model|iteration)\}/g;

/**
 * Substitute {placeholders} in an argument template.
 * Arguments that reference an absent value are dropped.
 */
export function expandArgs(template: readonly string[], context: ArgContext): string[] {
  const values: Record<string, string | undefined> = {
    instruction: context.instruction,
    instructionFile: context.instructionFile,
    workspace: context.workspace,
    model: context.model,
    iteration: String(context.iteration),
  };

  const expanded: string[] = [];
  for (const arg of template) {
    let missing = false;
    const value = arg.replace(PLACEHOLDER, (_match, key: string) => {
      const replacement = values[key];
      if (replacement === undefined) missing = true;
      return replacement ?? '';
    });
    if (!missing) expanded.push(value);
  }
  return expanded;
}

/**
 * Remove variables matching any exclusion pattern (exact names or globs).
 */
export function filterEnv(
  env: NodeJS.ProcessEnv,
  excludePatterns: readonly string[],
): NodeJS.ProcessEnv {
  if (excludePatterns.length === 0) {
    return { ...env };
  }
  const filtered: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(env)) {
    if (!excludePatterns.some((pattern) => globMatch(pattern, key))) {
      filtered[key] = value;
    }
  }
  return filtered;
}

export abstract class BaseAgentAdapter implements AgentAdapter {
  abstract readonly meta: AgentAdapterMeta;

  protected config: AgentAdapterConfig | null = null;

  async initialize(config: AgentAdapterConfig): Promise<void> {
    this.config = config;
  }

  /**
   * Executable and leading arguments from the configured command line.
   */
  protected getCommand(): { command: string; args: string[] } {
    const configured = this.config?.command ?? this.meta.defaultCommand ?? '';
    return parseCommand(configured);
  }

  protected getTransport(): InstructionTransport {
    return this.config?.transport ?? this.meta.defaultTransport;
  }

  /**
   * Arguments for one invocation, after the command's own leading arguments.
   */
  protected buildArgs(context: ArgContext): string[] {
    const template = this.config?.args ?? this.getDefaultArgs(context);
    const args = expandArgs(template, context);
    const mentionsInstruction = template.some((arg) => arg.includes('{instruction}'));
    if (this.getTransport() === 'arg' && !mentionsInstruction) {
      args.push(context.instruction);
    }
    return args;
  }

  /**
   * Argument template used when the config gives none.
   */
  protected getDefaultArgs(_context: ArgContext): string[] {
    return [];
  }

  protected buildEnv(options: AgentInvokeOptions): NodeJS.ProcessEnv {
    return {
      ...filterEnv(process.env, this.config?.envExclude ?? []),
      ...this.config?.env,
      LOOPBENCH_WORKSPACE: options.cwd,
      LOOPBENCH_ITERATION: String(options.iteration),
    };
  }

  async detect(): Promise<AgentDetectResult> {
    const { command } = this.getCommand();
    if (!command) {
      return { available: false, error: `Agent '${this.config?.name ?? this.meta.id}' has no command configured` };
    }
    const found = await findCommandPath(command);
    if (!found.found) {
      return { available: false, error: `Agent executable '${command}' not found on PATH` };
    }
    return { available: true, executablePath: found.path };
  }

  private async writeInstructionFile(cwd: string, iteration: number, instruction: string): Promise<string> {
    const dir = getControlPath(cwd, INSTRUCTIONS_DIR);
    await mkdir(dir, { recursive: true });
    const filePath = join(dir, `iteration-${String(iteration).padStart(3, '0')}.md`);
    await writeFile(filePath, instruction, 'utf-8');
    return filePath;
  }

  async invoke(instruction: string, options: AgentInvokeOptions): Promise<AgentInvocationResult> {
    const transport = this.getTransport();
    const startedAt = Date.now();

    let instructionFile: string | undefined;
    if (transport === 'file') {
      try {
        instructionFile = await this.writeInstructionFile(options.cwd, options.iteration, instruction);
      } catch (error) {
        return {
          classification: `error:cannot write instruction file: ${errorMessage(error)}`,
          exitCode: null,
          stdout: '',
          stderr: errorMessage(error),
          durationMs: Date.now() - startedAt,
          interrupted: false,
        };
      }
    }

    const { command, args: leadingArgs } = this.getCommand();
    const args = [
      ...leadingArgs,
      ...this.buildArgs({
        instruction,
        instructionFile,
        workspace: options.cwd,
        model: this.config?.model,
        iteration: options.iteration,
      }),
    ];

    const result = await runProcess(command, args, {
      cwd: options.cwd,
      env: this.buildEnv(options),
      replaceEnv: true,
      timeout: options.timeoutMs,
      graceMs: options.graceMs,
      signal: options.signal,
      input: transport === 'stdin' ? instruction : undefined,
      onStdout: options.onStdout,
      onStderr: options.onStderr,
    });

    const usage = extractUsage(result.stdout);
    return {
      classification: result.classification,
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      durationMs: result.durationMs,
      interrupted: result.interrupted,
      ...(usage ? { usage } : {}),
    };
  }
}
