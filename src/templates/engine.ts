/**
 * ABOUTME: Template engine for instruction rendering using Handlebars.
 * Handles loading templates (custom or built-in) and rendering them with the
 * task, the previous iteration's verification feedback and recent progress.
 */

import Handlebars from 'handlebars';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { homedir } from 'node:os';
import { errorMessage } from '../errors.js';
import type { InstructionVariables, TemplateLoadResult, TemplateRenderResult } from './types.js';
import { DEFAULT_TEMPLATE } from './builtin.js';

/**
 * File name of the instruction template in the user config directory.
 */
export const USER_TEMPLATE_FILE = 'instruction.hbs';

/**
 * Cache for compiled templates to avoid recompilation
 */
const templateCache = new Map<string, Handlebars.TemplateDelegate>();

/**
 * Get the user config directory path for loopbench.
 * @returns Path to ~/.config/loopbench/
 */
export function getUserConfigDir(): string {
  return path.join(homedir(), '.config', 'loopbench');
}

export function getUserTemplatePath(): string {
  return path.join(getUserConfigDir(), USER_TEMPLATE_FILE);
}

/**
 * Load a template from a custom path or fall back to user config or built-in.
 *
 * Resolution order:
 * 1. customPath (config `promptTemplate`)
 * 2. ~/.config/loopbench/instruction.hbs
 * 3. Built-in template
 */
export function loadTemplate(customPath: string | undefined, cwd: string): TemplateLoadResult {
  if (customPath) {
    const resolvedPath = path.isAbsolute(customPath) ? customPath : path.resolve(cwd, customPath);

    if (!fs.existsSync(resolvedPath)) {
      return {
        success: false,
        source: resolvedPath,
        error: `Template file not found: ${resolvedPath}`,
      };
    }
    try {
      return { success: true, content: fs.readFileSync(resolvedPath, 'utf-8'), source: resolvedPath };
    } catch (error) {
      return {
        success: false,
        source: resolvedPath,
        error: `Failed to read template: ${errorMessage(error)}`,
      };
    }
  }

  const userPath = getUserTemplatePath();
  if (fs.existsSync(userPath)) {
    try {
      return { success: true, content: fs.readFileSync(userPath, 'utf-8'), source: userPath };
    } catch {
      // Unreadable user template: use the built-in one
    }
  }

  return { success: true, content: DEFAULT_TEMPLATE, source: 'builtin:default' };
}

/**
 * Inputs for one iteration's instruction.
 */
export interface InstructionInput {
  taskId: string;
  taskName?: string;
  instructions: string;
  taskMd?: string;
  iteration: number;
  maxIterations: number;
  remainingMs: number;
  feedback?: string;
  previousIteration?: number;
  recentProgress?: string;
  agentName: string;
  model?: string;
  workspace: string;
  now?: Date;
}

export function buildInstructionVariables(input: InstructionInput): InstructionVariables {
  const now = input.now ?? new Date();
  const timestamp = now.toISOString();
  return {
    taskId: input.taskId,
    taskName: input.taskName ?? '',
    instructions: input.instructions,
    taskMd: input.taskMd?.trim() ?? '',
    iteration: input.iteration,
    maxIterations: input.maxIterations,
    remainingSeconds: Math.max(0, Math.floor(input.remainingMs / 1000)),
    feedback: input.feedback ?? '',
    previousIteration: input.previousIteration ?? 0,
    recentProgress: input.recentProgress ?? '',
    agentName: input.agentName,
    model: input.model ?? '',
    workspace: input.workspace,
    currentDate: timestamp.slice(0, 10),
    currentTimestamp: timestamp,
  };
}

/**
 * Compile a template (with caching).
 */
function compileTemplate(templateContent: string, source: string): Handlebars.TemplateDelegate {
  const cached = templateCache.get(source);
  if (cached) {
    return cached;
  }

  const compiled = Handlebars.compile(templateContent, {
    noEscape: true, // Instructions are plain text, not HTML
    strict: false,
  });
  templateCache.set(source, compiled);
  return compiled;
}

/**
 * Render an instruction from a loaded template.
 */
export function renderTemplate(
  loaded: TemplateLoadResult,
  variables: InstructionVariables,
): TemplateRenderResult {
  if (!loaded.success || loaded.content === undefined) {
    return {
      success: false,
      error: loaded.error ?? 'Failed to load template',
      source: loaded.source,
    };
  }

  try {
    const template = compileTemplate(loaded.content, loaded.source);
    return { success: true, instruction: template(variables).trim(), source: loaded.source };
  } catch (error) {
    return {
      success: false,
      error: `Template rendering failed: ${errorMessage(error)}`,
      source: loaded.source,
    };
  }
}

/**
 * Load the configured template and render one iteration's instruction.
 */
export function renderInstruction(
  input: InstructionInput,
  customPath?: string,
): TemplateRenderResult {
  return renderTemplate(loadTemplate(customPath, input.workspace), buildInstructionVariables(input));
}

/**
 * Clear the template cache (useful for testing or when templates change).
 */
export function clearTemplateCache(): void {
  templateCache.clear();
}
