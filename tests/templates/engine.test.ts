/**
 * ABOUTME: Tests for instruction template loading and rendering.
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  DEFAULT_TEMPLATE,
  buildInstructionVariables,
  clearTemplateCache,
  loadTemplate,
  renderInstruction,
  renderTemplate,
  type InstructionInput,
} from '../../src/templates/index.js';

const NOW = new Date('2026-01-01T12:00:00.000Z');

function input(overrides: Partial<InstructionInput> = {}): InstructionInput {
  return {
    taskId: 't-1',
    instructions: 'Write hello.txt',
    iteration: 1,
    maxIterations: 3,
    remainingMs: 90_500,
    agentName: 'scripted',
    workspace: '/ws',
    now: NOW,
    ...overrides,
  };
}

const builtin = { success: true, content: DEFAULT_TEMPLATE, source: 'builtin:default' };

describe('template engine', () => {
  let dir: string;

  beforeEach(async () => {
    clearTemplateCache();
    dir = await mkdtemp(join(tmpdir(), 'loopbench-templates-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('buildInstructionVariables fills defaults', () => {
    expect(buildInstructionVariables(input({ taskMd: '  # Task\n' }))).toEqual({
      taskId: 't-1',
      taskName: '',
      instructions: 'Write hello.txt',
      taskMd: '# Task',
      iteration: 1,
      maxIterations: 3,
      remainingSeconds: 90,
      feedback: '',
      previousIteration: 0,
      recentProgress: '',
      agentName: 'scripted',
      model: '',
      workspace: '/ws',
      currentDate: '2026-01-01',
      currentTimestamp: '2026-01-01T12:00:00.000Z',
    });
  });

  test('the built-in template states the task and the iteration budget', () => {
    const result = renderTemplate(builtin, buildInstructionVariables(input({ taskName: 'Greeting' })));
    expect(result.success).toBe(true);
    const lines = (result.instruction ?? '').split('\n');
    expect(lines[0]).toBe('# Task t-1: Greeting');
    expect(lines).toContain('Write hello.txt');
    expect(lines).toContain('This is iteration 1 of 3. About 90s of the time budget remain.');
    expect(lines[lines.length - 1]).toBe('<promise>COMPLETE</promise>');
    expect(result.instruction).not.toContain('## Feedback From Iteration');
  });

  test('the built-in template carries feedback and TASK.md', () => {
    const result = renderTemplate(
      builtin,
      buildInstructionVariables(
        input({ iteration: 2, feedback: 'Verification failed (score 0.00): missing', previousIteration: 1, taskMd: 'Details <here>' }),
      ),
    );
    expect(result.instruction).toContain('## TASK.md\nDetails <here>\n');
    expect(result.instruction).toContain(
      '## Feedback From Iteration 1\nThe workspace was verified after your previous attempt and did not pass yet.\n\nVerification failed (score 0.00): missing\n',
    );
  });

  test('renders a custom template file', async () => {
    const path = join(dir, 'custom.hbs');
    await writeFile(path, '{{taskId}}|{{iteration}}|{{remainingSeconds}}|{{currentDate}}\n');
    expect(renderInstruction(input({ iteration: 2 }), path)).toEqual({
      success: true,
      instruction: 't-1|2|90|2026-01-01',
      source: path,
    });
  });

  test('resolves a relative template path against the workspace', async () => {
    await writeFile(join(dir, 'relative.hbs'), '{{agentName}}');
    const loaded = loadTemplate('relative.hbs', dir);
    expect(loaded).toEqual({ success: true, content: '{{agentName}}', source: join(dir, 'relative.hbs') });
  });

  test('reports a missing template file', () => {
    const path = join(dir, 'missing.hbs');
    expect(renderInstruction(input(), path)).toEqual({
      success: false,
      error: `Template file not found: ${path}`,
      source: path,
    });
  });

  test('reports a template that fails to compile', async () => {
    const path = join(dir, 'broken.hbs');
    await writeFile(path, '{{#if}}unterminated');
    const result = renderInstruction(input(), path);
    expect(result.success).toBe(false);
    expect(result.error?.startsWith('Template rendering failed: ')).toBe(true);
  });
});
