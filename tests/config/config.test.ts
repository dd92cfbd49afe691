/**
 * ABOUTME: Tests for configuration loading, merging and TaskRun creation.
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { parse as parseToml } from 'smol-toml';
import {
  DEFAULT_CONFIG,
  createTaskRun,
  loadBatchPlan,
  loadConfigFile,
  loadStoredConfigWithSource,
  mergeConfigs,
  resolveAgentConfig,
  serializeConfig,
  validateRunConfig,
  type StoredConfig,
} from '../../src/config/index.js';
import { ConfigurationError } from '../../src/errors.js';
import { createAgentRegistry } from '../../src/plugins/agents/registry.js';

const registry = createAgentRegistry();

const ECHO_AGENT: StoredConfig = {
  agent: 'echoer',
  agents: [{ name: 'echoer', plugin: 'command', command: 'echo' }],
};

describe('config', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'loopbench-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('loadConfigFile', () => {
    test('is null for a missing file and empty for a blank one', async () => {
      expect(await loadConfigFile(join(dir, 'missing.toml'))).toBeNull();
      await writeFile(join(dir, 'blank.toml'), '\n');
      expect(await loadConfigFile(join(dir, 'blank.toml'))).toEqual({});
    });

    test('parses tables and arrays of tables', async () => {
      const path = join(dir, 'config.toml');
      await writeFile(
        path,
        [
          'maxIterations = 4',
          'agent = "echoer"',
          '',
          '[verification]',
          'command = "npm test"',
          'timeoutSeconds = 30',
          '',
          '[[agents]]',
          'name = "echoer"',
          'command = "echo"',
        ].join('\n'),
      );
      expect(await loadConfigFile(path)).toEqual({
        maxIterations: 4,
        agent: 'echoer',
        verification: { command: 'npm test', timeoutSeconds: 30 },
        agents: [{ name: 'echoer', plugin: 'command', command: 'echo' }],
      });
    });

    test('rejects invalid TOML', async () => {
      const path = join(dir, 'config.toml');
      await writeFile(path, 'maxIterations = = 3');
      await expect(loadConfigFile(path)).rejects.toThrow(`Invalid TOML in ${path}`);
    });

    test('rejects unknown keys with the file path', async () => {
      const path = join(dir, 'config.toml');
      await writeFile(path, 'bogus = 1');
      await expect(loadConfigFile(path)).rejects.toThrow(
        `Configuration error in ${path}:\n  • (root): Unrecognized key(s) in object: 'bogus'`,
      );
    });
  });

  describe('loadStoredConfigWithSource', () => {
    test('project config found above cwd overrides the global one', async () => {
      const globalPath = join(dir, 'global.toml');
      await writeFile(globalPath, 'maxIterations = 7\nstagnationLimit = 4');
      await mkdir(join(dir, 'project', '.loopbench'), { recursive: true });
      await mkdir(join(dir, 'project', 'nested'));
      const projectPath = join(dir, 'project', '.loopbench', 'config.toml');
      await writeFile(projectPath, 'maxIterations = 2');

      const { config, source } = await loadStoredConfigWithSource(join(dir, 'project', 'nested'), globalPath);
      expect(config).toEqual({ maxIterations: 2, stagnationLimit: 4 });
      expect(source).toEqual({ globalPath, projectPath });
    });

    test('reports missing sources as null', async () => {
      const { config, source } = await loadStoredConfigWithSource(dir, join(dir, 'none.toml'));
      expect(config).toEqual({});
      expect(source.globalPath).toBeNull();
    });
  });

  test('mergeConfigs merges tables and replaces arrays', () => {
    const merged = mergeConfigs(
      {
        maxIterations: 3,
        completionStrategies: ['promise-tag', 'exit-code'],
        verification: { command: 'make check', timeoutSeconds: 10 },
      },
      { completionStrategies: ['heuristic'], verification: { command: 'make test' } },
    );
    expect(merged).toEqual({
      maxIterations: 3,
      completionStrategies: ['heuristic'],
      verification: { command: 'make test', timeoutSeconds: 10 },
    });
  });

  test('serializeConfig writes TOML that parses back', () => {
    const config: StoredConfig = { maxIterations: 5, verification: { command: 'npm test' } };
    expect(parseToml(serializeConfig(config))).toEqual(config);
  });

  describe('resolveAgentConfig', () => {
    test('prefers a configured agent, then a plugin id', () => {
      expect(resolveAgentConfig(ECHO_AGENT, registry)).toEqual({ name: 'echoer', plugin: 'command', command: 'echo' });
      expect(resolveAgentConfig(ECHO_AGENT, registry, 'codex')).toEqual({ name: 'codex', plugin: 'codex' });
    });

    test('names the available agents for an unknown one', () => {
      expect(resolveAgentConfig(ECHO_AGENT, registry, 'nope')).toBe(
        "Unknown agent 'nope' (available: echoer, command, claude, codex, aider)",
      );
    });
  });

  describe('validateRunConfig', () => {
    test('collects every problem', () => {
      const result = validateRunConfig(
        {},
        { taskId: 'bad id', workspace: '', instructions: ' ', maxIterations: 0 },
        registry,
      );
      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        "Task id 'bad id' may only contain letters, digits, '.', '_' and '-'",
        'Workspace path is required',
        'Task instructions are empty',
        'Max iterations must be between 1 and 1000 (got 0)',
        "Agent 'command' uses the command plugin but sets no command",
      ]);
    });

    test('warns when the iteration timeout exceeds the budget', () => {
      const result = validateRunConfig(
        ECHO_AGENT,
        { taskId: 't', workspace: 'ws', instructions: 'go', totalTimeoutSeconds: 60, iterationTimeoutSeconds: 120 },
        registry,
      );
      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([
        'Iteration timeout (120s) exceeds the total budget (60s); iterations are bounded by the remaining budget',
      ]);
    });
  });

  describe('createTaskRun', () => {
    test('applies defaults and converts seconds', () => {
      const task = createTaskRun(ECHO_AGENT, { taskId: 't-1', workspace: 'ws', instructions: 'go', runId: 'run_1' }, registry, '/base');
      expect(task).toMatchObject({
        taskId: 't-1',
        agentId: 'echoer',
        runId: 'run_1',
        workspace: '/base/ws',
        maxIterations: DEFAULT_CONFIG.maxIterations,
        totalTimeoutMs: 300_000,
        iterationTimeoutMs: 300_000,
        stagnationLimit: 3,
        maxConsecutiveErrors: 3,
        graceMs: 2000,
        verification: null,
        completionStrategies: ['promise-tag', 'exit-code'],
        audit: { gitCommits: false, iterationLogs: true },
      });
      expect(Object.isFrozen(task)).toBe(true);
    });

    test('overrides win over stored values', () => {
      const task = createTaskRun(
        { ...ECHO_AGENT, maxIterations: 8, verification: { command: 'make check', evalDir: 'eval' } },
        {
          taskId: 't-1',
          workspace: '/ws',
          instructions: 'go',
          maxIterations: 2,
          totalTimeoutSeconds: 1.5,
          verifyTimeoutSeconds: 9,
          model: 'test-model',
        },
        registry,
        '/base',
      );
      expect(task.maxIterations).toBe(2);
      expect(task.totalTimeoutMs).toBe(1500);
      expect(task.verification).toEqual({
        command: 'make check',
        timeoutMs: 9000,
        evalDir: '/base/eval',
        evalDirEnv: 'EVAL_DIR',
      });
      expect(task.agent).toEqual({ name: 'echoer', plugin: 'command', command: 'echo', model: 'test-model' });
      expect(task.runId).toMatch(/^run_[0-9a-f]{8}$/);
    });

    test('throws a ConfigurationError listing the problems', () => {
      expect(() => createTaskRun({}, { taskId: '', workspace: 'ws', instructions: 'go' }, registry)).toThrow(
        ConfigurationError,
      );
    });
  });

  describe('loadBatchPlan', () => {
    test('reads shared settings and runs', async () => {
      const path = join(dir, 'plan.toml');
      await writeFile(
        path,
        ['maxWorkers = 2', '', '[[runs]]', 'task = "a"', 'workspace = "ws-a"', '', '[[runs]]', 'task = "b"', 'workspace = "ws-b"'].join('\n'),
      );
      const plan = await loadBatchPlan(path);
      expect(plan.maxWorkers).toBe(2);
      expect(plan.runs.map((run) => run.task)).toEqual(['a', 'b']);
    });

    test('rejects a missing plan and a plan without runs', async () => {
      await expect(loadBatchPlan(join(dir, 'none.toml'))).rejects.toThrow('Batch plan not found');
      const path = join(dir, 'empty.toml');
      await writeFile(path, 'maxWorkers = 2');
      await expect(loadBatchPlan(path)).rejects.toThrow(ConfigurationError);
    });
  });
});
