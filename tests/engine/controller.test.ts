/**
 * ABOUTME: Scenario tests for the iteration controller.
 * A scripted agent edits a temporary workspace; verification runs through sh.
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { IterationController } from '../../src/engine/index.js';
import { replayRun } from '../../src/engine/replay.js';
import type { RunEvent } from '../../src/engine/types.js';
import { ConfigurationError } from '../../src/errors.js';
import { loadCommitRecords, loadIterationRecords, loadRunSummary } from '../../src/logs/index.js';
import { loadManifest } from '../../src/manifest/index.js';
import { createSilentLogger } from '../factories/logger.js';
import { createTestTaskRun } from '../factories/task-run.js';
import { ScriptedAgentAdapter } from '../mocks/scripted-agent.js';

const writeHello = async (cwd: string): Promise<void> => {
  await writeFile(join(cwd, 'hello.txt'), 'hello\n');
};

describe('IterationController', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(join(tmpdir(), 'loopbench-controller-'));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  test('fails on stagnation when the agent never changes the workspace', async () => {
    const adapter = new ScriptedAgentAdapter([{ stdout: 'thinking' }]);
    const controller = new IterationController(createTestTaskRun(workspace), {
      adapter,
      logger: createSilentLogger(),
    });

    const summary = await controller.run();

    expect(summary.status).toBe('failed');
    expect(summary.reason).toBe('No workspace changes across 3 consecutive observations');
    expect(summary.iterations).toBe(3);
    expect(adapter.invocations.map((call) => call.iteration)).toEqual([1, 2, 3]);
    expect(controller.getRecords().map((record) => record.progress)).toEqual([
      'progressing',
      'progressing',
      'stagnant',
    ]);
  });

  test('completes once verification passes and feeds failures back', async () => {
    const adapter = new ScriptedAgentAdapter([{ stdout: 'looking around' }, { act: writeHello }]);
    const task = createTestTaskRun(workspace, {
      verification: { command: 'test -f hello.txt', timeoutMs: 10_000, evalDirEnv: 'EVAL_DIR' },
    });
    const controller = new IterationController(task, { adapter, logger: createSilentLogger() });

    const summary = await controller.run();

    expect(summary.status).toBe('completed');
    expect(summary.success).toBe(true);
    expect(summary.reason).toBe('Verification passed on iteration 2 (score 1.00)');
    expect(summary.score).toBe(1);
    expect(summary.files.created).toEqual(['hello.txt']);
    expect(summary.iterationSummaries.map((entry) => entry.verificationSuccess)).toEqual([false, true]);

    expect(adapter.invocations[0]?.instruction).not.toContain('## Feedback From Iteration');
    expect(adapter.invocations[1]?.instruction).toContain('## Feedback From Iteration 1');
  });

  test('records every iteration contiguously and replays to the same verdict', async () => {
    const adapter = new ScriptedAgentAdapter([{ stdout: 'step one' }, { act: writeHello }]);
    const task = createTestTaskRun(workspace, {
      verification: { command: 'test -f hello.txt', timeoutMs: 10_000, evalDirEnv: 'EVAL_DIR' },
    });
    const summary = await new IterationController(task, { adapter, logger: createSilentLogger() }).run();

    const records = await loadIterationRecords(workspace);
    expect(records.map((record) => record.iteration)).toEqual([1, 2]);
    expect(records[1]?.files).toEqual({ created: ['hello.txt'], modified: [], deleted: [] });

    const manifest = await loadManifest(workspace);
    expect(manifest?.run.status).toBe('completed');
    expect(manifest?.run.completedAt).toBe(summary.completedAt ?? undefined);
    expect(manifest?.run.metadata?.['maxIterations']).toBe(5);

    const commits = await loadCommitRecords(workspace);
    expect(commits.map((commit) => commit.message.split('\n')[0])).toEqual([
      '[loopbench] start: task-1 with scripted',
      '[loopbench] test: iteration 1 completed, workspace progressing, verification score 0.00',
      '[loopbench] complete: Verification passed on iteration 2 (score 1.00)',
    ]);

    const replay = await replayRun(workspace);
    expect(replay.differences).toEqual([]);
    expect(replay.matches).toBe(true);
    expect(replay.state.status).toBe('completed');
  });

  test('completes on the agent completion signal without verification', async () => {
    const adapter = new ScriptedAgentAdapter([{ stdout: 'done\n<promise>COMPLETE</promise>\n', act: writeHello }]);
    const controller = new IterationController(createTestTaskRun(workspace), {
      adapter,
      logger: createSilentLogger(),
    });

    const summary = await controller.run();

    expect(summary.status).toBe('completed');
    expect(summary.reason).toBe('Agent signaled completion on iteration 1');
    expect(summary.iterations).toBe(1);
  });

  test('fails at once when the agent executable is missing', async () => {
    const adapter = new ScriptedAgentAdapter([{ classification: 'not_found', exitCode: null }]);
    const summary = await new IterationController(createTestTaskRun(workspace), {
      adapter,
      logger: createSilentLogger(),
    }).run();

    expect(summary.status).toBe('failed');
    expect(summary.reason).toBe('Agent executable not found on iteration 1');
  });

  test('verifies with its own timeout after the agent uses up the budget', async () => {
    const adapter = new ScriptedAgentAdapter([{ act: writeHello, hang: true }]);
    const task = createTestTaskRun(workspace, {
      totalTimeoutMs: 500,
      iterationTimeoutMs: 10_000,
      verification: { command: 'test -f hello.txt', timeoutMs: 10_000, evalDirEnv: 'EVAL_DIR' },
    });
    const summary = await new IterationController(task, { adapter, logger: createSilentLogger() }).run();

    expect(summary.iterationSummaries[0]?.classification).toBe('timeout');
    expect(summary.status).toBe('completed');
    expect(summary.reason).toBe('Verification passed on iteration 1 (score 1.00)');
  });

  test('reports a fractional time budget as written', async () => {
    const adapter = new ScriptedAgentAdapter([{ hang: true }]);
    const task = createTestTaskRun(workspace, { totalTimeoutMs: 1500, iterationTimeoutMs: 10_000 });
    const summary = await new IterationController(task, { adapter, logger: createSilentLogger() }).run();

    expect(summary.status).toBe('timeout');
    expect(summary.reason).toBe('Time budget of 1.5s exhausted after iteration 1');
  });

  test('clamps the invocation timeout to the remaining budget', async () => {
    const adapter = new ScriptedAgentAdapter([{ hang: true }]);
    const task = createTestTaskRun(workspace, { totalTimeoutMs: 1000, iterationTimeoutMs: 10_000 });
    const summary = await new IterationController(task, { adapter, logger: createSilentLogger() }).run();

    expect(adapter.invocations).toHaveLength(1);
    expect(adapter.invocations[0]?.timeoutMs).toBeLessThanOrEqual(1000);
    expect(summary.status).toBe('timeout');
    expect(summary.reason).toBe('Time budget of 1s exhausted after iteration 1');
    expect(summary.iterationSummaries[0]?.classification).toBe('timeout');
  });

  test('stops after the current iteration', async () => {
    const adapter = new ScriptedAgentAdapter([{ act: writeHello }]);
    const controller = new IterationController(createTestTaskRun(workspace), {
      adapter,
      logger: createSilentLogger(),
    });
    controller.on((event) => {
      if (event.type === 'iteration:completed') controller.stop();
    });

    const summary = await controller.run();

    expect(summary.status).toBe('timeout');
    expect(summary.reason).toBe('Run stopped by operator');
    expect(summary.iterations).toBe(1);
  });

  test('abort interrupts a running invocation', async () => {
    const adapter = new ScriptedAgentAdapter([{ hang: true }]);
    const controller = new IterationController(createTestTaskRun(workspace), {
      adapter,
      logger: createSilentLogger(),
    });
    controller.on((event) => {
      if (event.type === 'iteration:started') setTimeout(() => controller.abort('Aborted in test'), 50);
    });

    const summary = await controller.run();

    expect(summary.status).toBe('timeout');
    expect(summary.reason).toBe('Aborted in test');
    expect(summary.iterationSummaries.map((entry) => entry.classification)).toEqual(['error:interrupted']);
  });

  test('emits lifecycle events in order', async () => {
    const events: RunEvent['type'][] = [];
    const controller = new IterationController(createTestTaskRun(workspace), {
      adapter: new ScriptedAgentAdapter([{ stdout: '<promise>COMPLETE</promise>' }]),
      logger: createSilentLogger(),
    });
    controller.on((event) => events.push(event.type));

    await controller.run();

    expect(events).toEqual([
      'run:started',
      'run:transition',
      'iteration:started',
      'agent:output',
      'run:transition',
      'iteration:completed',
      'run:finished',
    ]);
  });

  test('writes summary.json', async () => {
    const controller = new IterationController(createTestTaskRun(workspace), {
      adapter: new ScriptedAgentAdapter([{ stdout: '<promise>COMPLETE</promise>' }]),
      logger: createSilentLogger(),
    });
    await controller.run();

    const summary = await loadRunSummary(workspace);
    expect(summary?.status).toBe('completed');
    expect(summary?.iterations).toBe(1);
  });

  describe('prepare', () => {
    test('refuses a workspace that already holds a run', async () => {
      const first = new IterationController(createTestTaskRun(workspace), {
        adapter: new ScriptedAgentAdapter([{ stdout: '<promise>COMPLETE</promise>' }]),
        logger: createSilentLogger(),
      });
      await first.run();

      const second = new IterationController(createTestTaskRun(workspace), {
        adapter: new ScriptedAgentAdapter([{ stdout: '<promise>COMPLETE</promise>' }]),
        logger: createSilentLogger(),
      });
      await expect(second.prepare()).rejects.toThrow(ConfigurationError);
      await expect(second.prepare()).rejects.toThrow(
        'Workspace already holds run run_test0001 (completed); use a fresh workspace or --fresh',
      );
    });

    test('starts over with fresh', async () => {
      await new IterationController(createTestTaskRun(workspace), {
        adapter: new ScriptedAgentAdapter([{ stdout: 'thinking' }]),
        logger: createSilentLogger(),
      }).run();

      const summary = await new IterationController(createTestTaskRun(workspace, { runId: 'run_test0002' }), {
        adapter: new ScriptedAgentAdapter([{ stdout: '<promise>COMPLETE</promise>' }]),
        logger: createSilentLogger(),
        fresh: true,
      }).run();

      expect(summary.runId).toBe('run_test0002');
      expect(await loadIterationRecords(workspace)).toHaveLength(1);
    });

    test('collects every configuration problem', async () => {
      const missing = join(workspace, 'missing');
      const task = createTestTaskRun(missing, { maxIterations: 0 });
      const controller = new IterationController(task, {
        adapter: new ScriptedAgentAdapter([], { available: false }),
        logger: createSilentLogger(),
      });

      let caught: unknown;
      try {
        await controller.prepare();
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ConfigurationError);
      if (caught instanceof ConfigurationError) {
        expect(caught.problems).toEqual([
          'maxIterations must be a positive integer (got 0)',
          `Workspace does not exist: ${missing}`,
          'scripted agent unavailable',
        ]);
      }
    });
  });
});
