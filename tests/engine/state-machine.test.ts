/**
 * ABOUTME: Tests for the task lifecycle state machine and its transition rules.
 */

import { describe, test, expect } from 'vitest';
import {
  applyIteration,
  complete,
  createRunState,
  deriveRunState,
  fail,
  finalize,
  isTerminal,
  start,
} from '../../src/engine/state-machine.js';
import { IllegalTransitionError } from '../../src/errors.js';
import type { RunState } from '../../src/engine/types.js';
import {
  BASE_TIME,
  createIterationRecord,
  createRecordSeries,
  createVerificationResult,
} from '../factories/iteration-record.js';
import { createLimits } from '../factories/task-run.js';

const limits = createLimits();
const started = (): RunState => start(createRunState(), new Date(BASE_TIME));

describe('state machine', () => {
  describe('lifecycle', () => {
    test('starts pending with nothing recorded', () => {
      expect(createRunState()).toEqual({
        status: 'pending',
        startedAt: null,
        completedAt: null,
        iteration: 0,
        usage: 0,
        reason: null,
        consecutiveErrors: 0,
      });
    });

    test('start moves to in_progress and stamps startedAt', () => {
      const state = started();
      expect(state.status).toBe('in_progress');
      expect(state.startedAt).toBe('2026-01-01T00:00:00.000Z');
      expect(state.completedAt).toBeNull();
    });

    test('terminal transitions stamp completedAt and the reason', () => {
      const state = complete(started(), 'done', new Date(BASE_TIME + 5000));
      expect(state.status).toBe('completed');
      expect(state.completedAt).toBe('2026-01-01T00:00:05.000Z');
      expect(state.reason).toBe('done');
      expect(isTerminal(state.status)).toBe(true);
    });

    test('rejects illegal transitions', () => {
      expect(() => complete(createRunState(), 'early', new Date())).toThrow(IllegalTransitionError);
      expect(() => start(started(), new Date())).toThrow(IllegalTransitionError);
      const failed = fail(started(), 'broken', new Date());
      expect(() => complete(failed, 'late', new Date())).toThrow(IllegalTransitionError);
    });

    test('finalize times out an in-progress run and leaves terminal runs alone', () => {
      const at = new Date(BASE_TIME + 1000);
      const finalized = finalize(started(), at);
      expect(finalized.status).toBe('timeout');
      expect(finalized.reason).toBe('Run ended without reaching a verdict');

      const failed = fail(started(), 'broken', at);
      expect(finalize(failed, new Date(BASE_TIME + 9000))).toBe(failed);
    });
  });

  describe('applyIteration', () => {
    test('keeps an ordinary iteration in progress', () => {
      const state = applyIteration(started(), createIterationRecord(), limits);
      expect(state.status).toBe('in_progress');
      expect(state.iteration).toBe(1);
      expect(state.reason).toBeNull();
    });

    test('completes on verification success', () => {
      const record = createIterationRecord({
        verification: createVerificationResult({ success: true, score: 1 }),
      });
      const state = applyIteration(started(), record, createLimits({ verificationConfigured: true }));
      expect(state.status).toBe('completed');
      expect(state.reason).toBe('Verification passed on iteration 1 (score 1.00)');
      expect(state.completedAt).toBe(record.endedAt);
    });

    test('verification success wins over stagnation', () => {
      const record = createIterationRecord({
        progress: 'stagnant',
        verification: createVerificationResult({ success: true, score: 0.9 }),
      });
      const state = applyIteration(started(), record, createLimits({ verificationConfigured: true }));
      expect(state.status).toBe('completed');
    });

    test('fails at once when the agent executable is missing', () => {
      const record = createIterationRecord({ classification: 'not_found', exitCode: null });
      const state = applyIteration(started(), record, limits);
      expect(state.status).toBe('failed');
      expect(state.reason).toBe('Agent executable not found on iteration 1');
    });

    test('fails after consecutive launch errors', () => {
      const records = createRecordSeries(3, () => ({ classification: 'error:spawn EACCES', exitCode: null }));
      let state = started();
      state = applyIteration(state, records[0] ?? createIterationRecord(), limits);
      expect(state.status).toBe('in_progress');
      expect(state.consecutiveErrors).toBe(1);
      state = applyIteration(state, records[1] ?? createIterationRecord(), limits);
      expect(state.consecutiveErrors).toBe(2);
      state = applyIteration(state, records[2] ?? createIterationRecord(), limits);
      expect(state.status).toBe('failed');
      expect(state.reason).toBe('Agent failed to launch 3 times in a row (error:spawn EACCES)');
    });

    test('a launched iteration resets the launch error count', () => {
      let state = started();
      state = applyIteration(state, createIterationRecord({ iteration: 1, classification: 'error:spawn EACCES' }), limits);
      state = applyIteration(state, createIterationRecord({ iteration: 2, classification: 'nonzero_exit' }), limits);
      expect(state.consecutiveErrors).toBe(0);
    });

    test('an interrupted invocation is not a launch error', () => {
      const record = createIterationRecord({ classification: 'error:interrupted', exitCode: null });
      const state = applyIteration(started(), record, createLimits({ maxConsecutiveErrors: 1 }));
      expect(state.status).toBe('in_progress');
      expect(state.consecutiveErrors).toBe(0);
    });

    test('fails on stagnation', () => {
      const record = createIterationRecord({ progress: 'stagnant' });
      const state = applyIteration(started(), record, limits);
      expect(state.status).toBe('failed');
      expect(state.reason).toBe('No workspace changes across 3 consecutive observations');
    });

    test('completes on an agent completion signal without verification', () => {
      const record = createIterationRecord({ agentSignaledCompletion: true });
      const state = applyIteration(started(), record, limits);
      expect(state.status).toBe('completed');
      expect(state.reason).toBe('Agent signaled completion on iteration 1');
    });

    test('ignores the completion signal when verification is configured', () => {
      const record = createIterationRecord({
        agentSignaledCompletion: true,
        verification: createVerificationResult(),
      });
      const state = applyIteration(started(), record, createLimits({ verificationConfigured: true }));
      expect(state.status).toBe('in_progress');
    });

    test('times out when the budget is spent', () => {
      const record = createIterationRecord({
        endedAt: new Date(BASE_TIME + 60_000).toISOString(),
      });
      const state = applyIteration(started(), record, limits);
      expect(state.status).toBe('timeout');
      expect(state.reason).toBe('Time budget of 60s exhausted after iteration 1');
    });

    test('times out at the iteration limit', () => {
      const limited = createLimits({ maxIterations: 2 });
      let state = started();
      for (const record of createRecordSeries(2)) {
        state = applyIteration(state, record, limited);
      }
      expect(state.status).toBe('timeout');
      expect(state.reason).toBe('Iteration limit of 2 reached without success');
      expect(state.iteration).toBe(2);
    });

    test('accumulates usage', () => {
      let state = started();
      for (const record of createRecordSeries(2, (n) => ({ usage: n * 0.25 }))) {
        state = applyIteration(state, record, limits);
      }
      expect(state.usage).toBe(0.75);
    });

    test('rejects a record out of sequence', () => {
      expect(() => applyIteration(started(), createIterationRecord({ iteration: 2 }), limits)).toThrow(
        IllegalTransitionError,
      );
    });

    test('rejects a record for a run that is not in progress', () => {
      expect(() => applyIteration(createRunState(), createIterationRecord(), limits)).toThrow(IllegalTransitionError);
    });
  });

  describe('deriveRunState', () => {
    test('is pending with no records', () => {
      expect(deriveRunState([], limits)).toEqual(createRunState());
    });

    test('matches folding the records by hand', () => {
      const records = createRecordSeries(3, (n) => ({ progress: n === 3 ? 'stagnant' : 'progressing' }));
      let expected = started();
      for (const record of records) {
        expected = applyIteration(expected, record, limits);
      }
      expect(deriveRunState(records, limits)).toEqual(expected);
      expect(expected.status).toBe('failed');
    });

    test('finalizes records that stop short of a verdict at the last end time', () => {
      const records = createRecordSeries(2);
      const state = deriveRunState(records, limits);
      expect(state.status).toBe('timeout');
      expect(state.startedAt).toBe(records[0]?.startedAt);
      expect(state.completedAt).toBe(records[1]?.endedAt);
    });

    test('rejects records after a terminal state', () => {
      const records = createRecordSeries(2, (n) => ({ agentSignaledCompletion: n === 1 }));
      expect(() => deriveRunState(records, limits)).toThrow(IllegalTransitionError);
    });
  });
});
