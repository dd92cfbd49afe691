/**
 * ABOUTME: Tests for protocol versions, commit messages and commit actions.
 */

import { describe, test, expect } from 'vitest';
import {
  formatCommitMessage,
  isProtocolCompatible,
  parseCommitMessage,
  parseProtocolVersion,
  selectCommitAction,
} from '../../src/manifest/protocol.js';
import { createIterationRecord, createVerificationResult } from '../factories/iteration-record.js';

describe('protocol', () => {
  test('versions are compatible within a major', () => {
    expect(parseProtocolVersion('1.4.2')).toEqual({ major: 1, minor: 4, patch: 2 });
    expect(parseProtocolVersion('1.4')).toBeNull();
    expect(isProtocolCompatible('1.9.0')).toBe(true);
    expect(isProtocolCompatible('2.0.0')).toBe(false);
    expect(isProtocolCompatible('bad')).toBe(false);
  });

  test('formats a commit message with trailers and body', () => {
    const message = formatCommitMessage({
      action: 'fix',
      description: 'address failing\n  checks',
      harness: 'codex',
      iteration: 3,
      body: 'M src/app.ts',
    });
    expect(message).toBe('[loopbench] fix: address failing checks\n\nHarness: codex\nIteration: 3\n---\nM src/app.ts');
  });

  test('parses what it formats', () => {
    const message = { action: 'edit' as const, description: 'iteration 1', harness: 'aider', iteration: 1 };
    expect(parseCommitMessage(formatCommitMessage(message))).toEqual(message);
    const withBody = { ...message, body: 'A a.txt\nA b.txt' };
    expect(parseCommitMessage(formatCommitMessage(withBody))).toEqual(withBody);
  });

  test('rejects messages outside the convention', () => {
    expect(parseCommitMessage('Fix typo')).toBeNull();
    expect(parseCommitMessage('[loopbench] merge: x\n\nHarness: h\nIteration: 1')).toBeNull();
    expect(parseCommitMessage('[loopbench] edit: x\n\nIteration: 1')).toBeNull();
  });

  test('selects the commit action', () => {
    const failed = createIterationRecord({ verification: createVerificationResult() });
    const plain = createIterationRecord({ iteration: 2 });
    const verified = createIterationRecord({ iteration: 2, verification: createVerificationResult() });

    expect(selectCommitAction(plain, undefined, 'completed')).toBe('complete');
    expect(selectCommitAction(plain, undefined, 'failed')).toBe('fail');
    expect(selectCommitAction(plain, undefined, 'timeout')).toBe('timeout');
    expect(selectCommitAction(plain, failed, 'in_progress')).toBe('fix');
    expect(selectCommitAction(verified, undefined, 'in_progress')).toBe('test');
    expect(selectCommitAction(plain, undefined, 'in_progress')).toBe('edit');
  });
});
