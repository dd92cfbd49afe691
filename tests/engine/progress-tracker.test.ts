/**
 * ABOUTME: Tests for the stagnation window and progress tracker.
 */

import { describe, test, expect } from 'vitest';
import { ProgressTracker, StagnationWindow } from '../../src/engine/progress-tracker.js';
import type { WorkspaceFingerprint } from '../../src/workspace/fingerprint.js';

function fingerprint(content: string): WorkspaceFingerprint {
  return { digest: `digest-${content}`, files: { 'a.txt': content } };
}

describe('StagnationWindow', () => {
  test('evicts the oldest entry when full', () => {
    const window = new StagnationWindow<number>(2);
    window.push(1);
    window.push(2);
    window.push(3);
    expect(window.every((item) => item >= 2)).toBe(true);
    expect(window.isFull).toBe(true);
  });

  test('rejects a non-positive capacity', () => {
    expect(() => new StagnationWindow<number>(0)).toThrow(RangeError);
  });
});

describe('ProgressTracker', () => {
  test('trips once a full window of identical fingerprints sees it again', () => {
    const tracker = new ProgressTracker(3);
    const same = fingerprint('x');
    expect(tracker.observe(same)).toBe('progressing');
    expect(tracker.observe(same)).toBe('progressing');
    expect(tracker.observe(same)).toBe('progressing');
    expect(tracker.observe(same)).toBe('stagnant');
    expect(tracker.observe(same)).toBe('stagnant');
  });

  test('any change keeps the run progressing', () => {
    const tracker = new ProgressTracker(2);
    expect(tracker.observe(fingerprint('a'))).toBe('progressing');
    expect(tracker.observe(fingerprint('a'))).toBe('progressing');
    expect(tracker.observe(fingerprint('b'))).toBe('progressing');
    expect(tracker.observe(fingerprint('b'))).toBe('progressing');
    expect(tracker.observe(fingerprint('b'))).toBe('stagnant');
  });
});
