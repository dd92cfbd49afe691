/**
 * ABOUTME: Captures console output of command tests.
 */

import { vi } from 'vitest';

export interface CapturedConsole {
  /** Everything passed to console.log, one entry per call */
  out: string[];
  err: string[];
  restore: () => void;
}

export function captureConsole(): CapturedConsole {
  const out: string[] = [];
  const err: string[] = [];
  const log = vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    out.push(args.map(String).join(' '));
  });
  const error = vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    err.push(args.map(String).join(' '));
  });
  return {
    out,
    err,
    restore: () => {
      log.mockRestore();
      error.mockRestore();
    },
  };
}
