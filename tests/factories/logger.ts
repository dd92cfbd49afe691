/**
 * ABOUTME: Loggers for tests: silent, or capturing every line.
 */

import { Writable } from 'node:stream';
import { createStructuredLogger, type StructuredLogger } from '../../src/logs/index.js';

function sink(lines?: string[]): Writable {
  return new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines?.push(...chunk.toString().split('\n').filter(Boolean));
      callback();
    },
  });
}

export function createSilentLogger(): StructuredLogger {
  return createStructuredLogger({ minLevel: 'ERROR', stream: sink(), errorStream: sink() });
}

/**
 * Logger writing every line (DEBUG and up, no timestamps) into `lines`.
 */
export function createCapturingLogger(lines: string[]): StructuredLogger {
  const stream = sink(lines);
  return createStructuredLogger({ minLevel: 'DEBUG', showTimestamp: false, stream, errorStream: stream });
}
