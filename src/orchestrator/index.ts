/**
 * ABOUTME: Concurrent execution of many task runs.
 */

export { RunPool, type RunPoolOptions } from './run-pool.js';
export type { PoolEvent, PoolRunResult } from './types.js';
