/**
 * ABOUTME: Main entry point for loopbench as a library.
 * Loopbench drives AI coding agents through bounded iteration loops against a
 * workspace, verifies the result and keeps a replayable audit trail.
 */

export * from './errors.js';
export * from './config/index.js';
export * from './engine/index.js';
export * from './engine/state-machine.js';
export * from './engine/verification.js';
export * from './engine/completion-strategies.js';
export * from './engine/progress-tracker.js';
export * from './manifest/index.js';
export * from './logs/index.js';
export * from './orchestrator/index.js';
export * from './plugins/agents/index.js';
export * from './templates/index.js';
export * from './workspace/fingerprint.js';
export * from './workspace/paths.js';
export * from './utils/process.js';
export { VERSION } from './version.js';
