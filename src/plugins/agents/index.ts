/**
 * ABOUTME: Agent plugin exports.
 */

export type {
  AgentAdapter,
  AgentAdapterConfig,
  AgentAdapterFactory,
  AgentAdapterMeta,
  AgentDetectResult,
  AgentInvocationResult,
  AgentInvokeOptions,
  InstructionTransport,
} from './types.js';
export type { ArgContext } from './base.js';
export type { UsageSummary } from './usage.js';

export { BaseAgentAdapter, expandArgs, filterEnv } from './base.js';
export { AgentRegistry, createAgentRegistry } from './registry.js';
export { extractUsage } from './usage.js';
export * from './builtin/index.js';
