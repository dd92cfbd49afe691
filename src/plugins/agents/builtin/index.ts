/**
 * ABOUTME: Built-in agent adapter registration.
 */

import type { AgentRegistry } from '../registry.js';
import createCommandAgent from './command.js';
import createClaudeAgent from './claude.js';
import createCodexAgent from './codex.js';
import createAiderAgent from './aider.js';

/**
 * Register all bundled adapters with a registry.
 */
export function registerBuiltinAgents(registry: AgentRegistry): void {
  registry.register(createCommandAgent);
  registry.register(createClaudeAgent);
  registry.register(createCodexAgent);
  registry.register(createAiderAgent);
}

export { createCommandAgent, createClaudeAgent, createCodexAgent, createAiderAgent };
export { CommandAgentAdapter } from './command.js';
export { ClaudeAgentAdapter } from './claude.js';
export { CodexAgentAdapter } from './codex.js';
export { AiderAgentAdapter } from './aider.js';
