/**
 * ABOUTME: Registry for agent adapters.
 * Maps adapter ids to factories; every run gets its own freshly initialized instance.
 */

import { ConfigurationError } from '../../errors.js';
import { registerBuiltinAgents } from './builtin/index.js';
import type {
  AgentAdapter,
  AgentAdapterConfig,
  AgentAdapterFactory,
  AgentAdapterMeta,
} from './types.js';

/**
 * Registered adapter entry with its factory and metadata
 */
interface RegisteredAdapter {
  factory: AgentAdapterFactory;
  meta: AgentAdapterMeta;
}

export class AgentRegistry {
  private adapters = new Map<string, RegisteredAdapter>();

  /**
   * Register an adapter factory. A later registration under the same id wins.
   */
  register(factory: AgentAdapterFactory): void {
    const { meta } = factory();
    this.adapters.set(meta.id, { factory, meta });
  }

  hasAdapter(id: string): boolean {
    return this.adapters.has(id);
  }

  getRegisteredAdapters(): AgentAdapterMeta[] {
    return Array.from(this.adapters.values()).map((entry) => entry.meta);
  }

  /**
   * Create and initialize an adapter for one run.
   * @throws ConfigurationError when the plugin id is unknown
   */
  async createAdapter(config: AgentAdapterConfig): Promise<AgentAdapter> {
    const registered = this.adapters.get(config.plugin);
    if (!registered) {
      const known = [...this.adapters.keys()].join(', ');
      throw new ConfigurationError(`Unknown agent plugin '${config.plugin}' (available: ${known})`);
    }
    const adapter = registered.factory();
    await adapter.initialize(config);
    return adapter;
  }
}

/**
 * A registry holding every bundled adapter.
 */
export function createAgentRegistry(): AgentRegistry {
  const registry = new AgentRegistry();
  registerBuiltinAgents(registry);
  return registry;
}
