/**
 * ABOUTME: Agents command for loopbench.
 * Lists the built-in adapter plugins and the agents configured in config.toml.
 */

import { ConfigurationError } from '../errors.js';
import { GLOBAL_CONFIG_PATH, loadStoredConfig, type StoredConfig } from '../config/index.js';
import { createAgentRegistry } from '../plugins/agents/registry.js';
import type { AgentAdapterMeta } from '../plugins/agents/types.js';
import { printConfigurationError } from './args.js';
import type { CommandContext } from './run.js';

/**
 * Lines listing adapters and configured agents.
 */
export function formatAgentList(adapters: readonly AgentAdapterMeta[], config: StoredConfig): string[] {
  const lines = ['Agent plugins:'];
  for (const meta of adapters) {
    const command = meta.defaultCommand ? ` (runs '${meta.defaultCommand}')` : '';
    lines.push(`  ${meta.id.padEnd(10)} ${meta.description}${command}`);
  }

  const configured = config.agents ?? [];
  lines.push('');
  if (configured.length === 0) {
    lines.push('No agents configured; runs select a plugin id with --agent.');
  } else {
    lines.push('Configured agents:');
    for (const agent of configured) {
      const marker = agent.name === config.agent ? '*' : ' ';
      const model = agent.model ? `, model ${agent.model}` : '';
      lines.push(` ${marker} ${agent.name.padEnd(12)} plugin ${agent.plugin}${model}`);
    }
  }
  return lines;
}

export async function executeAgentsCommand(args: string[], context: CommandContext = {}): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log('Usage: loopbench agents\n\nList agent plugins and the agents configured in config.toml.');
    return 0;
  }

  let config: StoredConfig;
  try {
    config = await loadStoredConfig(context.cwd ?? process.cwd(), context.globalConfigPath ?? GLOBAL_CONFIG_PATH);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printConfigurationError(error);
      return 2;
    }
    throw error;
  }

  const registry = context.registry ?? createAgentRegistry();
  for (const line of formatAgentList(registry.getRegisteredAdapters(), config)) {
    console.log(line);
  }
  return 0;
}
