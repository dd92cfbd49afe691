/**
 * ABOUTME: Configuration commands for loopbench.
 * Provides 'config show' to display merged configuration with source info.
 */

import { resolve } from 'node:path';
import { ConfigurationError } from '../errors.js';
import {
  DEFAULT_CONFIG,
  GLOBAL_CONFIG_PATH,
  loadStoredConfigWithSource,
  serializeConfig,
  type ConfigSource,
  type StoredConfig,
} from '../config/index.js';
import { CONFIG_FILE, CONTROL_DIR } from '../workspace/paths.js';
import { printConfigurationError } from './args.js';
import type { CommandContext } from './run.js';

/**
 * Format a section header with box-drawing characters.
 */
function sectionHeader(title: string): string {
  return `\n┌─ ${title} ${'─'.repeat(Math.max(0, 50 - title.length))}\n`;
}

/**
 * Format config source information for display.
 */
export function formatSourceInfo(source: ConfigSource, globalPath: string = GLOBAL_CONFIG_PATH): string {
  const lines: string[] = [];

  lines.push(sectionHeader('Configuration Sources'));

  lines.push('│ Global config:');
  if (source.globalPath) {
    lines.push(`│   ✓ ${source.globalPath}`);
  } else {
    lines.push(`│   ○ ${globalPath} (not found)`);
  }

  lines.push('│ Project config:');
  if (source.projectPath) {
    lines.push(`│   ✓ ${source.projectPath}`);
  } else {
    lines.push(`│   ○ ${CONTROL_DIR}/${CONFIG_FILE} (not found in project tree)`);
  }

  lines.push('└' + '─'.repeat(55));

  return lines.join('\n');
}

/**
 * Format the merged configuration as boxed TOML.
 */
export function formatMergedConfig(config: StoredConfig): string {
  const lines: string[] = [];

  lines.push(sectionHeader('Merged Configuration'));

  if (Object.keys(config).length === 0) {
    lines.push('│ (no configuration set - using defaults)');
    lines.push('│');
    lines.push('│ Defaults:');
    lines.push(`│   agent = "${DEFAULT_CONFIG.agent}"`);
    lines.push(`│   maxIterations = ${DEFAULT_CONFIG.maxIterations}`);
    lines.push(`│   totalTimeoutSeconds = ${DEFAULT_CONFIG.totalTimeoutSeconds}`);
    lines.push(`│   iterationTimeoutSeconds = ${DEFAULT_CONFIG.iterationTimeoutSeconds}`);
    lines.push(`│   stagnationLimit = ${DEFAULT_CONFIG.stagnationLimit}`);
    lines.push(`│   maxWorkers = ${DEFAULT_CONFIG.maxWorkers}`);
  } else {
    for (const line of serializeConfig(config).split('\n')) {
      if (line.trim()) {
        lines.push(`│ ${line}`);
      }
    }
  }

  lines.push('└' + '─'.repeat(55));

  return lines.join('\n');
}

function readCwdFlag(args: readonly string[], fallback: string): string {
  const index = args.indexOf('--cwd');
  if (index === -1) return fallback;
  const value = args[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new ConfigurationError('--cwd requires a value');
  }
  return resolve(fallback, value);
}

/**
 * Execute the 'config show' command.
 * Displays merged configuration from global and project sources.
 */
export async function executeConfigShowCommand(args: string[], context: CommandContext = {}): Promise<number> {
  const showSources = args.includes('--sources') || args.includes('-s');
  const showToml = args.includes('--toml') || args.includes('-t');
  const globalPath = context.globalConfigPath ?? GLOBAL_CONFIG_PATH;

  let loaded: { config: StoredConfig; source: ConfigSource };
  try {
    const cwd = readCwdFlag(args, context.cwd ?? process.cwd());
    loaded = await loadStoredConfigWithSource(cwd, globalPath);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printConfigurationError(error);
      return 2;
    }
    throw error;
  }
  const { config, source } = loaded;

  if (showToml) {
    // Raw TOML output (machine-readable)
    if (showSources) {
      console.log(formatSourceInfo(source, globalPath));
    }
    console.log(serializeConfig(config));
    return 0;
  }

  console.log('loopbench configuration');
  console.log('═'.repeat(56));
  console.log(formatSourceInfo(source, globalPath));
  console.log(formatMergedConfig(config));
  console.log('\nHint: Use --toml for raw TOML output');
  return 0;
}

/**
 * Print help for config commands.
 */
export function printConfigHelp(): void {
  console.log(`
loopbench configuration commands

Usage: loopbench config <command> [options]

Commands:
  show              Display merged configuration
  help              Show this help message

Show Options:
  --sources, -s     With --toml, also show configuration source files
  --toml, -t        Output raw TOML (machine-readable)
  --cwd <path>      Use specified directory for project config lookup

Configuration Files:
  Global:   ${GLOBAL_CONFIG_PATH}
  Project:  ${CONTROL_DIR}/${CONFIG_FILE} (in project root or any parent directory)

Project config overrides global config. CLI flags override both.

Example config.toml:
  agent = "claude-opus"
  maxIterations = 8
  totalTimeoutSeconds = 1800
  iterationTimeoutSeconds = 600
  stagnationLimit = 3

  [[agents]]
  name = "claude-opus"
  plugin = "claude"
  model = "opus"

  [verification]
  command = "npm test"
  timeoutSeconds = 120

  [fingerprint]
  exclude = ["node_modules/**", "*.log"]
`);
}

/**
 * Execute a config subcommand.
 */
export async function executeConfigCommand(args: string[], context: CommandContext = {}): Promise<number> {
  const subcommand = args[0];

  if (!subcommand || subcommand === 'help' || subcommand === '--help') {
    printConfigHelp();
    return 0;
  }

  if (subcommand === 'show') {
    return executeConfigShowCommand(args.slice(1), context);
  }

  console.error(`Unknown config command: ${subcommand}`);
  console.log('Run "loopbench config help" for available commands');
  return 2;
}
