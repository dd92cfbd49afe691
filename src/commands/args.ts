/**
 * ABOUTME: Small helpers shared by the hand-parsed command line parsers.
 */

import { ConfigurationError } from '../errors.js';

/**
 * Value following a flag, or a ConfigurationError when it is missing.
 */
export function readFlagValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new ConfigurationError(`${flag} requires a value`);
  }
  return value;
}

/**
 * Parse a numeric flag value.
 */
export function parseNumberFlag(value: string, flag: string, { integer = false } = {}): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || (integer && !Number.isInteger(parsed))) {
    throw new ConfigurationError(`${flag} expects ${integer ? 'an integer' : 'a number'} (got '${value}')`);
  }
  return parsed;
}

/**
 * Print every problem of a ConfigurationError to stderr.
 */
export function printConfigurationError(error: ConfigurationError): void {
  console.error(error.problems.length === 1 ? 'Configuration error:' : 'Configuration errors:');
  for (const problem of error.problems) {
    console.error(`  • ${problem}`);
  }
}
