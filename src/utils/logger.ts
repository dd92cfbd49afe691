/**
 * ABOUTME: Formatting helpers shared by the logger, the CLI and the audit logs.
 */

/**
 * Format duration in milliseconds to human readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes < 60) {
    return remainingSeconds > 0
      ? `${minutes}m ${remainingSeconds}s`
      : `${minutes}m`;
  }

  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return remainingMinutes > 0 ? `${hours}h ${remainingMinutes}m` : `${hours}h`;
}

/**
 * Truncate a string to a maximum length with ellipsis
 */
export function truncate(
  str: string,
  maxLength: number,
  ellipsis = '...',
): string {
  if (str.length <= maxLength) {
    return str;
  }

  return str.slice(0, maxLength - ellipsis.length) + ellipsis;
}

/**
 * Keep the last `maxLength` characters, marking the cut.
 */
export function truncateTail(str: string, maxLength: number): string {
  if (str.length <= maxLength) {
    return str;
  }
  return `...${str.slice(str.length - maxLength)}`;
}

/**
 * Last non-empty line of a block of output, or '' when there is none.
 */
export function lastLine(str: string): string {
  const lines = str.split(/\r?\n/).map((line) => line.trim()).filter(Boolean);
  return lines[lines.length - 1] ?? '';
}
