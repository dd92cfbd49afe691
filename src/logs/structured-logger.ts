/**
 * ABOUTME: Structured logger for runs and the CLI.
 * Provides consistent log format: [timestamp] [level] [component] message
 * Lines can also be teed into a run's own log file.
 */

import { formatDuration } from '../utils/logger.js';

/**
 * Log levels supported by the structured logger.
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * Log components that categorize log messages.
 */
export type LogComponent =
  | 'progress' // Iteration progress updates
  | 'agent' // Agent output (stdout/stderr)
  | 'engine' // Run lifecycle events
  | 'verify' // Verification results
  | 'manifest' // Manifest and audit trail writes
  | 'pool' // Concurrent run scheduling
  | 'system'; // System-level messages

/**
 * Configuration for the structured logger.
 */
export interface StructuredLoggerConfig {
  /** Minimum log level to output (default: INFO) */
  minLevel?: LogLevel;

  /** Include timestamps in output (default: true) */
  showTimestamp?: boolean;

  /** Use ISO8601 format for timestamps (default: false, uses HH:mm:ss) */
  isoTimestamp?: boolean;

  /** Stream to write logs to (default: process.stdout) */
  stream?: NodeJS.WritableStream;

  /** Stream to write error logs to (default: process.stderr) */
  errorStream?: NodeJS.WritableStream;

  /** Prefix added after the component, e.g. the run id when runs interleave */
  label?: string;
}

/**
 * Level priority for filtering.
 */
const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value);
}

/**
 * Format timestamp for log output.
 */
function formatTimestamp(date: Date, iso: boolean): string {
  if (iso) {
    return date.toISOString();
  }

  // HH:mm:ss format
  const hours = date.getHours().toString().padStart(2, '0');
  const minutes = date.getMinutes().toString().padStart(2, '0');
  const seconds = date.getSeconds().toString().padStart(2, '0');
  return `${hours}:${minutes}:${seconds}`;
}

/**
 * Structured logger.
 * Outputs logs in format: [timestamp] [level] [component] message
 */
export class StructuredLogger {
  private config: Required<Omit<StructuredLoggerConfig, 'label'>> & { label?: string };
  private sinks: NodeJS.WritableStream[] = [];

  constructor(config: StructuredLoggerConfig = {}) {
    this.config = {
      minLevel: config.minLevel ?? 'INFO',
      showTimestamp: config.showTimestamp ?? true,
      isoTimestamp: config.isoTimestamp ?? false,
      stream: config.stream ?? process.stdout,
      errorStream: config.errorStream ?? process.stderr,
      label: config.label,
    };
  }

  /**
   * Derive a logger writing to the same streams under another label.
   */
  child(label: string): StructuredLogger {
    return new StructuredLogger({ ...this.config, label });
  }

  /**
   * Copy every line (unfiltered by level, ISO timestamps) into another stream.
   * Returns a function that detaches the sink.
   */
  tee(sink: NodeJS.WritableStream): () => void {
    this.sinks.push(sink);
    return () => {
      this.sinks = this.sinks.filter((entry) => entry !== sink);
    };
  }

  /**
   * Check if a log level should be output.
   */
  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.config.minLevel];
  }

  /**
   * Build the log prefix: [timestamp] [level] [component] [label]
   */
  private buildPrefix(level: LogLevel, component: LogComponent, timestamp: string | null): string {
    const parts: string[] = [];

    if (timestamp !== null) {
      parts.push(`[${timestamp}]`);
    }

    parts.push(`[${level}]`);
    parts.push(`[${component}]`);
    if (this.config.label) {
      parts.push(`[${this.config.label}]`);
    }

    return parts.join(' ');
  }

  /**
   * Write a log message.
   */
  log(level: LogLevel, component: LogComponent, message: string): void {
    const now = new Date();

    if (this.sinks.length > 0) {
      const fileLine = `${this.buildPrefix(level, component, now.toISOString())} ${message}\n`;
      for (const sink of this.sinks) {
        sink.write(fileLine);
      }
    }

    if (!this.shouldLog(level)) {
      return;
    }

    const timestamp = this.config.showTimestamp
      ? formatTimestamp(now, this.config.isoTimestamp)
      : null;
    const line = `${this.buildPrefix(level, component, timestamp)} ${message}\n`;

    // Use errorStream for ERROR and WARN levels
    if (level === 'ERROR' || level === 'WARN') {
      this.config.errorStream.write(line);
    } else {
      this.config.stream.write(line);
    }
  }

  /**
   * Log an INFO message.
   */
  info(component: LogComponent, message: string): void {
    this.log('INFO', component, message);
  }

  /**
   * Log a WARN message.
   */
  warn(component: LogComponent, message: string): void {
    this.log('WARN', component, message);
  }

  /**
   * Log an ERROR message.
   */
  error(component: LogComponent, message: string): void {
    this.log('ERROR', component, message);
  }

  /**
   * Log a DEBUG message.
   */
  debug(component: LogComponent, message: string): void {
    this.log('DEBUG', component, message);
  }

  /**
   * Log agent stdout output line by line at DEBUG.
   */
  agentOutput(data: string): void {
    for (const line of data.split('\n')) {
      // Skip empty lines to reduce noise
      if (line.trim()) {
        this.debug('agent', line);
      }
    }
  }

  /**
   * Log agent stderr output line by line at DEBUG.
   */
  agentError(data: string): void {
    for (const line of data.split('\n')) {
      if (line.trim()) {
        this.debug('agent', `stderr: ${line}`);
      }
    }
  }

  runStarted(runId: string, taskId: string, agentId: string, workspace: string): void {
    this.info('engine', `Run ${runId} started. Task: ${taskId}, Agent: ${agentId}, Workspace: ${workspace}`);
  }

  /**
   * Format: [INFO] [progress] Iteration X/Y: invoking agent (timeout Ns)
   */
  iterationStarted(iteration: number, maxIterations: number, timeoutMs: number): void {
    this.info(
      'progress',
      `Iteration ${iteration}/${maxIterations}: invoking agent (timeout ${formatDuration(timeoutMs)})`,
    );
  }

  iterationFinished(
    iteration: number,
    classification: string,
    durationMs: number,
    progress: string,
  ): void {
    const message = `Iteration ${iteration} finished: ${classification} in ${formatDuration(durationMs)}, workspace ${progress}`;
    if (classification === 'completed' || classification === 'nonzero_exit') {
      this.info('progress', message);
    } else {
      this.warn('progress', message);
    }
  }

  verificationResult(iteration: number, success: boolean, score: number, message: string): void {
    const line = `Iteration ${iteration} verification ${success ? 'PASSED' : 'FAILED'} (score ${score.toFixed(2)}): ${message}`;
    if (success) {
      this.info('verify', line);
    } else {
      this.warn('verify', line);
    }
  }

  stagnationDetected(iteration: number, limit: number): void {
    this.warn('progress', `Iteration ${iteration}: workspace unchanged across ${limit} observations`);
  }

  runFinished(runId: string, status: string, reason: string | null, iterations: number, elapsedMs: number): void {
    const line = `Run ${runId} ${status} after ${iterations} iteration(s) in ${formatDuration(elapsedMs)}${reason ? `. ${reason}` : ''}`;
    if (status === 'completed') {
      this.info('engine', line);
    } else {
      this.warn('engine', line);
    }
  }
}

/**
 * Create a structured logger with default config.
 */
export function createStructuredLogger(
  config?: StructuredLoggerConfig,
): StructuredLogger {
  return new StructuredLogger(config);
}
