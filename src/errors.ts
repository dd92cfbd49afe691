/**
 * ABOUTME: Error classes shared across loopbench.
 * Expected run outcomes are never thrown; these cover configuration problems,
 * unreadable manifests and programming errors in the lifecycle.
 */

/**
 * Base class for every error loopbench throws on purpose.
 */
export class LoopbenchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A run cannot start: invalid limits, missing executable, unwritable workspace.
 * Carries every problem found, not just the first.
 */
export class ConfigurationError extends LoopbenchError {
  readonly problems: readonly string[];

  constructor(problems: string | readonly string[], options?: { cause?: unknown }) {
    const list = typeof problems === 'string' ? [problems] : [...problems];
    super(
      list.length === 1
        ? `Configuration error: ${list[0]}`
        : `Configuration errors:\n${list.map((problem) => `  - ${problem}`).join('\n')}`,
      options,
    );
    this.problems = list;
  }
}

/**
 * The manifest file is missing, unparseable or fails validation.
 */
export class ManifestError extends LoopbenchError {
  readonly path: string | undefined;

  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super(path ? `${message} (${path})` : message, options);
    this.path = path;
  }
}

/**
 * A lifecycle transition that the state machine does not allow.
 * Indicates a bug in the caller, never an agent outcome.
 */
export class IllegalTransitionError extends LoopbenchError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string, detail?: string) {
    super(`Illegal run transition ${from} -> ${to}${detail ? `: ${detail}` : ''}`);
    this.from = from;
    this.to = to;
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read the `code` property Node attaches to system errors.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
