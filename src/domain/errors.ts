/**
 * Error taxonomy for the bridge.
 *
 * Only `AlreadyRunningError` and `FatalConnectionError` are meant to
 * reach the process entry point; the rest are handled by the component
 * that raises them.
 */

export type BridgeErrorCode =
  | 'MALFORMED_ENTRY'
  | 'ALREADY_RUNNING'
  | 'FATAL_CONNECTION'
  | 'CONFIG_INVALID'
  | 'SHUTDOWN';

export abstract class BridgeError extends Error {
  abstract readonly code: BridgeErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A popped queue entry that cannot be decoded. Never retried. */
export class MalformedEntryError extends BridgeError {
  readonly code = 'MALFORMED_ENTRY';

  constructor(
    message: string,
    readonly raw: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Another live process holds the instance lock. */
export class AlreadyRunningError extends BridgeError {
  readonly code = 'ALREADY_RUNNING';

  constructor(readonly pid: number, readonly lockPath: string) {
    super(`Another bridge instance is running (PID ${pid}, lock ${lockPath})`);
  }
}

/** Reconnect budget exhausted, or a session dropped with auto-reconnect off. */
export class FatalConnectionError extends BridgeError {
  readonly code = 'FATAL_CONNECTION';

  constructor(message: string, readonly attempts: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ConfigError extends BridgeError {
  readonly code = 'CONFIG_INVALID';
}

/** A wait was cut short by the shutdown signal. */
export class ShutdownError extends BridgeError {
  readonly code = 'SHUTDOWN';

  constructor() {
    super('Shutdown requested');
  }
}

/** Renders any thrown value as a one-line description for `last_error`. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
