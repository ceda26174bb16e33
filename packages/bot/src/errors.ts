/**
 * Bot error hierarchy.
 *
 * Handlers signal typed failures by throwing these; the dispatcher turns
 * them into single-line replies.
 */

/** Base error for all bot errors. */
export class BotError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = 'BotError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type NetworkErrorKind = 'timeout' | 'unreachable' | 'status' | 'invalid-response';

/** Raised when an external service call fails. Reported by category only. */
export class NetworkError extends BotError {
  readonly kind: NetworkErrorKind;
  readonly status?: number;

  constructor(kind: NetworkErrorKind, message?: string, status?: number) {
    super(message ?? kind);
    this.name = 'NetworkError';
    this.kind = kind;
    this.status = status;
  }
}

/** Raised when a handler runs past its time budget. */
export class HandlerTimeoutError extends BotError {
  readonly command: string;
  readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`Command '${command}' timed out after ${timeoutMs}ms`);
    this.name = 'HandlerTimeoutError';
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

/** Raised by a fail-fast registry when two command sets claim the same name. */
export class CommandCollisionError extends BotError {
  readonly command: string;
  readonly sources: [string, string];

  constructor(command: string, existingSource: string, newSource: string) {
    super(`Command '${command}' from '${newSource}' collides with '${existingSource}'`);
    this.name = 'CommandCollisionError';
    this.command = command;
    this.sources = [existingSource, newSource];
  }
}

/** Raised when a command spec is malformed. */
export class InvalidCommandError extends BotError {
  constructor(message?: string) {
    super(message);
    this.name = 'InvalidCommandError';
  }
}

/** Raised when configuration cannot be read or validated. */
export class ConfigError extends BotError {
  constructor(message?: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Single-line, detail-free reply for a failed command.
 */
export function describeFailure(error: unknown): string {
  if (error instanceof NetworkError) {
    return `❌ Network error: ${error.kind}`;
  }
  const name = error instanceof Error ? error.name : 'Error';
  return `❌ Error: ${name}`;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
