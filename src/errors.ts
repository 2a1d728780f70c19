/**
 * @fileoverview Error taxonomy for session management.
 *
 * Start failures (spawn, bootstrap read) are thrown to the caller of
 * TidalSession.start(). Write and pump failures never cross that boundary:
 * they are delivered to fault handlers.
 *
 * @module errors
 */

export type TidalErrorKind =
  | 'spawn'
  | 'bootstrap_read'
  | 'write'
  | 'pump_fault'
  | 'session_state'
  | 'config';

export class TidalError extends Error {
  readonly kind: TidalErrorKind;

  constructor(kind: TidalErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TidalError';
    this.kind = kind;
  }
}

/** Executable missing or not launchable */
export class SpawnError extends TidalError {
  readonly command: string;

  constructor(command: string, cause?: unknown) {
    super('spawn', `Failed to start ${command}: ${getErrorMessage(cause)}`, { cause });
    this.name = 'SpawnError';
    this.command = command;
  }
}

/** Bootstrap script missing or unreadable */
export class BootstrapReadError extends TidalError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super('bootstrap_read', `Failed to read boot script ${path}: ${getErrorMessage(cause)}`, { cause });
    this.name = 'BootstrapReadError';
    this.path = path;
  }
}

/** Interpreter stdin closed or broken during a send */
export class WriteError extends TidalError {
  constructor(message: string, cause?: unknown) {
    super('write', message, { cause });
    this.name = 'WriteError';
  }
}

/** Unexpected failure while draining interpreter output */
export class PumpFaultError extends TidalError {
  constructor(cause: unknown) {
    super('pump_fault', `Output pump stopped: ${getErrorMessage(cause)}`, { cause });
    this.name = 'PumpFaultError';
  }
}

/** Operation not allowed in the session's current phase */
export class SessionStateError extends TidalError {
  constructor(message: string) {
    super('session_state', message);
    this.name = 'SessionStateError';
  }
}

export class ConfigError extends TidalError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('config', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
