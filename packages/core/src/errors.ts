export type PersistenceErrorKind =
  | 'config'
  | 'connection'
  | 'serialization'
  | 'invalid_state'
  | 'timeout'
  | 'cancelled';

export abstract class PersistenceError extends Error {
  public readonly kind: PersistenceErrorKind;

  protected constructor(kind: PersistenceErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

export class ConfigError extends PersistenceError {
  public constructor(message: string, options?: ErrorOptions) {
    super('config', message, options);
  }
}

export class UnsupportedBackendError extends ConfigError {
  public readonly supportedFormats: readonly string[];

  public constructor(supportedFormats: readonly string[]) {
    super(
      'Unable to detect database backend from connection string. '
      + `Supported formats: ${supportedFormats.join(', ')}`
    );
    this.supportedFormats = supportedFormats;
  }
}

export class ConnectionError extends PersistenceError {
  public constructor(message: string, options?: ErrorOptions) {
    super('connection', message, options);
  }
}

export class SerializationError extends PersistenceError {
  public constructor(message: string, options?: ErrorOptions) {
    super('serialization', message, options);
  }
}

export class InvalidStateError extends PersistenceError {
  public constructor(message: string) {
    super('invalid_state', message);
  }
}

export class TimeoutError extends PersistenceError {
  public readonly timeoutMs: number;

  public constructor(label: string, timeoutMs: number) {
    super('timeout', `${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class CancelledError extends PersistenceError {
  public constructor(label: string, options?: ErrorOptions) {
    super('cancelled', `${label} was cancelled`, options);
  }
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}

/** Errors raised by the caller's own deadline, signal or misuse rather than by the backend. */
export function isCallerError(error: unknown): boolean {
  return error instanceof InvalidStateError
    || error instanceof TimeoutError
    || error instanceof CancelledError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
