/**
 * Structured error classes for the RTM client.
 */

/**
 * Error codes used throughout the library.
 */
export const ErrorCode = {
  INVALID_RUNNING_STATE: 'INVALID_RUNNING_STATE',
  HANDSHAKE_TIMEOUT: 'HANDSHAKE_TIMEOUT',
  CONNECTION_FAILED: 'CONNECTION_FAILED',
  TRANSPORT_FAULT: 'TRANSPORT_FAULT',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  MESSAGE_TOO_LARGE: 'MESSAGE_TOO_LARGE',
  GATEWAY_FAILED: 'GATEWAY_FAILED',
} as const;

/**
 * Type representing valid error codes.
 */
export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class with code property.
 */
abstract class BaseError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or transmission.
   */
  toJSON() {
    return {
      message: this.message,
      name: this.name,
      code: this.code,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when an operation is attempted outside the run state it requires.
 */
export class InvalidRunningStateError extends BaseError {
  readonly code = 'INVALID_RUNNING_STATE' as const;

  constructor(current: string, allowed: string) {
    super(`Invalid run state: currently '${current}' but only '${allowed}' is allowed`);
  }
}

/**
 * The WebSocket handshake did not complete within the connect timeout.
 */
export class HandshakeTimeoutError extends BaseError {
  readonly code = 'HANDSHAKE_TIMEOUT' as const;

  constructor(url: string, timeoutMs: number) {
    super(`Connection to '${url}' timed out after ${timeoutMs}ms`);
  }
}

/**
 * The WebSocket handshake failed for a reason other than the timeout.
 */
export class ConnectionError extends BaseError {
  readonly code = 'CONNECTION_FAILED' as const;

  constructor(message = 'Connection failed', options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * I/O error on an open connection.
 */
export class TransportFaultError extends BaseError {
  readonly code = 'TRANSPORT_FAULT' as const;

  constructor(message = 'Transport fault', options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Thrown when a payload does not match its schema.
 */
export class ValidationError extends BaseError {
  readonly code = 'VALIDATION_FAILED' as const;

  constructor(message: string, options?: ErrorOptions) {
    super(`Validation failed! ${message}`, options);
  }
}

/**
 * A reassembled message grew past `maxMessageBytes`.
 */
export class MessageTooLargeError extends BaseError {
  readonly code = 'MESSAGE_TOO_LARGE' as const;

  constructor(size: number, limit: number) {
    super(`Message of at least ${size} bytes exceeds the ${limit} byte limit`);
  }
}

/**
 * The web API gateway did not hand out a usable WebSocket URL.
 */
export class GatewayError extends BaseError {
  readonly code = 'GATEWAY_FAILED' as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Type guard for errors with a code property.
 */
export function hasErrorCode(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Extract error code safely, returning undefined if not present.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (hasErrorCode(err)) {
    return err.code;
  }
  return undefined;
}

/**
 * Normalize a thrown value into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
