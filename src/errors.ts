/**
 * Structured error classes for negotiation, transports and hub sessions.
 */

import type { HubMessage } from './wire.ts';

/**
 * Error codes used throughout the library.
 */
export const ErrorCode = {
  NEGOTIATION_FAILED: 'NEGOTIATION_FAILED',
  TRANSPORT_FAILED: 'TRANSPORT_FAILED',
  CONNECTION_FAILED: 'CONNECTION_FAILED',
  PROTOCOL_ERROR: 'PROTOCOL_ERROR',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  CANCELLED: 'CANCELLED',
  WRITE_FAILED: 'WRITE_FAILED',
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

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }

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
 * Thrown when the negotiate handshake gets a non-200 status or an unusable
 * body. Failures of the HTTP client itself propagate unchanged.
 */
export class NegotiationError extends BaseError {
  readonly code = 'NEGOTIATION_FAILED' as const;
}

/**
 * Thrown when the selected transport cannot be established.
 */
export class TransportError extends BaseError {
  readonly code = 'TRANSPORT_FAILED' as const;
}

/**
 * Thrown when an established connection can no longer be read from or
 * written to.
 */
export class ConnectionError extends BaseError {
  readonly code = 'CONNECTION_FAILED' as const;

  constructor(message = 'Connection failed', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Thrown when a hub frame cannot be parsed.
 */
export class ProtocolError extends BaseError {
  readonly code = 'PROTOCOL_ERROR' as const;
  /** Bytes the malformed frame occupied, separator included; 0 when unknown. */
  readonly consumed: number;

  constructor(message: string, options?: { cause?: unknown; consumed?: number }) {
    super(message, options);
    this.consumed = options?.consumed ?? 0;
  }
}

/**
 * Thrown when schema validation fails.
 */
export class ValidationError extends BaseError {
  readonly code = 'VALIDATION_FAILED' as const;

  constructor(message: string) {
    super(`Validation failed! ${message}`);
  }
}

/**
 * Rejection reason of every operation interrupted by `HubConnection.abort()`.
 */
export class CancelledError extends BaseError {
  readonly code = 'CANCELLED' as const;

  constructor(message = 'Hub connection aborted') {
    super(message);
  }
}

/**
 * Thrown by the hub senders. Carries the message that was being sent so the
 * caller can still correlate it.
 */
export class MessageWriteError<T extends HubMessage = HubMessage> extends BaseError {
  readonly code = 'WRITE_FAILED' as const;
  readonly hubMessage: T;

  constructor(hubMessage: T, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write message of type ${hubMessage.type}: ${reason}`, { cause });
    this.hubMessage = hubMessage;
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
 * Whether an error means the hub connection was aborted rather than an I/O
 * failure.
 */
export function isCancellation(err: unknown): boolean {
  if (err instanceof CancelledError) return true;
  return err instanceof MessageWriteError && err.cause instanceof CancelledError;
}
