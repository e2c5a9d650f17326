/**
 * Error taxonomy for the control layer.
 *
 * Only `ValidationError`, `NoTransportError` and `UnauthenticatedError` are
 * ever thrown to callers. The parse and unknown-field/topic errors are
 * returned as values or logged.
 */

export type OasisErrorCode =
  | 'PARSE_ERROR'
  | 'VALIDATION_ERROR'
  | 'NO_TRANSPORT'
  | 'UNAUTHENTICATED'
  | 'UNKNOWN_FIELD'
  | 'UNKNOWN_TOPIC';

export class OasisError extends Error {
  constructor(
    message: string,
    public readonly code: OasisErrorCode
  ) {
    super(message);
    this.name = 'OasisError';

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** Malformed wire data. */
export class ParseError extends OasisError {
  constructor(
    message: string,
    public readonly raw?: string
  ) {
    super(message, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

/** A command parameter outside the range the device accepts. */
export class ValidationError extends OasisError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class NoTransportError extends OasisError {
  constructor(serialNumber: string | null) {
    super(`No transport attached for device ${JSON.stringify(serialNumber)}`, 'NO_TRANSPORT');
    this.name = 'NoTransportError';
  }
}

export class UnauthenticatedError extends OasisError {
  constructor(message = 'Unauthenticated') {
    super(message, 'UNAUTHENTICATED');
    this.name = 'UnauthenticatedError';
  }
}

export class UnknownFieldError extends OasisError {
  constructor(
    public readonly field: string,
    public readonly value: unknown
  ) {
    super(`Unknown field: ${field}=${JSON.stringify(value)}`, 'UNKNOWN_FIELD');
    this.name = 'UnknownFieldError';
  }
}

export class UnknownTopicError extends OasisError {
  constructor(
    public readonly suffix: string,
    public readonly payload: string
  ) {
    super(`Unknown status topic: ${suffix}=${payload}`, 'UNKNOWN_TOPIC');
    this.name = 'UnknownTopicError';
  }
}
