/* eslint-disable max-classes-per-file */ // This file creates multiple tag classes

export class HttpError extends Error {
  code: number;

  constructor(code: number, message: string) {
    super(message);
    this.code = code;
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'The requested resource could not be found') {
    super(404, message);
  }
}

export class ServerError extends HttpError {
  constructor(message = 'An unexpected error occurred') {
    super(500, message);
  }
}

export class RequestValidationError extends HttpError {
  constructor(message = 'Invalid request') {
    super(400, message);
  }
}

/**
 * Exception codes defined by the OGC WCS 1.0.0 standard, Table 5
 */
export enum WcsExceptionCode {
  MissingParameterValue = 'MissingParameterValue',
  InvalidParameterValue = 'InvalidParameterValue',
  InvalidFormat = 'InvalidFormat',
  CoverageNotDefined = 'CoverageNotDefined',
  CurrentUpdateSequence = 'CurrentUpdateSequence',
  InvalidUpdateSequence = 'InvalidUpdateSequence',
}

/**
 * A single WCS validation failure: the offending parameter(s), the OGC code to report,
 * and a message for the client
 */
export interface ValidationFailure {
  fields: string[];
  code: WcsExceptionCode;
  message: string;
}

/**
 * Result of an operation that fails with a WCS validation failure instead of throwing
 */
export type Outcome<T> = { ok: true; value: T } | { ok: false; failure: ValidationFailure };

/**
 * Returns a successful outcome wrapping the given value
 *
 * @param value - the successful result
 */
export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

/**
 * Returns a failed outcome for the given fields
 *
 * @param code - the OGC exception code
 * @param fields - the request parameter(s) the failure applies to
 * @param message - a human-readable description
 */
export function fail<T>(code: WcsExceptionCode, fields: string[], message: string): Outcome<T> {
  return { ok: false, failure: { code, fields, message } };
}

/**
 * Error carrying a WCS exception code, rendered to clients as a ServiceExceptionReport
 */
export class WcsException extends RequestValidationError {
  exceptionCode: WcsExceptionCode;

  locator: string;

  constructor(exceptionCode: WcsExceptionCode, message: string, locator = '') {
    super(message);
    this.exceptionCode = exceptionCode;
    this.locator = locator;
  }

  /**
   * Builds the exception to throw for a validation failure
   *
   * @param failure - the failure produced by a validator
   * @returns the exception
   */
  static fromFailure(failure: ValidationFailure): WcsException {
    return new WcsException(failure.code, failure.message, failure.fields.join(','));
  }
}

/**
 * Returns the value of a successful outcome, throwing the corresponding WcsException
 * for a failed one
 *
 * @param outcome - the outcome to unwrap
 * @returns the successful value
 * @throws WcsException - if the outcome is a failure
 */
export function unwrap<T>(outcome: Outcome<T>): T {
  if (!outcome.ok) {
    throw WcsException.fromFailure(outcome.failure);
  }
  return outcome.value;
}
