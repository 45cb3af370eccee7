/**
 * Error taxonomy shared by every action
 */

export type ErrorKind =
  | 'SchemaError'
  | 'ValidationError'
  | 'EvaluationError'
  | 'ParseError'
  | 'ConflictError'
  | 'RangeError'
  | 'IOError';

/**
 * Exit status reported for each kind of failure
 */
export const EXIT_CODES: Record<ErrorKind, number> = {
  SchemaError: 2,
  ValidationError: 3,
  EvaluationError: 4,
  ParseError: 5,
  ConflictError: 6,
  RangeError: 7,
  IOError: 8
};

export interface ErrorDetails {
  parameter?: string;
  value?: string;
  cause?: unknown;
}

/**
 * Base class for every expected failure of an action.
 * `action` is filled in by the dispatcher once the error leaves the transform.
 */
export class ActionError extends Error {
  readonly kind: ErrorKind;
  readonly parameter?: string;
  readonly value?: string;
  action?: string;

  constructor(kind: ErrorKind, message: string, details: ErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = kind;
    this.kind = kind;
    this.parameter = details.parameter;
    this.value = details.value;
  }

  get exitCode(): number {
    return EXIT_CODES[this.kind];
  }
}

/** A referenced column or sheet does not exist. */
export class SchemaError extends ActionError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('SchemaError', message, details);
  }
}

/** A parameter value is outside its allowed set. */
export class ValidationError extends ActionError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('ValidationError', message, details);
  }
}

/** A calculate expression cannot be evaluated. */
export class EvaluationError extends ActionError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('EvaluationError', message, details);
  }
}

/** A structured parameter does not follow its syntax. */
export class ParseError extends ActionError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('ParseError', message, details);
  }
}

/** The action would overwrite something that already exists. */
export class ConflictError extends ActionError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('ConflictError', message, details);
  }
}

/** A cell address lies outside the sheet. */
export class CellRangeError extends ActionError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('RangeError', message, details);
  }
}

/** An input could not be read or the output could not be written. */
export class FileIOError extends ActionError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('IOError', message, details);
  }
}
