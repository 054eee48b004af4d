// src/errors.ts
// Precondition failures. All are thrown synchronously and never retried.

export type ErrorCode =
  | 'INVALID_PATTERN'
  | 'EMPTY_POOL'
  | 'COUNT_MISMATCH'
  | 'INVALID_CONFIG'
  | 'ENGINE_BUSY';

export class MemeSimError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

// wrong length or a non-binary element
export class InvalidPatternError extends MemeSimError {
  constructor(message: string) {
    super('INVALID_PATTERN', message);
  }
}

// capacity below 1, or an agent built with no memes
export class EmptyPoolViolationError extends MemeSimError {
  constructor(message: string) {
    super('EMPTY_POOL', message);
  }
}

// replaceAll called with anything other than N*N agents in canonical order
export class CountMismatchError extends MemeSimError {
  constructor(message: string) {
    super('COUNT_MISMATCH', message);
  }
}

export class ConfigurationError extends MemeSimError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

// step() entered again before the running step returned
export class EngineBusyError extends MemeSimError {
  constructor(message: string) {
    super('ENGINE_BUSY', message);
  }
}
