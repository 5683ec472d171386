/**
 * Error types for the membership filter.
 *
 * InvalidConfigError is the only error a caller can trigger through the
 * public filter API; CorruptFilterError comes from snapshot decoding.
 */

export class FilterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FilterError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidConfigError extends FilterError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid ${field}: ${message}`);
    this.name = 'InvalidConfigError';
    this.field = field;
  }
}

export class CorruptFilterError extends FilterError {
  constructor(message: string) {
    super(`Corrupt filter snapshot: ${message}`);
    this.name = 'CorruptFilterError';
  }
}
