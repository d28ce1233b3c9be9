/**
 * Error taxonomy
 *
 * MissingDataError is recoverable and degrades a single sub-model.
 * InvalidInputError rejects the one request that carried the bad input.
 */

export type AnalyticsErrorCode = 'MISSING_DATA' | 'INVALID_INPUT';

export class AnalyticsError extends Error {
  readonly code: AnalyticsErrorCode;

  constructor(code: AnalyticsErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MissingDataError extends AnalyticsError {
  readonly source: string;

  constructor(source: string, message: string) {
    super('MISSING_DATA', message);
    this.source = source;
  }
}

export class InvalidInputError extends AnalyticsError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('INVALID_INPUT', message);
    this.field = field;
  }
}

export function isInvalidInput(error: unknown): error is InvalidInputError {
  return error instanceof InvalidInputError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
