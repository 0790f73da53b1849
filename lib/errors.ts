// lib/errors.ts

export type PreconditionCode =
  | 'empty-graph'
  | 'invalid-attachment'
  | 'fraction-out-of-range'
  | 'insufficient-population'
  | 'invalid-graph'
  | 'invalid-labeling'
  | 'invalid-parameter';

/**
 * Fatal input problem. Raised before any number is computed from the bad input;
 * never retried.
 */
export class PreconditionError extends Error {
  readonly code: PreconditionCode;
  readonly details?: Record<string, unknown>;

  constructor(code: PreconditionCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PreconditionError';
    this.code = code;
    this.details = details;
  }
}

export function isPreconditionError(err: unknown): err is PreconditionError {
  return err instanceof PreconditionError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
