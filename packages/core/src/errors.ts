/**
 * The core's two error classes. Policy outcomes (`review`, `fail`) are results,
 * never errors.
 */

/** Malformed or out-of-domain input, detected before any rule runs. */
export class ValidationError extends Error {
  readonly code = 'validation_error';

  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(`${field}: ${message}`);
    this.name = 'ValidationError';
  }
}

/** A defect inside an evaluator or the scorer. Always surfaced. */
export class InternalError extends Error {
  readonly code = 'internal_error';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InternalError';
  }
}
