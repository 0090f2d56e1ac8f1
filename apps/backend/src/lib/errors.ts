export class PortfolioError extends Error {
  constructor(public readonly message: string, public readonly code = 'INTERNAL_ERROR', public readonly details?: unknown) {
    super(message);
    this.name = 'PortfolioError';
  }
}

export class NotFoundError extends PortfolioError {
  constructor(message = 'Resource not found', details?: unknown) {
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends PortfolioError {
  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Raised when a unique index rejects a write, and by explicit creates that
 * find the key already taken.
 *
 * `index` names the violated unique index when it is known. Callers that
 * recover from a duplicate check it, so a collision on some other index is
 * never mistaken for the one they expect.
 */
export class DuplicateKeyError extends PortfolioError {
  constructor(message = 'Duplicate key', details?: unknown, public readonly index: string | null = null) {
    super(message, 'DUPLICATE_KEY', details);
    this.name = 'DuplicateKeyError';
  }
}

/**
 * Whether `error` is a duplicate on the named unique index.
 */
export function isDuplicateOn(error: unknown, index: string): error is DuplicateKeyError {
  return error instanceof DuplicateKeyError && error.index === index;
}

/**
 * Turn a duplicate on an index the caller does not own into a plain failure.
 *
 * The error handler answers DuplicateKeyError with 400; a collision on an id
 * or seed index is a store fault and must answer 500 instead. Other errors
 * pass through unchanged.
 */
export function escalateDuplicate(error: unknown): unknown {
  if (error instanceof DuplicateKeyError) {
    return new Error(`Unexpected duplicate key on index ${error.index ?? 'unknown'}`, { cause: error });
  }
  return error;
}

export class UnauthorizedError extends PortfolioError {
  constructor(message = 'Unauthorized', details?: unknown) {
    super(message, 'UNAUTHORIZED', details);
    this.name = 'UnauthorizedError';
  }
}
