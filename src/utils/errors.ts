/**
 * Failure kinds every operation reports. Anything not classified here
 * becomes `InternalFailure` at the operation boundary.
 */
export type FailureKind = 'InvalidInput' | 'NotFound' | 'Conflict' | 'InternalFailure';

export const INTERNAL_FAILURE_MESSAGE = 'Internal error while processing the request';

export class AppError extends Error {
  constructor(
    public readonly kind: FailureKind,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends AppError {
  constructor(public readonly violations: string[]) {
    super('InvalidInput', violations.join(', '));
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NotFound', message);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super('Conflict', message);
  }
}

// PostgreSQL SQLSTATE for unique_violation
export const UNIQUE_VIOLATION = '23505';

export const isUniqueViolation = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;

export const describeError = (error: unknown): { error: string; stack?: string } =>
  error instanceof Error ? { error: error.message, stack: error.stack } : { error: String(error) };
