/**
 * Error hierarchy of the blog.
 *
 * Every error raised on purpose extends BlogError, which carries a stable
 * code and the HTTP status the web layer answers with:
 * - ValidationError (submitted form failed its schema)
 * - DuplicateEmailError / DuplicateTitleError (uniqueness rules)
 * - UserNotFoundError / InvalidPasswordError (login failures)
 * - ForbiddenError (authenticated but not the admin)
 * - NotFoundError (missing post or route target)
 * - UniqueViolationError (storage-level unique constraint)
 * - ConfigurationError (invalid or missing environment)
 *
 * @module errors
 */

export enum ErrorCode {
  INTERNAL = 'INTERNAL',
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  DUPLICATE_EMAIL = 'DUPLICATE_EMAIL',
  DUPLICATE_TITLE = 'DUPLICATE_TITLE',
  USER_NOT_FOUND = 'USER_NOT_FOUND',
  INVALID_PASSWORD = 'INVALID_PASSWORD',
  FORBIDDEN = 'FORBIDDEN',
  NOT_FOUND = 'NOT_FOUND',
  UNIQUE_CONSTRAINT = 'UNIQUE_CONSTRAINT',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

/**
 * Base class for all blog errors
 */
export class BlogError extends Error {
  override readonly name: string = 'BlogError';

  constructor(
    message: string,
    readonly code: ErrorCode = ErrorCode.INTERNAL,
    readonly status: number = 500,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Field-level messages produced by form validation, keyed by field name
 */
export type FieldErrors = Record<string, string[]>;

export class ValidationError extends BlogError {
  override readonly name = 'ValidationError';

  constructor(readonly fieldErrors: FieldErrors, message = 'Please correct the highlighted fields.') {
    super(message, ErrorCode.VALIDATION_FAILED, 400);
  }
}

export class DuplicateEmailError extends BlogError {
  override readonly name = 'DuplicateEmailError';

  constructor(readonly email: string, options?: { cause?: unknown }) {
    super("You've already signed up with that email, log in instead!", ErrorCode.DUPLICATE_EMAIL, 409, options);
  }
}

export class DuplicateTitleError extends BlogError {
  override readonly name = 'DuplicateTitleError';

  constructor(readonly title: string, options?: { cause?: unknown }) {
    super('A post with that title already exists.', ErrorCode.DUPLICATE_TITLE, 409, options);
  }
}

export class UserNotFoundError extends BlogError {
  override readonly name = 'UserNotFoundError';

  constructor() {
    super('No user found! Please try again.', ErrorCode.USER_NOT_FOUND, 401);
  }
}

export class InvalidPasswordError extends BlogError {
  override readonly name = 'InvalidPasswordError';

  constructor() {
    super('Invalid Password! Please try again.', ErrorCode.INVALID_PASSWORD, 401);
  }
}

export class ForbiddenError extends BlogError {
  override readonly name = 'ForbiddenError';

  constructor() {
    super('Access denied.', ErrorCode.FORBIDDEN, 403);
  }
}

export class NotFoundError extends BlogError {
  override readonly name = 'NotFoundError';

  constructor(readonly resource: string, readonly id?: number) {
    super(`${resource} not found.`, ErrorCode.NOT_FOUND, 404);
  }
}

export class UniqueViolationError extends BlogError {
  override readonly name = 'UniqueViolationError';

  constructor(readonly constraint: string | undefined, options?: { cause?: unknown }) {
    super(
      constraint ? `Unique constraint "${constraint}" violated.` : 'Unique constraint violated.',
      ErrorCode.UNIQUE_CONSTRAINT,
      409,
      options
    );
  }
}

export class ConfigurationError extends BlogError {
  override readonly name = 'ConfigurationError';

  constructor(message: string) {
    super(message, ErrorCode.CONFIGURATION_ERROR, 500);
  }
}

/**
 * Type guard for blog errors
 */
export function isBlogError(error: unknown): error is BlogError {
  return error instanceof BlogError;
}
