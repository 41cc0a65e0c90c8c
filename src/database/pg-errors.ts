/**
 * SQLSTATE raised by PostgreSQL for unique constraint violations
 */
export const UNIQUE_VIOLATION = '23505';

/**
 * Check whether a driver error is a unique constraint violation.
 * Falls back to the server message for drivers that do not expose SQLSTATE.
 */
export function isUniqueViolation(error: unknown): error is Error {
  if (!(error instanceof Error)) {
    return false;
  }
  if ('code' in error && error.code === UNIQUE_VIOLATION) {
    return true;
  }
  return error.message.includes('duplicate key value violates unique constraint');
}

/**
 * Name of the violated constraint, when the driver reports it
 */
export function violatedConstraint(error: Error): string | undefined {
  if ('constraint' in error && typeof error.constraint === 'string') {
    return error.constraint;
  }
  const match = /unique constraint "([^"]+)"/.exec(error.message);
  return match?.[1];
}
