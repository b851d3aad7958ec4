/** SQLSTATE for unique_violation. */
export const UNIQUE_VIOLATION = '23505';

/** SQLSTATE for foreign_key_violation. */
export const FOREIGN_KEY_VIOLATION = '23503';

/** Shape of the error pg raises for a failed statement. */
export interface PgDatabaseError extends Error {
  code: string;
  constraint?: string;
}

export function isPgError(err: unknown): err is PgDatabaseError {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

export function isUniqueViolation(err: unknown, constraint?: string): err is PgDatabaseError {
  if (!isPgError(err) || err.code !== UNIQUE_VIOLATION) return false;
  return constraint === undefined || err.constraint === constraint;
}

export function isForeignKeyViolation(err: unknown): err is PgDatabaseError {
  return isPgError(err) && err.code === FOREIGN_KEY_VIOLATION;
}
