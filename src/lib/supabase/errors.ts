import {
  ConstraintViolationError,
  PermissionDeniedError,
  StorageError,
  type TimeLogError,
} from "../errors";
import { logger } from "../logger";

/** The part of a PostgrestError this package looks at. */
export interface PostgrestErrorLike {
  code: string;
  message: string;
}

// Postgres SQLSTATE codes surfaced by PostgREST
const INSUFFICIENT_PRIVILEGE = "42501";
const CONSTRAINT_CODES = new Set([
  "23502", // not_null_violation
  "23503", // foreign_key_violation
  "23505", // unique_violation
  "23514", // check_violation
]);

/**
 * Map a PostgREST error to this package's errors. RLS rejections come back
 * as 42501 and become PermissionDeniedError.
 */
export function mapPostgrestError(error: PostgrestErrorLike, context: string): TimeLogError {
  const message = `${context}: ${error.message}`;

  if (error.code === INSUFFICIENT_PRIVILEGE) {
    return new PermissionDeniedError(message);
  }
  if (CONSTRAINT_CODES.has(error.code)) {
    return new ConstraintViolationError(message, { cause: error });
  }
  logger.error(`${message} (code ${error.code})`);
  return new StorageError(message, { cause: error });
}
