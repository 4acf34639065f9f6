import type { ZodIssue } from "zod";

export type TimeLogErrorCode =
  | "VALIDATION"
  | "NOT_FOUND"
  | "PERMISSION_DENIED"
  | "CONSTRAINT_VIOLATION"
  | "CONFLICT"
  | "STORAGE"
  | "CONFIGURATION";

/**
 * Base class for every error this package throws on purpose.
 * Anything else reaching a caller is a bug.
 */
export class TimeLogError extends Error {
  readonly code: TimeLogErrorCode;

  constructor(code: TimeLogErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends TimeLogError {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super("VALIDATION", message);
    this.issues = issues;
  }
}

export class NotFoundError extends TimeLogError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

export class PermissionDeniedError extends TimeLogError {
  constructor(message: string) {
    super("PERMISSION_DENIED", message);
  }
}

/** Missing required value or dangling foreign key. Nothing was written. */
export class ConstraintViolationError extends TimeLogError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONSTRAINT_VIOLATION", message, options);
  }
}

export class ConflictError extends TimeLogError {
  constructor(message: string) {
    super("CONFLICT", message);
  }
}

export class StorageError extends TimeLogError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORAGE", message, options);
  }
}

export class ConfigurationError extends TimeLogError {
  constructor(message: string) {
    super("CONFIGURATION", message);
  }
}
