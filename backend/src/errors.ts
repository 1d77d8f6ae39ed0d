/**
 * Error taxonomy shared by services and routes. Each error carries the
 * machine code and HTTP status the error middleware reports.
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string, readonly details?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing or malformed input */
export class ValidationError extends AppError {
  readonly code = "VALIDATION_ERROR";
  readonly statusCode = 400;
}

/** Reference to an entity that does not exist */
export class NotFoundError extends AppError {
  readonly code = "NOT_FOUND";
  readonly statusCode = 404;

  constructor(readonly entity: string, readonly id: number | string) {
    super(`${entity} ${id} not found`);
  }
}

/** Reference to an entity that exists but cannot be used right now */
export class ConflictError extends AppError {
  readonly code: string = "CONFLICT";
  readonly statusCode = 409;
}

export class TableUnavailableError extends ConflictError {
  readonly code = "TABLE_UNAVAILABLE";

  constructor(readonly tableNumber: number) {
    super(`Table ${tableNumber} is already occupied`);
  }
}

export class InvalidTransitionError extends ConflictError {
  readonly code = "INVALID_TRANSITION";
}

/** Deletion refused because active records still reference the row */
export class DeletionBlockedError extends AppError {
  readonly code = "DELETION_BLOCKED";
  readonly statusCode = 409;
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
