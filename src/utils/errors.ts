export enum ErrorCode {
  NOT_FOUND = "NOT_FOUND",
  INVALID_INPUT = "INVALID_INPUT",
  INVALID_OPERATION = "INVALID_OPERATION",
  CONFLICT = "CONFLICT",
  STORAGE_FAILURE = "STORAGE_FAILURE",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

export class AppError extends Error {
  public statusCode: number;
  public code: ErrorCode;
  public isOperational: boolean;
  public details?: unknown;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number = 500,
    isOperational: boolean = true,
    details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/** A referenced record does not exist. */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, ErrorCode.NOT_FOUND, 404);
  }
}

/** Caller input is malformed or out of range. */
export class InvalidInputError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.INVALID_INPUT, 400, true, details);
  }
}

/** Input is well-formed but a business rule forbids the operation. */
export class InvalidOperationError extends AppError {
  constructor(message: string) {
    super(message, ErrorCode.INVALID_OPERATION, 422);
  }
}

/** A write targeted a record that changed (or vanished) since it was read. */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, ErrorCode.CONFLICT, 409);
  }
}

export class UniqueConstraintError extends ConflictError {
  constructor(public readonly constraint: string) {
    super(`Unique constraint ${constraint} violated`);
  }
}

export class ForeignKeyConstraintError extends InvalidOperationError {
  constructor(public readonly constraint: string) {
    super(`Foreign key constraint ${constraint} violated`);
  }
}

export class StorageFailureError extends AppError {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message, ErrorCode.STORAGE_FAILURE, 500, false);
  }
}
