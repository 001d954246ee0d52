// Domain error hierarchy. Every rejected transition surfaces one of these
// with a message naming the precondition that failed.

export type ErrorKind =
  | 'NotFound'
  | 'PermissionDenied'
  | 'InvalidState'
  | 'ValidationError'
  | 'AlreadySet'
  | 'Expired'
  | 'Unauthorized';

export class AppError extends Error {
  public readonly kind: ErrorKind;
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, string>;

  constructor(
    kind: ErrorKind,
    message: string,
    code: string,
    statusCode: number,
    details?: Record<string, string>
  ) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  static notFound(resource: string, id: string): NotFoundError {
    return new NotFoundError(`${resource} with id '${id}' not found`);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NotFound', message, 'NOT_FOUND', 404);
  }
}

export class PermissionDeniedError extends AppError {
  constructor(message: string) {
    super('PermissionDenied', message, 'PERMISSION_DENIED', 403);
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string) {
    super('InvalidState', message, 'INVALID_STATE', 409);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, fields?: Record<string, string>) {
    super('ValidationError', message, 'VALIDATION_ERROR', 400, fields);
  }
}

export class AlreadySetError extends AppError {
  constructor(message: string) {
    super('AlreadySet', message, 'ALREADY_SET', 409);
  }
}

/**
 * Raised after the deadline has passed. The auto-confirmation write has
 * already been committed when this reaches the caller.
 */
export class ExpiredError extends AppError {
  constructor(message: string) {
    super('Expired', message, 'EXPIRED', 410);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Authentication required') {
    super('Unauthorized', message, 'UNAUTHORIZED', 401);
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;
