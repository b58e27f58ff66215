import type { ZodError } from 'zod';

/**
 * Machine-readable error codes returned alongside the message
 */
export type ErrorCode =
  | 'BAD_REQUEST'
  | 'VALIDATION_FAILED'
  | 'NOT_FOUND'
  | 'TRANSACTION_NOT_FOUND'
  | 'DUPLICATE_TRANSACTION'
  | 'CONCURRENT_MATCH_LOST'
  | 'CONSTRAINT_VIOLATION'
  | 'STORE_UNAVAILABLE'
  | 'SERVICE_UNAVAILABLE'
  | 'RATE_LIMITED'
  | 'INTERNAL';

export interface ValidationIssue {
  field: string;
  message: string;
}

/**
 * Base class for errors surfaced through the HTTP layer.
 * Non-operational errors are bugs or corruption; their message is never sent to clients.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: ErrorCode;

  constructor(message: string, statusCode: number, isOperational = true, code?: ErrorCode) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.code = code ?? (statusCode >= 500 ? 'INTERNAL' : 'BAD_REQUEST');

    Error.captureStackTrace(this, this.constructor);

    Object.setPrototypeOf(this, AppError.prototype);
  }

  static badRequest(message: string): AppError {
    return new AppError(message, 400, true, 'BAD_REQUEST');
  }

  /**
   * 400 listing each failing field, e.g.
   * `Validation failed: [{"field":"amount","message":"Amount must be a positive number"}]`
   */
  static validation(error: ZodError): AppError {
    const issues: ValidationIssue[] = error.errors.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    return new AppError(`Validation failed: ${JSON.stringify(issues)}`, 400, true, 'VALIDATION_FAILED');
  }

  static notFound(message = 'Resource not found'): AppError {
    return new AppError(message, 404, true, 'NOT_FOUND');
  }

  static duplicate(message: string): AppError {
    return new AppError(message, 409, true, 'DUPLICATE_TRANSACTION');
  }

  static serviceUnavailable(message = 'Service unavailable'): AppError {
    return new AppError(message, 503, true, 'SERVICE_UNAVAILABLE');
  }

  static internal(message = 'Internal server error'): AppError {
    return new AppError(message, 500, false, 'INTERNAL');
  }
}

export default AppError;
