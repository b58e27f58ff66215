import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { AppError, StoreUnavailableError, logger, sendError } from '../utils';
import type { ErrorCode } from '../utils';
import { env } from '../config';

/** Seconds a client should wait before retrying after a store outage */
const STORE_RETRY_AFTER_SECONDS = 1;

interface ResolvedError {
  statusCode: number;
  message: string;
  code: ErrorCode;
  isOperational: boolean;
}

function resolveError(err: Error): ResolvedError {
  if (err instanceof AppError) {
    return {
      statusCode: err.statusCode,
      // Corruption and bugs are logged in full but never described to clients
      message: err.isOperational ? err.message : 'Internal Server Error',
      code: err.code,
      isOperational: err.isOperational,
    };
  }

  if (err instanceof MulterError) {
    return {
      statusCode: 400,
      message: `Upload failed: ${err.message}`,
      code: 'BAD_REQUEST',
      isOperational: true,
    };
  }

  return { statusCode: 500, message: 'Internal Server Error', code: 'INTERNAL', isOperational: false };
}

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const { statusCode, message, code, isOperational } = resolveError(err);

  if (isOperational) {
    logger.warn(`Operational Error [${code}] ${req.method} ${req.originalUrl}: ${message}`);
  } else {
    logger.error(`Unhandled Error on ${req.method} ${req.originalUrl}:`, err);
  }

  if (err instanceof StoreUnavailableError) {
    res.setHeader('Retry-After', String(STORE_RETRY_AFTER_SECONDS));
  }

  sendError(res, message, statusCode, {
    code,
    ...(env.NODE_ENV === 'development' && { data: { stack: err.stack } }),
  });
};

export default errorHandler;
