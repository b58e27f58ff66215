import { Response } from 'express';
import type { ApiResponse } from '../types';
import type { ErrorCode } from './AppError';

export interface ErrorResponseOptions<T> {
  message?: string;
  code?: ErrorCode;
  /** Extra detail for the client, e.g. failing readiness checks */
  data?: T;
}

/**
 * Send a success response
 */
export const sendSuccess = <T>(
  res: Response,
  data: T,
  message?: string,
  statusCode = 200
): Response => {
  const body: ApiResponse<T> = {
    success: true,
    data,
    message,
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(body);
};

/**
 * Send an error response
 */
export const sendError = <T = never>(
  res: Response,
  error: string,
  statusCode = 500,
  options: ErrorResponseOptions<T> = {}
): Response => {
  const body: ApiResponse<T> = {
    success: false,
    error,
    code: options.code,
    message: options.message,
    data: options.data,
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(body);
};
