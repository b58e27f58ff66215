export { default as logger, Logging } from './logger';
export { sendSuccess, sendError } from './response';
export { asyncHandler } from './asyncHandler';
export { AppError, type ErrorCode, type ValidationIssue } from './AppError';
export {
  TransactionNotFoundError,
  ConstraintViolationError,
  ConcurrentMatchLostError,
  StoreUnavailableError,
} from './errors';
