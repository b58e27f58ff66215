import { AppError } from '../../src/utils/AppError';
import {
  ConcurrentMatchLostError,
  ConstraintViolationError,
  StoreUnavailableError,
  TransactionNotFoundError,
} from '../../src/utils/errors';

describe('Reconciliation errors', () => {
  describe('TransactionNotFoundError', () => {
    it('should be a 404 operational AppError carrying the id', () => {
      const error = new TransactionNotFoundError('tx-1');

      expect(error).toBeInstanceOf(AppError);
      expect(error).toBeInstanceOf(TransactionNotFoundError);
      expect(error.statusCode).toBe(404);
      expect(error.isOperational).toBe(true);
      expect(error.transactionId).toBe('tx-1');
      expect(error.message).toBe('Transaction tx-1 not found');
      expect(error.name).toBe('TransactionNotFoundError');
      expect(error.code).toBe('TRANSACTION_NOT_FOUND');
    });
  });

  describe('ConstraintViolationError', () => {
    it('should be a non-operational 500 listing the offending ids', () => {
      const error = new ConstraintViolationError('Match is not symmetric', ['a', 'b']);

      expect(error).toBeInstanceOf(ConstraintViolationError);
      expect(error.statusCode).toBe(500);
      expect(error.isOperational).toBe(false);
      expect(error.transactionIds).toEqual(['a', 'b']);
      expect(error.code).toBe('CONSTRAINT_VIOLATION');
    });
  });

  describe('ConcurrentMatchLostError', () => {
    it('should name both sides of the lost claim', () => {
      const error = new ConcurrentMatchLostError('tx-1', 'tx-2');

      expect(error).toBeInstanceOf(ConcurrentMatchLostError);
      expect(error.transactionId).toBe('tx-1');
      expect(error.candidateId).toBe('tx-2');
      expect(error.code).toBe('CONCURRENT_MATCH_LOST');
      expect(error.message).toBe('Candidate tx-2 was claimed before tx-1 could match it');
    });
  });

  describe('StoreUnavailableError', () => {
    it('should be a retryable 503 wrapping the driver error', () => {
      const cause = new Error('database is locked');
      const error = new StoreUnavailableError('get', cause);

      expect(error).toBeInstanceOf(StoreUnavailableError);
      expect(error.statusCode).toBe(503);
      expect(error.isOperational).toBe(true);
      expect(error.operation).toBe('get');
      expect(error.code).toBe('STORE_UNAVAILABLE');
      expect(error.originalError).toBe(cause);
      expect(error.message).toBe('Transaction store unavailable during get: database is locked');
    });

    it('should describe non-Error causes generically', () => {
      const error = new StoreUnavailableError('list', 'boom');

      expect(error.message).toBe('Transaction store unavailable during list: Unknown error');
    });
  });
});
