import { Request, Response, NextFunction } from 'express';
import { z, ZodError, ZodSchema } from 'zod';
import { PROVIDERS, RECONCILIATION_STATUSES } from '../matching';
import { AppError } from '../utils';

interface ValidationSchemas {
  body?: ZodSchema;
  query?: ZodSchema;
  params?: ZodSchema;
}

/**
 * Validates (and replaces with the parsed value) each request part that has a schema.
 * Failures become a 400 listing every failing field.
 */
export const validateRequest = (schemas: ValidationSchemas) => {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      if (schemas.params) {
        req.params = await schemas.params.parseAsync(req.params);
      }
      if (schemas.query) {
        req.query = await schemas.query.parseAsync(req.query);
      }
      if (schemas.body) {
        req.body = await schemas.body.parseAsync(req.body);
      }
      next();
    } catch (error) {
      next(error instanceof ZodError ? AppError.validation(error) : error);
    }
  };
};

// Shared schemas for the transaction routes
export const commonSchemas = {
  id: z.object({
    id: z.string().uuid('Invalid transaction ID format'),
  }),
  transactionFilter: z.object({
    status: z.enum(RECONCILIATION_STATUSES).optional(),
    provider: z.enum(PROVIDERS).optional(),
  }),
  sweepRequest: z.object({
    requestedBy: z.string().trim().min(1).max(100).default('api'),
  }),
};

export default validateRequest;
