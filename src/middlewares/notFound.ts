import { Request, Response } from 'express';
import { sendError } from '../utils';

/**
 * Handle 404 - Route not found
 */
export const notFound = (req: Request, res: Response): void => {
  sendError(res, 'Route not found', 404, {
    code: 'NOT_FOUND',
    message: `${req.method} ${req.originalUrl} does not exist`,
  });
};

export default notFound;
