/**
 * Request Validation Middleware
 *
 * Zod-based validation of request bodies for Express routes
 */

import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodSchema } from 'zod';

export function formatZodErrors(error: ZodError) {
  return error.errors.map(err => ({
    path: err.path.join('.'),
    message: err.message,
  }));
}

/**
 * Validate request body against a Zod schema
 */
export function validateBody<T extends ZodSchema>(schema: T) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      req.body = schema.parse(req.body);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        res.status(400).json({
          success: false,
          message: 'Validation failed',
          code: 'VALIDATION_ERROR',
          errors: formatZodErrors(error),
        });
        return;
      }
      next(error);
    }
  };
}
