/**
 * Centralized Error Handling Middleware
 *
 * Provides consistent error responses across all API routes.
 * Includes structured logging and environment-aware error details.
 */

import { Request, Response, NextFunction } from 'express';
import { createLogger, logError } from '../lib/logger';
import { getRequestId } from './requestId';

const log = createLogger({ module: 'error-handler' });

/**
 * Extended Error interface for API errors
 */
export interface ApiError extends Error {
  /** HTTP status code */
  statusCode?: number;
  /** Error code for client-side handling */
  code?: string;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** Whether the error is operational (expected) vs programming error */
  isOperational?: boolean;
}

/**
 * Create an API error with proper typing
 */
export function createApiError(
  message: string,
  statusCode: number = 500,
  code: string = 'INTERNAL_ERROR',
  details?: Record<string, unknown>
): ApiError {
  const error: ApiError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  error.details = details;
  error.isOperational = true;
  return error;
}

/**
 * Common error factory functions
 */
export const errors = {
  notFound: (resource: string = 'Resource') =>
    createApiError(`${resource} not found`, 404, 'NOT_FOUND'),
};

/**
 * Standard API response format
 */
interface ErrorResponse {
  success: false;
  message: string;
  code: string;
  details?: Record<string, unknown>;
  stack?: string;
  requestId?: string;
}

/**
 * Centralized error handling middleware
 *
 * Must be registered AFTER all route handlers.
 * Catches all errors and returns consistent JSON responses.
 */
export function errorHandler(
  err: ApiError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const requestId = req.id ?? getRequestId(req);
  const statusCode = err.statusCode || 500;

  logError(log, err, 'Request error', {
    requestId,
    path: req.path,
    method: req.method,
    statusCode,
    isOperational: err.isOperational,
  });

  const isProduction = process.env.NODE_ENV === 'production';

  const response: ErrorResponse = {
    success: false,
    message: isProduction && statusCode === 500
      ? 'An unexpected error occurred'
      : err.message,
    code: err.code || 'INTERNAL_ERROR',
    requestId,
  };

  // Include details in non-production or for operational errors
  if (!isProduction || err.isOperational) {
    response.details = err.details;
  }

  // Include stack trace in development only
  if (process.env.NODE_ENV === 'development') {
    response.stack = err.stack;
  }

  res.status(statusCode).json(response);
}

/**
 * Not found handler for undefined routes
 * Register after all route definitions but before the error handler.
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    message: 'Route not found',
    code: 'NOT_FOUND',
    path: req.path,
    method: req.method,
  });
}

/**
 * Async handler wrapper to catch errors from async route handlers
 *
 * @example
 * router.post('/process', asyncHandler(async (req, res) => {
 *   const result = await pipeline.run(source);
 *   sendSuccess(res, result);
 * }));
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
