import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import logger from '../config/logger.js';
import { AppError } from '../domain/errors.js';

/**
 * Global error handler middleware
 */
export function errorHandler(
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const context = { url: req.originalUrl, method: req.method, query: req.query };

  // Zod validation errors
  if (error instanceof ZodError) {
    logger.warn({ ...context, issues: error.errors.length }, 'Request validation failed');
    res.status(400).json({
      error: 'ValidationError',
      details: error.errors.map(err => ({
        path: err.path.join('.'),
        message: err.message,
      })),
    });
    return;
  }

  // Known application errors
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logger.error({ ...context, err: error }, 'Request failed');
    } else {
      logger.warn({ ...context, error: error.message }, 'Request rejected');
    }
    res.status(error.statusCode).json({
      error: error.name,
      message: error.message,
    });
    return;
  }

  logger.error({ ...context, err: error }, 'Unhandled error');

  // Default to 500 server error
  res.status(500).json({
    error: 'Internal server error',
  });
}
