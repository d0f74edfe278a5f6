/**
 * Error Handling Middleware
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { logger } from '../lib/logger';

export class ApiError extends Error {
  constructor(
    readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Forward rejections of async handlers to the error middleware
 */
export const asyncHandler =
  (handler: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res, next).catch(next);
  };

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const statusCode = err instanceof ApiError ? err.statusCode : 500;
  const message = err instanceof Error ? err.message : 'Internal server error';

  if (statusCode >= 500) {
    logger.error(`${req.method} ${req.path} failed:`, err);
  }

  res.status(statusCode).json({
    success: false,
    error: statusCode >= 500 ? 'Internal server error' : message,
  });
};
