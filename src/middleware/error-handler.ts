/**
 * Error Handling Middleware
 * ApiError, async route wrapper and the final Express error handler
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { env } from '../config/env';
import { errorMessage } from '../lib/errors';

export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Forward rejected promises from async route handlers to the error handler
 */
export const asyncHandler =
  (handler: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res, next).catch(next);
  };

export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
  if (error instanceof ApiError) {
    res.status(error.statusCode).json({
      success: false,
      error: error.message,
    });
    return;
  }

  // body-parser rejects malformed JSON with a SyntaxError carrying the raw body
  if (error instanceof SyntaxError && 'body' in error) {
    res.status(400).json({
      success: false,
      error: 'Invalid JSON body',
    });
    return;
  }

  console.error(`Unhandled error on ${req.method} ${req.path}:`, error);
  res.status(500).json({
    success: false,
    error: env.NODE_ENV === 'production' ? 'Internal server error' : errorMessage(error),
  });
};
