/**
 * Error Handler Middleware
 *
 * Every error response has the shape `{ detail }`: a message string, or a
 * list of field problems for request validation failures.
 */

import type { Request, Response, NextFunction } from 'express';
import { ApiError, NotFoundError, ValidationError } from '../models/errors';
import { logger } from '../utils/logger';

// body-parser tags malformed JSON with this type
function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction
): void {
  if (isBodyParseError(err)) {
    const error = new ValidationError('Malformed JSON body');
    logger.warn('Malformed JSON body', { path: req.path, method: req.method });
    res.status(error.statusCode).json({ detail: error.message });
    return;
  }

  if (err instanceof ApiError) {
    logger.warn('Request rejected', {
      code: err.code,
      message: err.message,
      statusCode: err.statusCode,
      path: req.path,
      method: req.method
    });
    res.status(err.statusCode).json({ detail: err.details ?? err.message });
    return;
  }

  logger.error('Unexpected error', {
    message: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method
  });
  res.status(500).json({ detail: 'Internal Server Error' });
}

/** 404 for unknown routes */
export function notFoundHandler(req: Request, res: Response): void {
  logger.warn('Route not found', { path: req.path, method: req.method });
  const error = new NotFoundError();
  res.status(error.statusCode).json({ detail: error.message });
}
