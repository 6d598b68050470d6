/**
 * errorHandler.ts
 * Final error and not-found handlers
 */

import type { NextFunction, Request, Response } from 'express';

import { ERROR_MESSAGES } from '../constants/index.js';
import { ApiError } from '../errors.js';
import { getErrorMessage } from '../utils/error-helpers.js';
import { logger } from '../utils/logger.js';

/**
 * Render an error as a JSON response
 */
export function sendError(res: Response, error: unknown): void {
  if (error instanceof ApiError) {
    if (error.retryAfter !== undefined) {
      res.setHeader('Retry-After', String(error.retryAfter));
    }
    res.status(error.statusCode).json(error.toJSON());
    return;
  }

  logger.error('Unhandled error:', { error: getErrorMessage(error) });
  res.status(500).json({ detail: ERROR_MESSAGES.INTERNAL_SERVER_ERROR, type: 'internal_error' });
}

function isBodyParseError(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  // Express recognises error handlers by arity
  _next: NextFunction
): void {
  if (isBodyParseError(err)) {
    res.status(400).json({ detail: ERROR_MESSAGES.INVALID_REQUEST, type: 'invalid_request' });
    return;
  }
  sendError(res, err);
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ detail: ERROR_MESSAGES.NOT_FOUND, type: 'not_found' });
}
