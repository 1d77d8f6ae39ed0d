import { NextFunction, Request, Response } from 'express';
import { isAppError } from '../errors.js';
import * as logger from '../utils/logger.js';
import { getCorrelationId } from './correlation.js';

/**
 * Unknown routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    error: 'NOT_FOUND',
    message: `No route for ${req.method} ${req.path}`
  });
}

/**
 * Known errors become their status and code; anything else is logged and
 * reported as a generic 500.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const correlationId = getCorrelationId(res);

  if (isAppError(err)) {
    logger.warn(err.message, {
      correlationId,
      context: 'errorHandler',
      data: { code: err.code, method: req.method, path: req.path }
    });
    res.status(err.statusCode).json({
      success: false,
      error: err.code,
      message: err.message
    });
    return;
  }

  // Malformed JSON body from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({
      success: false,
      error: 'VALIDATION_ERROR',
      message: 'Malformed JSON body'
    });
    return;
  }

  logger.error('Unhandled error', {
    correlationId,
    context: 'errorHandler',
    error: err,
    data: { method: req.method, path: req.path }
  });
  res.status(500).json({
    success: false,
    error: 'INTERNAL_ERROR',
    message: 'Internal server error'
  });
}
