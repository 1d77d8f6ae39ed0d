import { NextFunction, Request, Response } from 'express';
import * as logger from '../utils/logger.js';

const HEADER = 'x-correlation-id';

/**
 * Attach a correlation id to every request, reusing the caller's header
 */
export function correlationMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.header(HEADER);
  const correlationId = incoming && incoming.length <= 100 ? incoming : logger.createCorrelationId();
  res.locals.correlationId = correlationId;
  res.setHeader(HEADER, correlationId);
  next();
}

export function getCorrelationId(res: Response): string | undefined {
  const value: unknown = res.locals.correlationId;
  return typeof value === 'string' ? value : undefined;
}
