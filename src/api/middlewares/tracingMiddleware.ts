import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../utils/logger';

declare global {
  namespace Express {
    interface Request {
      traceId?: string;
      startTime?: number;
    }
  }
}

export const TRACE_HEADER = 'X-Trace-ID';

export function getTraceId(req: Request): string {
  return req.traceId ?? 'unknown';
}

/**
 * Adds correlation ID and request timing to all requests
 */
export const tracingMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const traceId = uuidv4();
  const startTime = Date.now();
  req.traceId = traceId;
  req.startTime = startTime;

  res.set(TRACE_HEADER, traceId);

  logger.info('Request started', {
    traceId,
    method: req.method,
    url: req.url,
    userAgent: req.get('User-Agent'),
    ip: req.ip,
  });

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    logger.info('Request completed', {
      traceId,
      method: req.method,
      url: req.url,
      statusCode: res.statusCode,
      duration: `${duration}ms`,
    });
  });

  next();
};
