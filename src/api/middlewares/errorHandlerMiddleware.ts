import type { Request, Response, NextFunction } from 'express';
import { logger } from '../../utils/logger';
import { sendConflict, sendError, sendNotFound, sendValidationError } from '../../utils/response';
import { ConflictError, NotFoundError, ValidationError } from '../../utils/error';
import config from '../../config/app';
import { getTraceId } from './tracingMiddleware';

function isMalformedJsonError(error: Error): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

/**
 * Client-side failures raised by the JSON body parser carry their own 4xx status
 */
function bodyParserClientStatus(error: Error): number | null {
  if (!('type' in error) || typeof error.type !== 'string') {
    return null;
  }
  if (!('status' in error) || typeof error.status !== 'number') {
    return null;
  }
  return error.status >= 400 && error.status < 500 ? error.status : null;
}

const BODY_PARSER_MESSAGES: Partial<Record<string, string>> = {
  'entity.too.large': 'Request body too large',
  'encoding.unsupported': 'Unsupported request body encoding',
  'charset.unsupported': 'Unsupported request body charset',
};

/**
 * Centralized error handling middleware
 * Converts errors to standardized API responses
 */
export const errorHandlerMiddleware = (
  error: Error,
  req: Request,
  res: Response,
  // Express recognises error handlers by their four parameters
  next: NextFunction
): void => {
  const traceId = getTraceId(req);

  logger.warn('Request error', {
    traceId,
    error: {
      name: error.name,
      message: error.message,
    },
    request: {
      method: req.method,
      url: req.url,
      userAgent: req.get('User-Agent'),
      ip: req.ip,
    },
  });

  if (error instanceof ValidationError) {
    sendValidationError(res, error.message, error.details, traceId);
    return;
  }

  if (error instanceof NotFoundError) {
    sendNotFound(res, error.message, traceId);
    return;
  }

  if (error instanceof ConflictError) {
    sendConflict(res, error.message, undefined, traceId);
    return;
  }

  if (isMalformedJsonError(error)) {
    sendValidationError(res, 'Malformed JSON body', undefined, traceId);
    return;
  }

  const clientStatus = bodyParserClientStatus(error);
  if (clientStatus !== null) {
    const type = 'type' in error && typeof error.type === 'string' ? error.type : '';
    sendError(res, BODY_PARSER_MESSAGES[type] ?? error.message, clientStatus, undefined, traceId);
    return;
  }

  logger.error('Unhandled error', {
    traceId,
    error: {
      name: error.name,
      message: error.message,
      stack: error.stack,
    },
  });

  sendError(
    res,
    'Internal server error',
    500,
    config.isDevelopment() ? { originalError: error.message, stack: error.stack } : undefined,
    traceId
  );
};

/**
 * 404 handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response): void => {
  const traceId = getTraceId(req);

  logger.warn('Route not found', {
    traceId,
    method: req.method,
    url: req.url,
  });
  sendNotFound(res, `Route ${req.method} ${req.url} not found`, traceId);
};
