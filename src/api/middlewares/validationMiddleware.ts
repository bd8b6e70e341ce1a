import type { Request, Response, NextFunction } from 'express';
import { ZodError, type ZodTypeAny } from 'zod';
import { logger } from '../../utils/logger';
import { ValidationError } from '../../utils/error';
import { formatZodIssues } from '../../utils/validation';
import { getTraceId } from './tracingMiddleware';

export type ValidationType = 'body' | 'query' | 'params';

/**
 * Generic validation middleware factory using Zod schemas
 * Rejects the request before any controller logic runs
 */
export const validationMiddleware = (schema: ZodTypeAny, type: ValidationType = 'body') => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const traceId = getTraceId(req);

    try {
      const validatedData: unknown = schema.parse(req[type]);

      // Parsed bodies carry defaults and drop unknown keys
      if (type === 'body') {
        req.body = validatedData;
      }

      logger.debug('Validation successful', { traceId, type });

      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const validationErrors = formatZodIssues(error);

        logger.warn('Validation failed', {
          traceId,
          type,
          errors: validationErrors,
        });

        next(new ValidationError('Validation failed', validationErrors));
      } else {
        next(error);
      }
    }
  };
};
