import type { NextFunction, Request, Response } from 'express';
import { logger } from '../../utils/logger';
import { sendCreated, sendNoContent, sendSuccess } from '../../utils/response';
import { getTraceId } from '../middlewares/tracingMiddleware';

/**
 * Base controller with common response handling patterns
 */
export abstract class BaseController {
  protected success<T>(res: Response, data: T, statusCode: number = 200): void {
    sendSuccess(res, data, statusCode);
  }

  protected created<T>(res: Response, data: T): void {
    sendCreated(res, data);
  }

  protected noContent(res: Response): void {
    sendNoContent(res);
  }

  /**
   * Run controller logic and hand any failure to the error middleware
   */
  protected async executeWithErrorHandling(
    req: Request,
    next: NextFunction,
    operation: (traceId: string) => Promise<void>
  ): Promise<void> {
    const traceId = getTraceId(req);

    try {
      await operation(traceId);
    } catch (error) {
      logger.debug('Controller operation failed', {
        traceId,
        method: req.method,
        url: req.url,
        error: error instanceof Error ? error.message : 'Unknown error',
      });

      next(error);
    }
  }
}
