import type { NextFunction, Request, Response } from 'express';
import { BaseController } from './BaseController';
import { logger } from '../../utils/logger';
import { resolveHostAddress } from '../../utils/host';
import { healthParamSchema, healthQuerySchema } from '../../schemas';
import type { HostAddressResolver, IHealth } from '../../types';

/**
 * Health check controller
 * Echoes the optional query and path values back alongside host details
 */
export class HealthController extends BaseController {
  constructor(private readonly resolveAddress: HostAddressResolver = resolveHostAddress) {
    super();
  }

  /**
   * GET /health and GET /health/:pathEcho
   */
  healthCheck = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      const { echo } = healthQuerySchema.parse(req.query);
      const { pathEcho } = healthParamSchema.parse(req.params);

      const health: IHealth = {
        status: 200,
        status_message: 'OK',
        timestamp: new Date().toISOString(),
        ip_address: await this.resolveAddress(),
        echo: echo ?? null,
        path_echo: pathEcho ?? null,
      };

      logger.withTrace(traceId).debug('Health check served', { ipAddress: health.ip_address });

      this.success(res, health);
    });
  };
}
