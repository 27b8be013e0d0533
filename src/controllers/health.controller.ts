import { Request, Response } from 'express';
import { healthService, type HealthService } from '../services';
import { sendSuccess, sendError } from '../utils';

/**
 * Health check controller
 */
export class HealthController {
  constructor(private readonly health: HealthService = healthService) {}

  /**
   * GET /health
   * Service status and reconciliation defaults
   */
  getHealth = (_req: Request, res: Response): void => {
    sendSuccess(res, this.health.getHealthStatus(), 'Service is healthy');
  };

  /**
   * GET /health/ready
   * 503 with the failing check until the sample ledgers reconcile
   */
  getReadiness = (_req: Request, res: Response): void => {
    const readiness = this.health.checkReadiness();

    if (readiness.ready) {
      sendSuccess(res, readiness, 'Service is ready');
    } else {
      sendError(res, 'Service is not ready', 503, readiness.detail, readiness);
    }
  };

  /**
   * GET /health/live
   */
  getLiveness = (_req: Request, res: Response): void => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  };
}

export const healthController = new HealthController();

export default healthController;
