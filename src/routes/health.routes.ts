import { Router } from 'express';
import { healthController, type HealthController } from '../controllers';

/**
 * Health routes, built around a controller so a failing engine
 * self-check can be wired in.
 *
 * - GET /       status and reconciliation defaults
 * - GET /live   process is up (not request-logged)
 * - GET /ready  503 until the sample ledgers reconcile
 */
export const createHealthRouter = (controller: HealthController = healthController): Router => {
  const router = Router();

  router.get('/', controller.getHealth);
  router.get('/live', controller.getLiveness);
  router.get('/ready', controller.getReadiness);

  return router;
};

export default createHealthRouter;
