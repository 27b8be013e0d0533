import { Router } from 'express';
import { createHealthRouter } from './health.routes';
import reconciliationRoutes from './reconciliation.routes';

const router = Router();

// Health check routes
router.use('/health', createHealthRouter());

// Reconciliation routes (statement + settlement upload)
router.use('/reconciliation', reconciliationRoutes);

export default router;
