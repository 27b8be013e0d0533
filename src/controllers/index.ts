export { healthController, HealthController } from './health.controller';
export {
  reconciliationController,
  ReconciliationController,
  reconcileQuerySchema,
  LEDGER_FIELDS,
} from './reconciliation.controller';
