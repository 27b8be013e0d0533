export { healthService, HealthService, reconcileSample } from './health.service';
export type { EngineSelfCheck } from './health.service';
export { reconciliationService, ReconciliationService } from './reconciliation.service';
export type { LedgerUpload, ReconciliationRun, ResultExport } from './reconciliation.service';
