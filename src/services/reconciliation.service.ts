/**
 * Reconciliation Service
 *
 * Orchestration layer between the HTTP/CLI shell and the pure engine:
 * - Reading both uploaded ledgers into positional rows
 * - Running the engine with configured match options
 * - Logging run summaries and skipped rows
 * - Rendering the result table for download
 */

import { randomUUID } from 'crypto';
import { env } from '../config';
import {
  reconcileLedgers,
  resolveMatchOptions,
  toResultTable,
  type MatchOptions,
  type ReconciliationReport,
} from '../reconciliation';
import { logger, readTable, writeTable, RESULT_CONTENT_TYPES, type ResultFormat } from '../utils';

// ============================================
// Types
// ============================================

export interface LedgerUpload {
  buffer: Buffer;
  filename: string;
}

export interface ReconciliationRun extends ReconciliationReport {
  runId: string;
  statementFile: string;
  settlementFile: string;
}

export interface ResultExport {
  body: Buffer;
  filename: string;
  contentType: string;
}

export const RESULT_FILE_BASENAME = 'reconciliation_result';

// ============================================
// Service
// ============================================

export class ReconciliationService {
  constructor(private readonly defaults: MatchOptions) {}

  /**
   * Reconciles an uploaded statement against an uploaded settlement report.
   *
   * @throws AppError (400) when a file cannot be read
   * @throws InvalidLedgerError / DuplicateKeyCollisionError for fatal run errors
   */
  run(
    statement: LedgerUpload,
    settlement: LedgerUpload,
    overrides: Partial<MatchOptions> = {}
  ): ReconciliationRun {
    const runId = randomUUID();
    const options = resolveMatchOptions(overrides, this.defaults);

    logger.info('Reconciliation started', {
      runId,
      statementFile: statement.filename,
      settlementFile: settlement.filename,
      collisionPolicy: options.collisionPolicy,
    });

    const statementTable = readTable(statement.buffer, statement.filename);
    const settlementTable = readTable(settlement.buffer, settlement.filename);

    let report: ReconciliationReport;
    try {
      report = reconcileLedgers(statementTable, settlementTable, options);
    } catch (error) {
      logger.warn('Reconciliation failed', {
        runId,
        reason: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    const { summary } = report;
    if (summary.skippedRows.length > 0) {
      logger.warn(`Skipped ${summary.skippedRows.length} ledger rows`, {
        runId,
        statement: summary.statement.rowsSkipped,
        settlement: summary.settlement.rowsSkipped,
      });
    }
    for (const collision of summary.collisions) {
      logger.warn(`Folded ${collision.recordCount} eligible ${collision.source} records`, {
        runId,
        pin: collision.pin,
        rows: collision.rowNumbers,
      });
    }

    logger.info('Reconciliation completed', {
      runId,
      results: report.results.length,
      ...summary.byFinalStatus,
    });

    return {
      runId,
      statementFile: statement.filename,
      settlementFile: settlement.filename,
      ...report,
    };
  }

  /**
   * Renders a run's results as a downloadable CSV or XLSX file.
   */
  export(report: ReconciliationReport, format: ResultFormat): ResultExport {
    return {
      body: writeTable(toResultTable(report.results), format),
      filename: `${RESULT_FILE_BASENAME}.${format}`,
      contentType: RESULT_CONTENT_TYPES[format],
    };
  }
}

// Singleton instance configured from the environment
export const reconciliationService = new ReconciliationService({
  collisionPolicy: env.COLLISION_POLICY,
  varianceTolerance: env.VARIANCE_TOLERANCE,
});

export default reconciliationService;
