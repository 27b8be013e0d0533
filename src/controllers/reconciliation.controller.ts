import { Request, Response } from 'express';
import { z } from 'zod';
import { reconciliationService, type LedgerUpload } from '../services';
import { sendSuccess, sendFile, AppError } from '../utils';

/**
 * Query accepted by POST /reconciliation
 */
export const reconcileQuerySchema = z.object({
  format: z.enum(['json', 'csv', 'xlsx']).default('json'),
  collisionPolicy: z.enum(['sum', 'reject']).optional(),
  // Raw query strings arrive before validation, parsed numbers after it
  varianceTolerance: z
    .union([z.number(), z.string().trim().min(1)])
    .pipe(z.coerce.number().nonnegative())
    .optional(),
});

export type ReconcileQuery = z.infer<typeof reconcileQuerySchema>;

export const LEDGER_FIELDS = ['statement', 'settlement'] as const;
type LedgerField = (typeof LEDGER_FIELDS)[number];

/**
 * Picks one uploaded file out of multer's field map.
 */
const uploadedLedger = (req: Request, field: LedgerField): LedgerUpload => {
  const files = req.files;
  const file = files !== undefined && !Array.isArray(files) ? files[field]?.[0] : undefined;
  if (file === undefined) {
    throw AppError.badRequest(`Missing "${field}" file upload`);
  }
  return { buffer: file.buffer, filename: file.originalname };
};

/**
 * Reconciliation controller
 */
export class ReconciliationController {
  /**
   * POST /reconciliation
   * Reconcile an uploaded statement against an uploaded settlement report.
   * Responds with JSON, or with the result table as CSV/XLSX download.
   */
  reconcile = (req: Request, res: Response): void => {
    const query = reconcileQuerySchema.parse(req.query);
    const statement = uploadedLedger(req, 'statement');
    const settlement = uploadedLedger(req, 'settlement');

    const run = reconciliationService.run(statement, settlement, {
      ...(query.collisionPolicy !== undefined && { collisionPolicy: query.collisionPolicy }),
      ...(query.varianceTolerance !== undefined && { varianceTolerance: query.varianceTolerance }),
    });

    if (query.format === 'json') {
      sendSuccess(res, run, `Reconciled ${run.results.length} PartnerPins`);
      return;
    }

    const file = reconciliationService.export(run, query.format);
    sendFile(res, file.body, file.filename, file.contentType);
  };
}

export const reconciliationController = new ReconciliationController();

export default reconciliationController;
