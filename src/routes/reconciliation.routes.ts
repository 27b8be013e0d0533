/**
 * Reconciliation API Routes
 *
 * Endpoint for reconciling a partner statement against a settlement report.
 * These routes handle HTTP concerns only - reconciliation is delegated to
 * the service and engine.
 *
 * Endpoints:
 * - POST / - Upload both ledgers and receive the reconciliation
 */

import { Router, Request } from 'express';
import multer from 'multer';
import { env } from '../config';
import { reconciliationController, reconcileQuerySchema, LEDGER_FIELDS } from '../controllers';
import { validateRequest } from '../middlewares';
import { AppError, isSupportedFile } from '../utils';

const router = Router();

// ============================================
// Multer Configuration
// ============================================

/**
 * File filter to only accept spreadsheet exports
 */
const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  if (isSupportedFile(file.originalname)) {
    cb(null, true);
  } else {
    cb(AppError.badRequest(`Only .csv, .xlsx and .xls files are allowed (got ${file.originalname})`));
  }
};

/**
 * Multer upload middleware
 * - Both ledgers are held in memory for the duration of the request
 * - One file per ledger field
 */
const upload = multer({
  storage: multer.memoryStorage(),
  fileFilter,
  limits: {
    fileSize: env.MAX_UPLOAD_SIZE_MB * 1024 * 1024,
    files: LEDGER_FIELDS.length,
  },
});

// ============================================
// Routes
// ============================================

/**
 * @route   POST /api/v1/reconciliation
 * @desc    Reconcile a partner statement against a processor settlement report
 * @access  Public
 *
 * Form fields (multipart/form-data):
 * - statement: .csv/.xlsx/.xls partner statement
 * - settlement: .csv/.xlsx/.xls processor settlement report
 *
 * Query params:
 * - format: json (default) | csv | xlsx
 * - collisionPolicy: sum | reject (default from COLLISION_POLICY)
 * - varianceTolerance: number (default from VARIANCE_TOLERANCE)
 *
 * Response:
 * - 200 OK: { runId, results: [], summary: {} } or the result table file
 * - 400 Bad Request: missing/unsupported/unreadable file, invalid query
 * - 413 Payload Too Large: file over MAX_UPLOAD_SIZE_MB
 * - 422 Unprocessable Entity: ledger with the wrong shape, rejected key collision
 */
router.post(
  '/',
  upload.fields(LEDGER_FIELDS.map((name) => ({ name, maxCount: 1 }))),
  validateRequest({ query: reconcileQuerySchema }),
  reconciliationController.reconcile
);

export default router;
