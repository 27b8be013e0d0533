import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { AppError, logger } from '../utils';
import { env } from '../config';
import { ReconciliationError, isFatalReconciliationError } from '../reconciliation';

/**
 * Maps known error types onto an AppError with the right status code.
 */
export const toAppError = (err: Error): AppError => {
  if (err instanceof AppError) {
    return err;
  }

  // Upload limits and unexpected form fields
  if (err instanceof MulterError) {
    return err.code === 'LIMIT_FILE_SIZE'
      ? AppError.payloadTooLarge(`Uploaded file is too large (field "${err.field ?? 'unknown'}")`)
      : AppError.badRequest(`Upload rejected: ${err.message}`);
  }

  // Ledger shape problems and rejected key collisions end the run
  if (isFatalReconciliationError(err)) {
    return AppError.unprocessable(err.message);
  }
  if (err instanceof ReconciliationError) {
    return AppError.badRequest(err.message);
  }

  return AppError.internal();
};

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const appError = toAppError(err);

  // Log error
  if (!appError.isOperational) {
    logger.error('Unhandled Error:', err);
  } else {
    logger.warn(`Operational Error: ${appError.message}`);
  }

  // Send response
  res.status(appError.statusCode).json({
    success: false,
    error: appError.message,
    ...(env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
