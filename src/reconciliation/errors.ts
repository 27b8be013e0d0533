/**
 * Error taxonomy for the reconciliation engine.
 *
 * Row-level errors (malformed key, unparseable amount, zero rate) are
 * recovered by the normalizers: the row is skipped and reported.
 * Run-level errors (invalid ledger structure, key collision under the
 * 'reject' policy) are thrown and end the run.
 */

export type ReconciliationErrorCode =
  | 'MALFORMED_KEY'
  | 'UNPARSEABLE_AMOUNT'
  | 'DIVISION_BY_ZERO'
  | 'DUPLICATE_KEY_COLLISION'
  | 'INVALID_LEDGER';

export class ReconciliationError extends Error {
  public readonly code: ReconciliationErrorCode;

  constructor(code: ReconciliationErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MalformedKeyError extends ReconciliationError {
  constructor(public readonly text: string) {
    super('MALFORMED_KEY', `No 11-digit PartnerPin at the end of "${text}"`);
  }
}

export class UnparseableAmountError extends ReconciliationError {
  constructor(
    public readonly field: string,
    public readonly value: string
  ) {
    super('UNPARSEABLE_AMOUNT', `Invalid ${field}: "${value}"`);
  }
}

export class DivisionByZeroError extends ReconciliationError {
  constructor(public readonly field: string) {
    super('DIVISION_BY_ZERO', `${field} is zero; USD amount cannot be derived`);
  }
}

export class DuplicateKeyCollisionError extends ReconciliationError {
  constructor(
    public readonly source: string,
    public readonly pin: string,
    public readonly recordCount: number
  ) {
    super(
      'DUPLICATE_KEY_COLLISION',
      `PartnerPin ${pin} has ${recordCount} eligible ${source} records`
    );
  }
}

export class InvalidLedgerError extends ReconciliationError {
  constructor(
    public readonly source: string,
    detail: string
  ) {
    super('INVALID_LEDGER', `Invalid ${source} ledger: ${detail}`);
  }
}

/**
 * Errors that end a run instead of skipping a row.
 */
export const isFatalReconciliationError = (error: unknown): error is ReconciliationError =>
  error instanceof DuplicateKeyCollisionError || error instanceof InvalidLedgerError;
