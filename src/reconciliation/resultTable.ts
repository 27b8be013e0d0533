/**
 * Renders reconciliation results as the exported result table.
 */

import { roundCurrency } from './cells';
import { CLASSIFICATION_LABELS, FINAL_STATUS_LABELS, RESULT_TABLE_HEADER } from './constants';
import type { ReconciliationResult } from './types';

export type ResultTableRow = [string, string, string, string, string, string];

/**
 * Amounts print as cents rounded half away from zero, the same rounding
 * the variance uses; absent amounts print blank.
 */
export function formatAmount(value: number | undefined): string {
  return value === undefined ? '' : roundCurrency(value).toFixed(2);
}

export function toResultRow(result: ReconciliationResult): ResultTableRow {
  return [
    result.pin,
    CLASSIFICATION_LABELS[result.classification],
    formatAmount(result.statementAmount),
    formatAmount(result.settlementAmountUSD),
    formatAmount(result.amountVariance),
    FINAL_STATUS_LABELS[result.finalStatus],
  ];
}

/**
 * Header row followed by one row per result, in result order.
 */
export function toResultTable(results: readonly ReconciliationResult[]): string[][] {
  return [[...RESULT_TABLE_HEADER], ...results.map(toResultRow)];
}
