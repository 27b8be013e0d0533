#!/usr/bin/env node
/**
 * Command-line reconciliation
 *
 * Usage: reconcile <statement.xlsx|csv> <settlement.xlsx|csv> [result.xlsx|csv]
 */

import { readFile, writeFile } from 'fs/promises';
import { basename } from 'path';
import { reconciliationService, RESULT_FILE_BASENAME } from './services/reconciliation.service';
import { logger, Logging, type ResultFormat } from './utils';

const USAGE = 'Usage: reconcile <statement> <settlement> [output.xlsx|output.csv]';

/**
 * Output format from the output file's extension.
 */
export const outputFormat = (outputPath: string): ResultFormat | null => {
  const lower = outputPath.toLowerCase();
  if (lower.endsWith('.csv')) return 'csv';
  if (lower.endsWith('.xlsx')) return 'xlsx';
  return null;
};

/**
 * Runs one file-to-file reconciliation and resolves to the exit code.
 * Unreadable input files and fatal ledger errors reject.
 */
export const main = async (argv: string[]): Promise<number> => {
  const [statementPath, settlementPath, outputPath = `${RESULT_FILE_BASENAME}.xlsx`] = argv;
  if (statementPath === undefined || settlementPath === undefined) {
    Logging.error(USAGE);
    return 2;
  }

  const format = outputFormat(outputPath);
  if (format === null) {
    Logging.error(`Output must end in .csv or .xlsx: ${outputPath}`);
    return 2;
  }

  const [statementBuffer, settlementBuffer] = await Promise.all([
    readFile(statementPath),
    readFile(settlementPath),
  ]);

  const run = reconciliationService.run(
    { buffer: statementBuffer, filename: basename(statementPath) },
    { buffer: settlementBuffer, filename: basename(settlementPath) }
  );
  const file = reconciliationService.export(run, format);
  await writeFile(outputPath, file.body);

  Logging.info(run.summary.byFinalStatus);
  Logging.success(`Reconciliation completed: ${run.results.length} PartnerPins written to ${outputPath}`);
  return 0;
};

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('Reconciliation failed:', error);
      process.exitCode = 1;
    });
}
