export { default as logger, Logging } from './logger';
export { sendSuccess, sendError, sendFile } from './response';
export { AppError } from './AppError';
export { readTable, writeTable, isSupportedFile, RESULT_CONTENT_TYPES } from './spreadsheet';
export type { ResultFormat } from './spreadsheet';
