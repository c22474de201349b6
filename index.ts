export * from './types';
export * from './config';
export * from './errors';
export { Logger, createLogger } from './logger';
export type { LogLevel, LoggerOptions, LogSink, LogStream } from './logger';
export { normalizeString, normalizeValue, cellToString, isMissing, inferType, inferColumnType } from './utils';
export { buildKeyColumn, bestGuessKeys, keyColumnName, resolveKeySelection } from './keys';
export type { KeyColumnResult, KeySelection } from './keys';
export { mergeDatasets, runMerge, applyCompatRename, INDICATOR_COLUMN } from './mergeService';
export {
  readDataset,
  loadDataset,
  exportDataset,
  exportToExcel,
  exportToCSV,
  exportToJSON,
} from './fileService';
export { formatPreview } from './preview';
