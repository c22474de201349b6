import type { CellValue, DataType, NormalizationConfig } from './types';
import { DEFAULT_NORMALIZATION } from './config';

// --- Cell helpers ---

export const isMissing = (value: CellValue | undefined): boolean =>
  value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));

export const toCellValue = (raw: unknown): CellValue => {
  if (typeof raw === 'string' || typeof raw === 'boolean') return raw;
  if (typeof raw === 'number') return raw;
  if (raw instanceof Date) return raw;
  return null;
};

export const cellToString = (value: CellValue | undefined): string => {
  if (value === null || value === undefined || isMissing(value)) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
};

// --- Normalization ---

const COMBINING_MARKS = /\p{Mn}/gu;

export const normalizeString = (value: string, config: NormalizationConfig): string => {
  let str = value;

  if (config.removeAccents) {
    str = str.normalize('NFD').replace(COMBINING_MARKS, '');
  }
  if (config.toLowerCase) {
    str = str.toLowerCase();
  }
  if (config.removeSpecialChars) {
    // Keep alphanumeric and spaces
    str = str.replace(/[^a-zA-Z0-9\s]/g, '');
  }
  if (config.removeNumbers) {
    str = str.replace(/[0-9]/g, '');
  }

  // Collapse multiple spaces
  str = str.replace(/\s+/g, ' ');

  if (config.trimWhitespace) {
    str = str.trim();
  }

  return str;
};

/**
 * Canonical form of a cell for key matching. Missing values come back
 * untouched; everything else becomes a normalized string.
 */
export const normalizeValue = (
  value: CellValue,
  config: Partial<NormalizationConfig> = {},
): CellValue => {
  if (isMissing(value)) return value;
  return normalizeString(cellToString(value), { ...DEFAULT_NORMALIZATION, ...config });
};

// --- Type Inference ---

export const inferType = (value: string): DataType => {
  if (!value) return 'text';
  if (!isNaN(Number(value)) && value.trim() !== '') return 'number';
  if (value.match(/^\d{4}-\d{2}-\d{2}$/) || value.match(/^\d{1,2}\/\d{1,2}\/\d{4}$/)) return 'date';
  if (value.toLowerCase() === 'true' || value.toLowerCase() === 'false') return 'boolean';
  return 'text';
};

export const inferColumnType = (values: CellValue[]): DataType => {
  const sample = values.find(v => !isMissing(v));
  if (sample === undefined || sample === null) return 'text';
  if (typeof sample === 'number') return 'number';
  if (typeof sample === 'boolean') return 'boolean';
  if (sample instanceof Date) return 'date';
  return inferType(sample);
};

// --- Formatting ---

export const formatSize = (bytes: number): string => {
  const sizeMB = bytes / (1024 * 1024);
  return sizeMB < 1 ? `${(bytes / 1024).toFixed(1)} KB` : `${sizeMB.toFixed(1)} MB`;
};
