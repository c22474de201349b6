import type { ColumnDef, Dataset, NormalizationConfig, Row } from './types';
import {
  GENERIC_NAME_ALIASES,
  KEY_COLUMN_DELIMITER,
  NORMALIZED_KEY_SUFFIX,
  SHORT_NAME_ALIASES,
} from './config';
import { KeyColumnError } from './errors';
import { cellToString, normalizeValue } from './utils';

export interface KeyColumnResult {
  dataset: Dataset;
  keyColumn: string;
}

export const keyColumnName = (columns: string[]): string =>
  columns.join(KEY_COLUMN_DELIMITER) + NORMALIZED_KEY_SUFFIX;

/**
 * Append a synthetic key column holding the normalized, space-joined values of
 * `columns`. The input dataset is left as it was.
 */
export const buildKeyColumn = (
  dataset: Dataset,
  columns: string | string[],
  config: Partial<NormalizationConfig> = {},
): KeyColumnResult => {
  const cols = typeof columns === 'string' ? [columns] : columns;
  if (cols.length === 0) {
    throw new KeyColumnError(`No key columns selected for ${dataset.name}`);
  }

  const known = new Set(dataset.columns.map(c => c.name));
  const missing = cols.filter(c => !known.has(c));
  if (missing.length > 0) {
    throw KeyColumnError.missing(missing, dataset.name);
  }

  const keyColumn = keyColumnName(cols);
  if (known.has(keyColumn)) {
    throw new KeyColumnError(`Column '${keyColumn}' already exists in ${dataset.name}`, [keyColumn]);
  }

  const data: Row[] = dataset.data.map(row => ({
    ...row,
    [keyColumn]: normalizeValue(cols.map(c => cellToString(row[c])).join(' '), config),
  }));
  const keyDef: ColumnDef = { name: keyColumn, type: 'text' };

  return {
    dataset: { ...dataset, columns: [...dataset.columns, keyDef], data },
    keyColumn,
  };
};

/**
 * Propose a default key: the first known alias present in both tables, else
 * the first shared column, else nothing.
 */
export const bestGuessKeys = (cols1: readonly string[], cols2: readonly string[]): string[] => {
  for (const alias of [...SHORT_NAME_ALIASES, ...GENERIC_NAME_ALIASES]) {
    if (cols1.includes(alias) && cols2.includes(alias)) {
      return [alias];
    }
  }
  const shared = cols1.filter(c => cols2.includes(c));
  return shared.slice(0, 1);
};

export interface KeySelection {
  leftKeys: string[];
  rightKeys: string[];
  guessed: string[];
}

export const resolveKeySelection = (
  left: Dataset,
  right: Dataset,
  leftKeys?: string[],
  rightKeys?: string[],
): KeySelection => {
  const guessed = bestGuessKeys(
    left.columns.map(c => c.name),
    right.columns.map(c => c.name),
  );
  return {
    leftKeys: leftKeys && leftKeys.length > 0 ? leftKeys : guessed,
    rightKeys: rightKeys && rightKeys.length > 0 ? rightKeys : guessed,
    guessed,
  };
};
