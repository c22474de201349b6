import type {
  CellValue,
  ColumnDef,
  Dataset,
  MergeOptions,
  MergeOrigin,
  MergeResult,
  MergeStats,
  Row,
} from './types';
import { DEFAULT_SUFFIXES, GENERIC_KEY_ALIAS, MERGED_SHEET_NAME, parseMergeRequest } from './config';
import { KeyColumnError, KeyCountMismatchError, MergeError } from './errors';
import { buildKeyColumn } from './keys';
import { createLogger, type Logger } from './logger';
import { isMissing } from './utils';

export const INDICATOR_COLUMN = '_merge';

type KeyPart = string | number | boolean | null;

interface PendingRow {
  parts: KeyPart[] | null;
  leftRow: Row | null;
  rightRow: Row | null;
}

interface OutputColumn {
  def: ColumnDef;
  source: 'key' | 'left' | 'right';
  from: string;
}

// --- Key matching ---

/**
 * Key values of a row in column order. Missing cells become `null`, so they
 * pair with each other, unless `skipBlank` is set: then a missing or empty
 * part makes the whole key unmatched.
 */
const keyParts = (row: Row, columns: string[], skipBlank: boolean): KeyPart[] | null => {
  const parts: KeyPart[] = [];
  for (const col of columns) {
    const value = row[col];
    if (value === undefined || value === null || isMissing(value)) {
      if (skipBlank) return null;
      parts.push(null);
    } else if (value === '' && skipBlank) {
      return null;
    } else {
      parts.push(value instanceof Date ? value.toISOString() : value);
    }
  }
  return parts;
};

const toToken = (parts: KeyPart[]): string => JSON.stringify(parts);

const indexRows = (rows: Row[], columns: string[], skipBlank: boolean): Map<string, number[]> => {
  const index = new Map<string, number[]>();
  rows.forEach((row, idx) => {
    const parts = keyParts(row, columns, skipBlank);
    if (parts === null) return;
    const token = toToken(parts);
    const bucket = index.get(token);
    if (bucket) {
      bucket.push(idx);
    } else {
      index.set(token, [idx]);
    }
  });
  return index;
};

// Booleans, then numbers, then strings, then missing.
const partRank = (part: KeyPart): number => {
  if (part === null) return 3;
  if (typeof part === 'boolean') return 0;
  return typeof part === 'number' ? 1 : 2;
};

const comparePart = (a: KeyPart, b: KeyPart): number => {
  const rank = partRank(a) - partRank(b);
  if (rank !== 0) return rank;
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return Number(a) - Number(b);
};

/** Ascending key order; unmatched keys last. */
const compareKeys = (a: KeyPart[] | null, b: KeyPart[] | null): number => {
  if (a === null || b === null) return a === b ? 0 : a === null ? 1 : -1;
  for (let i = 0; i < a.length; i++) {
    const diff = comparePart(a[i], b[i]);
    if (diff !== 0) return diff;
  }
  return 0;
};

// --- Column layout ---

const planColumns = (left: Dataset, right: Dataset, options: MergeOptions): OutputColumn[] => {
  const sharedKeys = new Set(options.leftOn.filter((col, i) => options.rightOn[i] === col));
  const rightNames = new Set(right.columns.map(c => c.name));
  const overlap = new Set(
    left.columns.map(c => c.name).filter(name => rightNames.has(name) && !sharedKeys.has(name)),
  );

  const [leftSuffix, rightSuffix] = options.suffixes;
  if (overlap.size > 0 && leftSuffix === rightSuffix) {
    throw new MergeError(
      `Columns overlap but no distinct suffixes were given: ${[...overlap].join(', ')}`,
    );
  }

  const plan: OutputColumn[] = [];
  for (const col of left.columns) {
    if (sharedKeys.has(col.name)) {
      plan.push({ def: { ...col }, source: 'key', from: col.name });
    } else {
      const name = overlap.has(col.name) ? col.name + leftSuffix : col.name;
      plan.push({ def: { ...col, name }, source: 'left', from: col.name });
    }
  }
  for (const col of right.columns) {
    if (sharedKeys.has(col.name)) continue;
    const name = overlap.has(col.name) ? col.name + rightSuffix : col.name;
    plan.push({ def: { ...col, name }, source: 'right', from: col.name });
  }
  return plan;
};

const buildRow = (plan: OutputColumn[], leftRow: Row | null, rightRow: Row | null): Row => {
  const out: Row = {};
  for (const col of plan) {
    let value: CellValue | undefined;
    if (col.source === 'key') {
      value = leftRow ? leftRow[col.from] : rightRow?.[col.from];
    } else if (col.source === 'left') {
      value = leftRow?.[col.from];
    } else {
      value = rightRow?.[col.from];
    }
    out[col.def.name] = value ?? null;
  }
  return out;
};

/**
 * Restore the conventional "Player" column after the first table's copy was
 * suffixed, as long as nothing else already took the plain name.
 */
export const applyCompatRename = (dataset: Dataset, suffix: string): Dataset => {
  const suffixed = GENERIC_KEY_ALIAS + suffix;
  const names = dataset.columns.map(c => c.name);
  if (!names.includes(suffixed) || names.includes(GENERIC_KEY_ALIAS)) return dataset;

  const rename = (name: string): string => (name === suffixed ? GENERIC_KEY_ALIAS : name);
  return {
    ...dataset,
    columns: dataset.columns.map(c => ({ ...c, name: rename(c.name) })),
    data: dataset.data.map(row => {
      const out: Row = {};
      for (const [name, value] of Object.entries(row)) {
        out[rename(name)] = value;
      }
      return out;
    }),
  };
};

// --- Merge Engine ---

const validateKeys = (dataset: Dataset, keys: string[]): void => {
  const known = new Set(dataset.columns.map(c => c.name));
  const missing = keys.filter(k => !known.has(k));
  if (missing.length > 0) {
    throw KeyColumnError.missing(missing, dataset.name);
  }
};

export const mergeDatasets = (
  left: Dataset,
  right: Dataset,
  options: Partial<MergeOptions> & Pick<MergeOptions, 'leftOn' | 'rightOn'>,
): MergeResult => {
  const opts: MergeOptions = {
    how: options.how ?? 'inner',
    leftOn: options.leftOn,
    rightOn: options.rightOn,
    suffixes: options.suffixes ?? DEFAULT_SUFFIXES,
    indicator: options.indicator ?? false,
    skipBlankKeys: options.skipBlankKeys ?? false,
  };

  if (opts.leftOn.length === 0 || opts.leftOn.length !== opts.rightOn.length) {
    throw new KeyCountMismatchError(opts.leftOn.length, opts.rightOn.length);
  }
  validateKeys(left, opts.leftOn);
  validateKeys(right, opts.rightOn);
  if (opts.indicator && [left, right].some(d => d.columns.some(c => c.name === INDICATOR_COLUMN))) {
    throw new MergeError(`Cannot add the indicator: a column named '${INDICATOR_COLUMN}' already exists`);
  }

  const plan = planColumns(left, right, opts);
  const rows: Row[] = [];
  const stats: MergeStats = { matched: 0, leftOnly: 0, rightOnly: 0 };

  const emit = (leftRow: Row | null, rightRow: Row | null): void => {
    const row = buildRow(plan, leftRow, rightRow);
    let origin: MergeOrigin;
    if (leftRow && rightRow) {
      origin = 'both';
      stats.matched++;
    } else if (leftRow) {
      origin = 'left_only';
      stats.leftOnly++;
    } else {
      origin = 'right_only';
      stats.rightOnly++;
    }
    if (opts.indicator) row[INDICATOR_COLUMN] = origin;
    rows.push(row);
  };

  const findMatches = (index: Map<string, number[]>, parts: KeyPart[] | null): number[] =>
    parts === null ? [] : index.get(toToken(parts)) ?? [];

  if (opts.how === 'right') {
    const leftIndex = indexRows(left.data, opts.leftOn, opts.skipBlankKeys);
    for (const rightRow of right.data) {
      const matches = findMatches(leftIndex, keyParts(rightRow, opts.rightOn, opts.skipBlankKeys));
      if (matches.length === 0) {
        emit(null, rightRow);
      }
      for (const idx of matches) {
        emit(left.data[idx], rightRow);
      }
    }
  } else {
    const rightIndex = indexRows(right.data, opts.rightOn, opts.skipBlankKeys);
    const usedRight = new Set<number>();
    const pending: PendingRow[] = [];
    for (const leftRow of left.data) {
      const parts = keyParts(leftRow, opts.leftOn, opts.skipBlankKeys);
      const matches = findMatches(rightIndex, parts);
      if (matches.length === 0 && opts.how !== 'inner') {
        pending.push({ parts, leftRow, rightRow: null });
      }
      for (const idx of matches) {
        usedRight.add(idx);
        pending.push({ parts, leftRow, rightRow: right.data[idx] });
      }
    }
    if (opts.how === 'outer') {
      right.data.forEach((rightRow, idx) => {
        if (usedRight.has(idx)) return;
        pending.push({ parts: keyParts(rightRow, opts.rightOn, opts.skipBlankKeys), leftRow: null, rightRow });
      });
      // Array#sort is stable: equal keys keep left order, then right order.
      pending.sort((a, b) => compareKeys(a.parts, b.parts));
    }
    for (const entry of pending) {
      emit(entry.leftRow, entry.rightRow);
    }
  }

  const columns = plan.map(c => c.def);
  if (opts.indicator) columns.push({ name: INDICATOR_COLUMN, type: 'text' });

  const merged: Dataset = {
    name: MERGED_SHEET_NAME,
    type: 'merged',
    columns,
    data: rows,
    rowCount: rows.length,
    sheets: null,
    selectedSheet: null,
  };

  return {
    dataset: applyCompatRename(merged, opts.suffixes[0]),
    stats,
    leftOn: opts.leftOn,
    rightOn: opts.rightOn,
  };
};

// --- Pipeline ---

const describeKeys = (keys: string[]): string => `[${keys.join(', ')}]`;

/**
 * Validate a key selection, build normalized keys when asked to, and merge.
 */
export const runMerge = (
  left: Dataset,
  right: Dataset,
  input: unknown,
  logger: Logger = createLogger('merge'),
): MergeResult => {
  const request = parseMergeRequest(input);
  const { leftKeys, rightKeys } = request;

  if (leftKeys.length === 0 || rightKeys.length === 0 || leftKeys.length !== rightKeys.length) {
    throw new KeyCountMismatchError(leftKeys.length, rightKeys.length);
  }

  logger.info(`Key columns: ${describeKeys(leftKeys)} <-> ${describeKeys(rightKeys)} (${request.how} join)`);

  let leftData = left;
  let rightData = right;
  let leftOn = leftKeys;
  let rightOn = rightKeys;

  if (request.normalize) {
    logger.debug('Normalizing key columns...');
    const leftKey = buildKeyColumn(left, leftKeys, request.normalization);
    const rightKey = buildKeyColumn(right, rightKeys, request.normalization);
    leftData = leftKey.dataset;
    rightData = rightKey.dataset;
    leftOn = [leftKey.keyColumn];
    rightOn = [rightKey.keyColumn];
  }

  logger.debug(`Merging ${left.rowCount} rows with ${right.rowCount} rows...`);
  const result = mergeDatasets(leftData, rightData, {
    how: request.how,
    leftOn,
    rightOn,
    suffixes: DEFAULT_SUFFIXES,
    indicator: request.indicator,
    skipBlankKeys: request.normalize,
  });

  const { stats, dataset } = result;
  logger.success(`Merge complete: ${dataset.rowCount} rows | ${dataset.columns.length} columns`);
  logger.info(
    `Matched ${stats.matched} | only in ${left.name}: ${stats.leftOnly} | only in ${right.name}: ${stats.rightOnly}`,
  );
  return result;
};

