import { readFile, stat } from 'fs/promises';
import { basename } from 'path';
import * as XLSX from 'xlsx';
import type { CellValue, ColumnDef, DataType, Dataset, ExportArtifact, ExportFormat, Row } from './types';
import { MAX_FILE_SIZE_MB, MERGED_FILE_NAME, MERGED_SHEET_NAME, XLSX_MIME_TYPE } from './config';
import { FileLoadError, isMergeToolError } from './errors';
import { cellToString, formatSize, inferColumnType, inferType, toCellValue } from './utils';

export const isDelimitedFile = (fileName: string): boolean => fileName.toLowerCase().endsWith('.csv');

// --- Parsers ---

/**
 * Header cells become column names: blanks are "Unnamed: <index>" and repeats
 * get ".1", ".2", ... appended.
 */
export const toColumnNames = (headerRow: unknown[]): string[] => {
  const seen = new Map<string, number>();
  const taken = new Set<string>();
  return headerRow.map((cell, idx) => {
    const raw = cellToString(toCellValue(cell)).trim();
    const base = raw === '' ? `Unnamed: ${idx}` : raw;
    let name = base;
    let count = seen.get(base) ?? 0;
    while (taken.has(name)) {
      count++;
      name = `${base}.${count}`;
    }
    seen.set(base, count);
    taken.add(name);
    return name;
  });
};

/**
 * Delimited text arrives as strings. A column becomes numeric or boolean only
 * when every filled cell reads that way; anything else, dates included, stays
 * as written. Empty fields are missing.
 */
export const typeDelimitedColumn = (values: CellValue[]): CellValue[] => {
  const filled = values.filter((v): v is string => typeof v === 'string' && v !== '');
  const kinds = new Set(filled.map(inferType));
  const only = (kind: DataType): boolean => filled.length > 0 && kinds.size === 1 && kinds.has(kind);

  if (only('number')) {
    return values.map(v => (typeof v === 'string' && v !== '' ? Number(v) : null));
  }
  if (only('boolean')) {
    return values.map(v => (typeof v === 'string' && v !== '' ? v.toLowerCase() === 'true' : null));
  }
  return values.map(v => (v === '' ? null : v));
};

const sheetToTable = (
  worksheet: XLSX.WorkSheet,
  delimited: boolean,
): { columns: ColumnDef[]; data: Row[] } => {
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    defval: null,
    blankrows: false,
    raw: true,
  });
  if (matrix.length === 0) return { columns: [], data: [] };

  const [headerRow, ...body] = matrix;
  const names = toColumnNames(headerRow);

  const cells = names.map((_, i) => {
    const values = body.map(row => toCellValue(row[i]));
    return delimited ? typeDelimitedColumn(values) : values;
  });

  const data = body.map((_, r) => {
    const row: Row = {};
    names.forEach((name, i) => {
      row[name] = cells[i][r];
    });
    return row;
  });

  const columns: ColumnDef[] = names.map((name, i) => ({
    name,
    type: inferColumnType(cells[i]),
  }));

  return { columns, data };
};

export const parseWorkbook = (content: Buffer, fileName: string): XLSX.WorkBook => {
  try {
    if (isDelimitedFile(fileName)) {
      return XLSX.read(content.toString('utf8'), { type: 'string', raw: true });
    }
    return XLSX.read(content, { type: 'buffer', cellDates: true });
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new FileLoadError(fileName, `${fileName}: ${reason}`, e);
  }
};

/**
 * Parse file content into a dataset. Workbooks open `sheet` when given,
 * otherwise their first sheet.
 */
export const readDataset = (content: Buffer, fileName: string, sheet?: string | null): Dataset => {
  const workbook = parseWorkbook(content, fileName);
  const sheetNames = workbook.SheetNames;
  if (sheetNames.length === 0) {
    throw new FileLoadError(fileName, `${fileName}: workbook contains no sheets`);
  }

  const delimited = isDelimitedFile(fileName);
  const requested = delimited ? null : sheet || null;
  if (requested !== null && !sheetNames.includes(requested)) {
    throw new FileLoadError(fileName, `${fileName}: worksheet named '${requested}' not found`);
  }

  const selected = requested ?? sheetNames[0];
  const { columns, data } = sheetToTable(workbook.Sheets[selected], delimited);

  return {
    name: fileName,
    type: delimited ? 'csv' : 'excel',
    columns,
    data,
    rowCount: data.length,
    sheets: delimited ? null : [...sheetNames],
    selectedSheet: delimited ? null : selected,
    size: formatSize(content.length),
    rawSize: content.length,
  };
};

export const loadDataset = async (filePath: string, sheet?: string | null): Promise<Dataset> => {
  const fileName = basename(filePath);
  try {
    const info = await stat(filePath);
    const sizeMB = info.size / (1024 * 1024);
    if (sizeMB > MAX_FILE_SIZE_MB) {
      throw new FileLoadError(
        fileName,
        `${fileName}: file size (${sizeMB.toFixed(1)}MB) exceeds the ${MAX_FILE_SIZE_MB}MB limit`,
      );
    }
    const content = await readFile(filePath);
    return readDataset(content, fileName, sheet);
  } catch (e) {
    if (isMergeToolError(e)) throw e;
    const reason = e instanceof Error ? e.message : String(e);
    throw new FileLoadError(fileName, reason, e);
  }
};

// --- Export Utils ---

const toMatrix = (dataset: Dataset): CellValue[][] => {
  const header = dataset.columns.map(c => c.name);
  const rows = dataset.data.map(row => header.map(name => row[name] ?? null));
  return [header, ...rows];
};

export const datasetToSheet = (dataset: Dataset): XLSX.WorkSheet =>
  XLSX.utils.aoa_to_sheet(toMatrix(dataset));

export const exportToExcel = (
  dataset: Dataset,
  fileName: string = MERGED_FILE_NAME,
  sheetName: string = MERGED_SHEET_NAME,
): ExportArtifact => {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, datasetToSheet(dataset), sheetName);
  const data: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return { fileName, mimeType: XLSX_MIME_TYPE, data };
};

export const exportToCSV = (dataset: Dataset, fileName: string): ExportArtifact => {
  const csv = XLSX.utils.sheet_to_csv(datasetToSheet(dataset));
  return { fileName, mimeType: 'text/csv', data: Buffer.from(csv, 'utf8') };
};

export const exportToJSON = (dataset: Dataset, fileName: string): ExportArtifact => {
  const records = dataset.data.map(row => {
    const record: Row = {};
    dataset.columns.forEach(c => {
      record[c.name] = row[c.name] ?? null;
    });
    return record;
  });
  return {
    fileName,
    mimeType: 'application/json',
    data: Buffer.from(JSON.stringify(records, null, 2), 'utf8'),
  };
};

const baseName = MERGED_FILE_NAME.replace(/\.xlsx$/, '');

export const exportDataset = (dataset: Dataset, format: ExportFormat): ExportArtifact => {
  switch (format) {
    case 'csv':
      return exportToCSV(dataset, `${baseName}.csv`);
    case 'json':
      return exportToJSON(dataset, `${baseName}.json`);
    default:
      return exportToExcel(dataset);
  }
};
