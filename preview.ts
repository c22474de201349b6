import type { CellValue, Dataset } from './types';
import { cellToString } from './utils';

const MAX_CELL_WIDTH = 24;

const formatCell = (value: CellValue | undefined): string => {
  const text = cellToString(value).replace(/\s+/g, ' ');
  return text.length > MAX_CELL_WIDTH ? `${text.slice(0, MAX_CELL_WIDTH - 1)}…` : text;
};

/**
 * Plain-text table of the first `limit` rows, with a summary line on top.
 */
export const formatPreview = (dataset: Dataset, limit = 5): string => {
  const rows = dataset.data.slice(0, limit);
  const header = dataset.columns.map(col => formatCell(col.name));
  const body = rows.map(row => dataset.columns.map(col => formatCell(row[col.name])));
  const widths = header.map((h, i) => Math.max(h.length, ...body.map(cells => cells[i].length)));

  const line = (cells: string[]): string =>
    cells.map((cell, i) => cell.padEnd(widths[i])).join(' | ').trimEnd();

  const lines = [
    `${dataset.name} (${dataset.type.toUpperCase()}) - ${dataset.rowCount} rows, ${dataset.columns.length} cols`,
  ];
  if (dataset.columns.length > 0) {
    lines.push(line(header), widths.map(w => '-'.repeat(w)).join('-+-'), ...body.map(line));
  }
  if (dataset.data.length > rows.length) {
    lines.push(`Showing ${rows.length} of ${dataset.rowCount} rows`);
  }
  return lines.join('\n');
};
