import type { CellValue, Dataset, Row } from '../types';
import { Logger, type LogStream } from '../logger';
import { inferColumnType } from '../utils';

export const makeDataset = (name: string, columns: string[], rows: CellValue[][]): Dataset => {
  const data = rows.map(values => {
    const row: Row = {};
    columns.forEach((col, i) => {
      row[col] = values[i] ?? null;
    });
    return row;
  });
  return {
    name,
    type: 'csv',
    columns: columns.map(col => ({ name: col, type: inferColumnType(data.map(row => row[col])) })),
    data,
    rowCount: data.length,
    sheets: null,
    selectedSheet: null,
  };
};

export interface CapturedLine {
  stream: LogStream;
  line: string;
}

export const captureLogger = (): { logger: Logger; lines: CapturedLine[] } => {
  const lines: CapturedLine[] = [];
  const logger = new Logger({ level: 'debug', sink: (stream, line) => lines.push({ stream, line }) });
  return { logger, lines };
};

export const silentLogger = (): Logger => new Logger({ silent: true });
