import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import * as XLSX from 'xlsx';
import {
  exportDataset,
  exportToCSV,
  exportToExcel,
  exportToJSON,
  loadDataset,
  readDataset,
  toColumnNames,
  typeDelimitedColumn,
} from '../fileService';
import { XLSX_MIME_TYPE } from '../config';
import { FileLoadError } from '../errors';
import { buildKeyColumn } from '../keys';
import { makeDataset } from './helpers';

const csv = (text: string): Buffer => Buffer.from(text, 'utf8');

const workbook = (sheets: Record<string, unknown[][]>): Buffer => {
  const book = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(book, XLSX.utils.aoa_to_sheet(rows), name);
  }
  return XLSX.write(book, { type: 'buffer', bookType: 'xlsx' });
};

describe('readDataset', () => {
  it('reads delimited text', () => {
    const content = csv('Short Name,Goals\nA,1\nB,2\n');
    const dataset = readDataset(content, 'base1.csv');

    expect(dataset.type).toBe('csv');
    expect(dataset.sheets).toBeNull();
    expect(dataset.selectedSheet).toBeNull();
    expect(dataset.columns).toEqual([
      { name: 'Short Name', type: 'text' },
      { name: 'Goals', type: 'number' },
    ]);
    expect(dataset.data).toEqual([
      { 'Short Name': 'A', Goals: 1 },
      { 'Short Name': 'B', Goals: 2 },
    ]);
    expect(dataset.rowCount).toBe(2);
    expect(dataset.rawSize).toBe(content.length);
  });

  it('pads short rows with nulls', () => {
    const dataset = readDataset(csv('A,B\n1,2\n3\n'), 'short.csv');

    expect(dataset.data).toEqual([
      { A: 1, B: 2 },
      { A: 3, B: null },
    ]);
  });

  it('keeps dates and mixed text as written', () => {
    const dataset = readDataset(
      csv('Short Name,Birthdate,Shirt,Active,Code\nA,2001-05-03,7,TRUE,007\nB,03/05/2001,10,false,X1\n'),
      'players.csv',
    );

    expect(dataset.data).toEqual([
      { 'Short Name': 'A', Birthdate: '2001-05-03', Shirt: 7, Active: true, Code: '007' },
      { 'Short Name': 'B', Birthdate: '03/05/2001', Shirt: 10, Active: false, Code: 'X1' },
    ]);
    expect(dataset.columns[1]).toEqual({ name: 'Birthdate', type: 'date' });
  });

  it('reads all-numeric columns as numbers', () => {
    const dataset = readDataset(csv('Squad,Note\n007,\n010,ok\n'), 'squad.csv');

    expect(dataset.data).toEqual([
      { Squad: 7, Note: null },
      { Squad: 10, Note: 'ok' },
    ]);
  });

  it('builds date keys from the text of the cell', () => {
    const dataset = readDataset(csv('Short Name,Birthdate\nA,2001-05-03\n'), 'players.csv');
    const { dataset: keyed, keyColumn } = buildKeyColumn(dataset, ['Short Name', 'Birthdate']);

    expect(keyed.data[0][keyColumn]).toBe('a 2001-05-03');
  });

  it('opens the first sheet of a workbook by default', () => {
    const content = workbook({
      Clubs: [['Club'], ['Molde']],
      Players: [['Player', 'Goals'], ['Ann', 3]],
    });
    const dataset = readDataset(content, 'league.xlsx');

    expect(dataset.type).toBe('excel');
    expect(dataset.sheets).toEqual(['Clubs', 'Players']);
    expect(dataset.selectedSheet).toBe('Clubs');
    expect(dataset.data).toEqual([{ Club: 'Molde' }]);
  });

  it('opens a requested sheet', () => {
    const content = workbook({
      Clubs: [['Club'], ['Molde']],
      Players: [['Player', 'Goals'], ['Ann', 3]],
    });
    const dataset = readDataset(content, 'league.xlsx', 'Players');

    expect(dataset.selectedSheet).toBe('Players');
    expect(dataset.data).toEqual([{ Player: 'Ann', Goals: 3 }]);
  });

  it('rejects an unknown sheet', () => {
    const content = workbook({ Clubs: [['Club'], ['Molde']] });

    expect(() => readDataset(content, 'league.xlsx', 'Missing')).toThrow(FileLoadError);
    expect(() => readDataset(content, 'league.xlsx', 'Missing')).toThrow(
      "league.xlsx: worksheet named 'Missing' not found",
    );
  });
});

describe('typeDelimitedColumn', () => {
  it('turns an all-boolean column into booleans', () => {
    expect(typeDelimitedColumn(['TRUE', '', 'False'])).toEqual([true, null, false]);
  });

  it('leaves a column with any text untouched', () => {
    expect(typeDelimitedColumn(['12', 'n/a', null])).toEqual(['12', 'n/a', null]);
  });
});

describe('toColumnNames', () => {
  it('names blank headers and numbers repeats', () => {
    expect(toColumnNames(['A', null, 'A', ' B ', 'A'])).toEqual(['A', 'Unnamed: 1', 'A.1', 'B', 'A.2']);
  });

  it('does not reuse a name that is already taken', () => {
    expect(toColumnNames(['A', 'A.1', 'A'])).toEqual(['A', 'A.1', 'A.2']);
  });

  it('stringifies numeric headers', () => {
    expect(toColumnNames([2024, 2025])).toEqual(['2024', '2025']);
  });
});

describe('loadDataset', () => {
  let dir = '';

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'table-merge-files-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a file from disk', async () => {
    const path = join(dir, 'base2.csv');
    await writeFile(path, 'Short Name,Assists\nA,5\n');
    const dataset = await loadDataset(path);

    expect(dataset.name).toBe('base2.csv');
    expect(dataset.data).toEqual([{ 'Short Name': 'A', Assists: 5 }]);
  });

  it('reports unreadable files as load errors', async () => {
    await expect(loadDataset(join(dir, 'nope.xlsx'))).rejects.toBeInstanceOf(FileLoadError);
  });
});

describe('export', () => {
  const merged = makeDataset('Merged', ['id', 'name'], [[1, 'Ann'], [2, null]]);

  it('writes a workbook with a Merged sheet', () => {
    const artifact = exportToExcel(merged);

    expect(artifact.fileName).toBe('merged_players.xlsx');
    expect(artifact.mimeType).toBe(XLSX_MIME_TYPE);

    const reread = readDataset(artifact.data, artifact.fileName);
    expect(reread.sheets).toEqual(['Merged']);
    expect(reread.data).toEqual([
      { id: 1, name: 'Ann' },
      { id: 2, name: null },
    ]);
  });

  it('writes CSV', () => {
    const artifact = exportToCSV(merged, 'out.csv');

    expect(artifact.mimeType).toBe('text/csv');
    expect(artifact.data.toString('utf8').split('\n')).toEqual(['id,name', '1,Ann', '2,']);
  });

  it('writes JSON records', () => {
    const artifact = exportToJSON(merged, 'out.json');

    expect(JSON.parse(artifact.data.toString('utf8'))).toEqual([
      { id: 1, name: 'Ann' },
      { id: 2, name: null },
    ]);
  });

  it('names artifacts by format', () => {
    expect(exportDataset(merged, 'xlsx').fileName).toBe('merged_players.xlsx');
    expect(exportDataset(merged, 'csv').fileName).toBe('merged_players.csv');
    expect(exportDataset(merged, 'json').mimeType).toBe('application/json');
  });
});
