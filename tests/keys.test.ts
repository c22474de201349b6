import { describe, expect, it } from 'vitest';
import { bestGuessKeys, buildKeyColumn, keyColumnName, resolveKeySelection } from '../keys';
import { KeyColumnError } from '../errors';
import { makeDataset } from './helpers';

describe('buildKeyColumn', () => {
  it('appends a normalized key built from several columns', () => {
    const table = makeDataset('t1', ['A', 'B'], [['X', 'Y']]);
    const { dataset, keyColumn } = buildKeyColumn(table, ['A', 'B']);

    expect(keyColumn).toBe('A_&_B__norm');
    expect(dataset.columns.map(c => c.name)).toEqual(['A', 'B', 'A_&_B__norm']);
    expect(dataset.data[0]).toEqual({ A: 'X', B: 'Y', 'A_&_B__norm': 'x y' });
  });

  it('leaves the input dataset untouched', () => {
    const table = makeDataset('t1', ['A'], [['X']]);
    buildKeyColumn(table, 'A');

    expect(table.columns.map(c => c.name)).toEqual(['A']);
    expect(table.data[0]).toEqual({ A: 'X' });
  });

  it('accepts a single column name', () => {
    const table = makeDataset('t1', ['Short Name'], [['  Éder  Militão ']]);
    const { dataset, keyColumn } = buildKeyColumn(table, 'Short Name');

    expect(keyColumn).toBe('Short Name__norm');
    expect(dataset.data[0][keyColumn]).toBe('eder militao');
  });

  it('renders missing cells and numbers before normalizing', () => {
    const table = makeDataset('t1', ['A', 'B'], [[' José ', null], [7, 'Ab']]);
    const { dataset, keyColumn } = buildKeyColumn(table, ['A', 'B']);

    expect(dataset.data.map(row => row[keyColumn])).toEqual(['jose', '7 ab']);
  });

  it('passes normalization flags through', () => {
    const table = makeDataset('t1', ['A'], [['ÉLAN']]);
    const { dataset } = buildKeyColumn(table, ['A'], { toLowerCase: false });

    expect(dataset.data[0]['A__norm']).toBe('ELAN');
  });

  it('fails when a column is absent', () => {
    const table = makeDataset('t1', ['A'], [['X']]);

    expect(() => buildKeyColumn(table, ['A', 'C'])).toThrow(KeyColumnError);
    expect(() => buildKeyColumn(table, ['C'])).toThrow("Key column(s) not found in t1: 'C'");
  });

  it('fails without columns', () => {
    const table = makeDataset('t1', ['A'], [['X']]);

    expect(() => buildKeyColumn(table, [])).toThrow('No key columns selected for t1');
  });

  it('refuses to replace an existing column', () => {
    const table = makeDataset('t1', ['A', 'A__norm'], [['X', 'kept']]);

    expect(() => buildKeyColumn(table, 'A')).toThrow(KeyColumnError);
  });

  it('names keys by joining columns', () => {
    expect(keyColumnName(['Short Name', 'Birthdate'])).toBe('Short Name_&_Birthdate__norm');
  });
});

describe('bestGuessKeys', () => {
  it('prefers a shared short-name alias', () => {
    expect(bestGuessKeys(['Short Name', 'Age'], ['Short Name', 'Club'])).toEqual(['Short Name']);
    expect(bestGuessKeys(['Player', 'Short Name'], ['Short Name', 'Player'])).toEqual(['Short Name']);
  });

  it('falls back to generic aliases in order', () => {
    expect(bestGuessKeys(['Name', 'Player'], ['Player', 'Name'])).toEqual(['Player']);
    expect(bestGuessKeys(['Nome', 'Gols'], ['Nome'])).toEqual(['Nome']);
  });

  it('falls back to the first shared column', () => {
    expect(bestGuessKeys(['Age', 'Club', 'Goals'], ['Goals', 'Club'])).toEqual(['Club']);
  });

  it('returns nothing without overlap', () => {
    expect(bestGuessKeys(['Foo'], ['Bar'])).toEqual([]);
  });
});

describe('resolveKeySelection', () => {
  const left = makeDataset('left', ['Player', 'Goals'], []);
  const right = makeDataset('right', ['Player', 'Club'], []);

  it('uses the guess for sides without a selection', () => {
    expect(resolveKeySelection(left, right, undefined, [])).toEqual({
      leftKeys: ['Player'],
      rightKeys: ['Player'],
      guessed: ['Player'],
    });
  });

  it('keeps explicit selections', () => {
    const selection = resolveKeySelection(left, right, ['Goals'], ['Club']);

    expect(selection.leftKeys).toEqual(['Goals']);
    expect(selection.rightKeys).toEqual(['Club']);
  });
});
