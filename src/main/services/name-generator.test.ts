import { describe, expect, it } from 'vitest';
import type { DataTable } from '@shared/types/batch-rename';
import { errorCodeOf, errorOf } from '../../test/helpers';
import { findMissingColumns, formatCellValue, generateNames } from './name-generator';
import { buildTemplate } from './name-template';

const table: DataTable = {
  columns: ['Name', 'Year', 'FiscalYear'],
  rows: [
    { Name: ' Alpha ', Year: 2020, FiscalYear: 2021 },
    { Name: 'Beta', Year: 2019.5, FiscalYear: null },
  ],
};

describe('formatCellValue', () => {
  it('prints whole numbers as integers', () => {
    expect(formatCellValue(2020.0)).toBe('2020');
    expect(formatCellValue(3.25)).toBe('3.25');
  });

  it('trims text and prints null as empty', () => {
    expect(formatCellValue('  x ')).toBe('x');
    expect(formatCellValue(null)).toBe('');
    expect(formatCellValue(true)).toBe('true');
  });

  it('prints dates as YYYY-MM-DD', () => {
    expect(formatCellValue(new Date(2024, 0, 5))).toBe('2024-01-05');
  });
});

describe('generateNames', () => {
  it('substitutes whole floats as integers in a textual template', () => {
    const names = generateNames({ columns: ['Year'], rows: [{ Year: 2020.0 }] }, ['Year'], 'Year-Report');
    expect(names).toEqual(['2020-Report']);
  });

  it('returns one name per row in row order', () => {
    const names = generateNames(table, ['Name', 'Year'], buildTemplate(['Year', 'Name'], ['_'], '.pdf'));
    expect(names).toEqual(['2020_Alpha', '2019.5_Beta']);
  });

  it('does not confuse a field with one whose name contains it', () => {
    const names = generateNames(table, ['Year', 'FiscalYear'], 'FiscalYear-Year.pdf');
    expect(names).toEqual(['2021-2020', '-2019.5']);
  });

  it('leaves no field names behind after a build and generate round trip', () => {
    const fields = ['Name', 'Year', 'FiscalYear'];
    const data: DataTable = {
      columns: fields,
      rows: [
        { Name: 'Alpha', Year: 2001, FiscalYear: 2002 },
        { Name: 'Beta', Year: 2003, FiscalYear: 2004 },
      ],
    };

    const names = generateNames(data, fields, buildTemplate(fields, [' ', ';'], '.pdf'));

    expect(names).toEqual(['Alpha 2001;2002', 'Beta 2003;2004']);
    for (const name of names) {
      for (const field of fields) expect(name).not.toContain(field);
    }
  });

  it('lists every missing column in one failure', async () => {
    const error = await errorOf(() => generateNames(table, ['Name', 'Region', 'Code'], 'Name-Region-Code.pdf'));
    expect(error.code).toBe('MissingColumn');
    expect(error.details.missing).toEqual(['Region', 'Code']);
  });

  it('rejects invalid separators at generation time', async () => {
    expect(await errorCodeOf(() => generateNames(table, ['Name'], 'Name#x.pdf'))).toBe('InvalidCharacters');
  });

  it('rejects values that would produce an unsafe file name', async () => {
    const data: DataTable = { columns: ['Name'], rows: [{ Name: 'ok' }, { Name: 'a/b' }] };
    const error = await errorOf(() => generateNames(data, ['Name'], 'Name.pdf'));
    expect(error.code).toBe('InvalidCharacters');
    expect(error.details.rows).toEqual([2]);
  });
});

describe('findMissingColumns', () => {
  it('returns each absent field once', () => {
    expect(findMissingColumns(table, ['Name', 'X', 'X'])).toEqual(['X']);
  });
});
