import * as fs from 'node:fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { makeTempDir } from '../../test/helpers';
import { createStore, getBatchRenameConfig, getLoggingConfig, normalizeExtension } from './store';

let dir: string;

beforeEach(() => {
  dir = makeTempDir('store');
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('store', () => {
  it('provides defaults', () => {
    const store = createStore({ cwd: dir });

    expect(getBatchRenameConfig(store)).toEqual({
      allowedExtensions: ['.pdf'],
      spreadsheetExtensions: ['.xls', '.xlsx'],
      splittableExtensions: ['.pdf'],
      splitDirectoryName: 'split',
      defaultPagesPerChunk: 1,
    });
    expect(getLoggingConfig(store)).toEqual({ level: 'info', file: true });
  });

  it('normalises stored values', () => {
    const store = createStore({ cwd: dir });
    store.set('batch-rename', {
      allowedExtensions: ['PDF', '.Tif', 'pdf'],
      spreadsheetExtensions: ['xlsx'],
      splittableExtensions: [],
      splitDirectoryName: '  ',
      defaultPagesPerChunk: 0,
    });

    expect(getBatchRenameConfig(createStore({ cwd: dir }))).toEqual({
      allowedExtensions: ['.pdf', '.tif'],
      spreadsheetExtensions: ['.xlsx'],
      splittableExtensions: [],
      splitDirectoryName: 'split',
      defaultPagesPerChunk: 1,
    });
  });
});

describe('normalizeExtension', () => {
  it('lower-cases and adds a leading dot', () => {
    expect(normalizeExtension(' XLSX ')).toBe('.xlsx');
    expect(normalizeExtension('.Pdf')).toBe('.pdf');
    expect(normalizeExtension('')).toBe('');
  });
});
