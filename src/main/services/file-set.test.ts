import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { errorCodeOf, makeTempDir } from '../../test/helpers';
import { discoverFiles, naturalCompare } from './file-set';

let dir: string;

const touch = (...names: string[]) => {
  for (const name of names) fs.writeFileSync(path.join(dir, name), 'x');
};

beforeEach(() => {
  dir = makeTempDir('files');
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('naturalCompare', () => {
  it('orders numeric runs by value', () => {
    const sorted = ['file10.pdf', 'file2.pdf', 'file1.pdf'].sort(naturalCompare);
    expect(sorted).toEqual(['file1.pdf', 'file2.pdf', 'file10.pdf']);
  });
});

describe('discoverFiles', () => {
  it('returns every file once in natural order with the shared extension', () => {
    touch('doc10.pdf', 'doc2.pdf', 'doc1.pdf');

    const result = discoverFiles(dir, ['.pdf']);

    expect(result.extension).toBe('.pdf');
    expect(result.files.map((f) => path.basename(f.path))).toEqual(['doc1.pdf', 'doc2.pdf', 'doc10.pdf']);
    expect(result.files.every((f) => path.isAbsolute(f.path))).toBe(true);
  });

  it('compares extensions case-insensitively and normalises the allow-list', () => {
    touch('a.PDF', 'b.pdf');

    const result = discoverFiles(dir, ['PDF']);

    expect(result.extension).toBe('.pdf');
    expect(result.files).toHaveLength(2);
  });

  it('ignores subdirectories', () => {
    touch('a.pdf', 'b.pdf');
    fs.mkdirSync(path.join(dir, 'split'));

    expect(discoverFiles(dir).files).toHaveLength(2);
  });

  it('fails with NotFound for a missing directory', async () => {
    expect(await errorCodeOf(() => discoverFiles(path.join(dir, 'missing')))).toBe('NotFound');
  });

  it('fails with InvalidTarget when the path is a file', async () => {
    touch('a.pdf');
    expect(await errorCodeOf(() => discoverFiles(path.join(dir, 'a.pdf')))).toBe('InvalidTarget');
  });

  it('fails with EmptySet when there are no files', async () => {
    expect(await errorCodeOf(() => discoverFiles(dir))).toBe('EmptySet');
  });

  it('fails with MixedExtensions for .pdf and .txt', async () => {
    touch('a.pdf', 'b.txt');
    expect(await errorCodeOf(() => discoverFiles(dir))).toBe('MixedExtensions');
  });

  it('fails with DisallowedExtension when the shared extension is not allowed', async () => {
    touch('a.txt', 'b.txt');
    expect(await errorCodeOf(() => discoverFiles(dir, ['.pdf']))).toBe('DisallowedExtension');
  });
});
