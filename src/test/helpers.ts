import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import * as XLSX from 'xlsx';
import { PDFDocument } from 'pdf-lib';
import type { BatchRenameErrorCode } from '@shared/types/batch-rename';
import { BatchRenameError } from '../main/errors';

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `batch-renamer-${prefix}-`));
}

/**
 * 捕获同步或异步调用抛出的错误码
 */
export async function errorCodeOf(fn: () => unknown): Promise<BatchRenameErrorCode | undefined> {
  try {
    await fn();
  } catch (error) {
    if (error instanceof BatchRenameError) return error.code;
    throw error;
  }
  return undefined;
}

export async function errorOf(fn: () => unknown): Promise<BatchRenameError> {
  try {
    await fn();
  } catch (error) {
    if (error instanceof BatchRenameError) return error;
    throw error;
  }
  throw new Error('expected a BatchRenameError');
}

export function writeWorkbook(filePath: string, rows: unknown[][]): void {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), 'Sheet1');
  fs.writeFileSync(filePath, XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));
}

export async function writePdf(filePath: string, pageCount: number): Promise<void> {
  const doc = await PDFDocument.create();
  for (let i = 0; i < pageCount; i++) {
    doc.addPage([200, 200]);
  }
  fs.writeFileSync(filePath, await doc.save());
}

export async function pageCountOf(filePath: string): Promise<number> {
  const doc = await PDFDocument.load(fs.readFileSync(filePath));
  return doc.getPageCount();
}
