import * as fs from 'node:fs';
import * as path from 'node:path';
import * as XLSX from 'xlsx';
import type { CellValue, DataRow, DataTable } from '@shared/types/batch-rename';
import { BatchRenameError } from '../errors';
import { getLogger } from '../logger';
import { normalizeExtensions } from './store';

const logger = getLogger('spreadsheet');

/**
 * 校验表格文件的扩展名与读取权限
 */
export function assertSpreadsheetPath(filePath: string, allowedExtensions: readonly string[]): void {
  const allowed = normalizeExtensions(allowedExtensions);
  const extension = path.extname(filePath).toLowerCase();

  if (!allowed.includes(extension)) {
    throw new BatchRenameError(
      'UnsupportedSpreadsheet',
      `不支持的表格文件: ${path.basename(filePath)}，请选择以下格式之一: ${allowed.join(', ')}`,
      { extension, allowed },
    );
  }
  if (!fs.existsSync(filePath)) {
    throw new BatchRenameError('NotFound', `文件不存在: ${filePath}`, { path: filePath });
  }
  try {
    fs.accessSync(filePath, fs.constants.R_OK);
  } catch {
    throw new BatchRenameError('NotFound', `没有读取权限: ${filePath}`, { path: filePath });
  }
}

/**
 * 生成列名：空表头命名为 "Unnamed: n"，重复表头追加 ".1"、".2" 后缀
 */
export function resolveColumnNames(header: readonly unknown[]): string[] {
  const used = new Set<string>();

  return header.map((cell, index) => {
    const text = cell === null || cell === undefined ? '' : String(cell).trim();
    const base = text || `Unnamed: ${index}`;
    let candidate = base;
    let i = 1;
    while (used.has(candidate)) {
      candidate = `${base}.${i++}`;
    }
    used.add(candidate);
    return candidate;
  });
}

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  return String(value);
}

/**
 * 将工作表的二维数组转换为按行组织的数据表，第一行为表头
 */
export function toDataTable(matrix: readonly unknown[][]): DataTable {
  const [header = [], ...body] = matrix;
  const width = body.reduce((max, row) => Math.max(max, row.length), header.length);
  const paddedHeader = Array.from({ length: width }, (_, i) => header[i]);
  const columns = resolveColumnNames(paddedHeader);

  const rows: DataRow[] = body
    .filter((row) => row.some((cell) => cell !== null && cell !== undefined && cell !== ''))
    .map((row) => {
      const record: DataRow = {};
      columns.forEach((column, i) => {
        record[column] = toCellValue(row[i]);
      });
      return record;
    });

  return { columns, rows };
}

/**
 * 读取表格的第一个工作表
 */
export function loadDataTable(filePath: string): DataTable {
  if (!fs.existsSync(filePath)) {
    throw new BatchRenameError('NotFound', `文件不存在: ${filePath}`, { path: filePath });
  }

  const workbook = XLSX.read(fs.readFileSync(filePath), { type: 'buffer', cellDates: true });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) {
    return { columns: [], rows: [] };
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });
  const table = toDataTable(matrix);

  logger.info(`Loaded ${table.rows.length} row(s) and ${table.columns.length} column(s) from ${filePath}`);
  return table;
}
