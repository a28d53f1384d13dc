import type { CellValue, DataTable, NameTemplate } from '@shared/types/batch-rename';
import { BatchRenameError } from '../errors';
import { getLogger } from '../logger';
import { parseTemplate, templateFields, validateTemplate } from './name-template';

const logger = getLogger('name-generator');

// 文件系统保留字符与控制字符
// eslint-disable-next-line no-control-regex
const UNSAFE_NAME_PATTERN = /[<>:"/\\|?*\u0000-\u001f]/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * 将单元格的值转换为文件名片段
 * 没有小数部分的数值输出为整数形式，例如 2020.0 -> "2020"
 */
export function formatCellValue(value: CellValue): string {
  if (value === null) return '';
  if (value instanceof Date) {
    return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value.toFixed(0);
  }
  return String(value).trim();
}

export function findMissingColumns(table: DataTable, fields: readonly string[]): string[] {
  const columns = new Set(table.columns);
  return [...new Set(fields)].filter((field) => !columns.has(field));
}

/**
 * 按模板为每一行数据生成新文件名（不含扩展名）
 *
 * 模板可以是字段与分隔符组成的列表，也可以是其文本形式；
 * 文本形式会先按所选字段还原为列表。
 */
export function generateNames(
  table: DataTable,
  selectedFields: readonly string[],
  template: NameTemplate | string,
): string[] {
  const resolved = typeof template === 'string' ? parseTemplate(template, selectedFields) : template;

  const missing = findMissingColumns(table, [...selectedFields, ...templateFields(resolved)]);
  if (missing.length > 0) {
    throw new BatchRenameError('MissingColumn', `表格中缺少以下列: ${missing.join(', ')}`, { missing });
  }

  validateTemplate(resolved);

  const names = table.rows.map((row) =>
    resolved.tokens
      .map((token) => (token.kind === 'field' ? formatCellValue(row[token.field] ?? null) : token.text))
      .join(''),
  );

  const unsafeRows = names.flatMap((name, i) => (UNSAFE_NAME_PATTERN.test(name) ? [i + 1] : []));
  if (unsafeRows.length > 0) {
    throw new BatchRenameError('InvalidCharacters', `以下行生成的文件名包含无效字符: ${unsafeRows.join(', ')}`, {
      rows: unsafeRows,
    });
  }

  logger.info(`Generated ${names.length} name(s)`);
  return names;
}
