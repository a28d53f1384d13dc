import * as path from 'node:path';
import type { NameTemplate, TemplateToken } from '@shared/types/batch-rename';
import { BatchRenameError } from '../errors';

/** 字段标记在拖拽布局中的单元格宽度 */
export const DEFAULT_CELL_WIDTH = 120;

// 分隔符允许的字符: 字母、数字、下划线、连字符、逗号、分号、空格
const SEPARATOR_PATTERN = /^[\p{L}\p{N}_\-,; ]*$/u;
const EXTENSION_PATTERN = /^(\.[\p{L}\p{N}]+)?$/u;

export function isValidSeparator(text: string): boolean {
  return SEPARATOR_PATTERN.test(text);
}

/**
 * 切换字段的选中状态，返回新的集合
 */
export function toggleField(selection: ReadonlySet<string>, field: string): Set<string> {
  const next = new Set(selection);
  if (next.has(field)) {
    next.delete(field);
  } else {
    next.add(field);
  }
  return next;
}

/**
 * 按关键字过滤字段（不区分大小写）
 */
export function filterFields(fields: readonly string[], query: string): string[] {
  const needle = query.trim().toLowerCase();
  if (!needle) return [...fields];
  return fields.filter((field) => field.toLowerCase().includes(needle));
}

/**
 * 四舍六入五成双：恰好位于两个槽位中间时取偶数槽位
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function clampSlot(index: number, count: number): number {
  if (count <= 0) return 0;
  return Math.max(0, Math.min(roundHalfEven(index), count - 1));
}

/**
 * 将拖放位置映射为最近的字段槽位
 * 每个槽位由字段标记和其后的分隔符输入框组成，占两个单元格
 */
export function slotIndexForDrop(dropX: number, count: number, cellWidth: number = DEFAULT_CELL_WIDTH): number {
  return clampSlot(roundHalfEven(dropX / (cellWidth * 2)), count);
}

/**
 * 将字段移动到目标位置，返回新的顺序
 */
export function moveField(order: readonly string[], field: string, targetIndex: number): string[] {
  const next = order.filter((item) => item !== field);
  if (next.length === order.length) return [...order];
  next.splice(clampSlot(targetIndex, order.length), 0, field);
  return next;
}

/**
 * 按当前字段顺序拼接模板，每个字段后跟随其分隔符（最后一个字段没有分隔符）
 */
export function buildTemplate(
  fields: readonly string[],
  separators: readonly string[],
  extension: string,
): NameTemplate {
  const tokens: TemplateToken[] = [];

  fields.forEach((field, i) => {
    tokens.push({ kind: 'field', field });
    const separator = i < fields.length - 1 ? (separators[i] ?? '') : '';
    if (separator) {
      tokens.push({ kind: 'literal', text: separator });
    }
  });

  return { tokens, extension };
}

export function formatTemplate(template: NameTemplate): string {
  const base = template.tokens.map((token) => (token.kind === 'field' ? token.field : token.text)).join('');
  return base ? `${base}${template.extension}` : '';
}

export function templateFields(template: NameTemplate): string[] {
  return template.tokens.flatMap((token) => (token.kind === 'field' ? [token.field] : []));
}

/**
 * 校验模板中的分隔符与扩展名
 */
export function validateTemplate(template: NameTemplate): void {
  const invalid = template.tokens
    .filter((token): token is { kind: 'literal'; text: string } => token.kind === 'literal')
    .map((token) => token.text)
    .filter((text) => !isValidSeparator(text));

  if (!EXTENSION_PATTERN.test(template.extension)) {
    invalid.push(template.extension);
  }

  if (invalid.length > 0) {
    throw new BatchRenameError('InvalidCharacters', `文件名格式包含无效字符: ${invalid.map((t) => `"${t}"`).join(', ')}`, {
      invalid,
    });
  }
}

/**
 * 从文本形式还原模板
 *
 * 去掉扩展名后从左到右扫描，每个位置优先匹配最长的字段名，
 * 因此 FiscalYear 不会被误识别为 Fiscal + Year。
 */
export function parseTemplate(text: string, fields: readonly string[]): NameTemplate {
  const extension = path.extname(text);
  const base = extension ? text.slice(0, -extension.length) : text;
  const candidates = [...new Set(fields)].filter(Boolean).sort((a, b) => b.length - a.length);
  const tokens: TemplateToken[] = [];
  let literal = '';
  let i = 0;

  while (i < base.length) {
    const match = candidates.find((field) => base.startsWith(field, i));
    if (match) {
      if (literal) {
        tokens.push({ kind: 'literal', text: literal });
        literal = '';
      }
      tokens.push({ kind: 'field', field: match });
      i += match.length;
    } else {
      literal += base[i];
      i++;
    }
  }
  if (literal) {
    tokens.push({ kind: 'literal', text: literal });
  }

  return { tokens, extension };
}

/**
 * 文件名格式编辑器
 *
 * 字段标记可以拖动换位，分隔符输入框固定在槽位上不随字段移动。
 */
export class TemplateComposer {
  private order: string[];
  private readonly separators: string[];
  readonly extension: string;

  constructor(fields: readonly string[], extension: string) {
    this.order = [...new Set(fields)];
    this.separators = Array.from({ length: Math.max(this.order.length - 1, 0) }, () => '');
    this.extension = extension;
  }

  get fields(): readonly string[] {
    return this.order;
  }

  get separatorTexts(): readonly string[] {
    return this.separators;
  }

  setSeparator(index: number, text: string): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.separators.length) {
      throw new RangeError(`分隔符位置超出范围: ${index}（共 ${this.separators.length} 个）`);
    }
    if (!isValidSeparator(text)) {
      throw new BatchRenameError('InvalidCharacters', `分隔符包含无效字符: "${text}"`, { invalid: [text] });
    }
    this.separators[index] = text;
  }

  moveField(field: string, targetIndex: number): void {
    this.order = moveField(this.order, field, targetIndex);
  }

  dropField(field: string, dropX: number, cellWidth: number = DEFAULT_CELL_WIDTH): void {
    this.moveField(field, slotIndexForDrop(dropX, this.order.length, cellWidth));
  }

  build(): NameTemplate {
    return buildTemplate(this.order, this.separators, this.extension);
  }

  toString(): string {
    return formatTemplate(this.build());
  }
}
