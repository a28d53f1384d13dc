import * as fs from 'node:fs';
import * as path from 'node:path';
import type { DiscoveredFileSet, FileEntry } from '@shared/types/batch-rename';
import { BatchRenameError } from '../errors';
import { getLogger } from '../logger';
import { normalizeExtensions } from './store';

const logger = getLogger('file-set');

const collator = new Intl.Collator(undefined, { numeric: true, sensitivity: 'base' });

/**
 * 自然排序：数字片段按数值比较，file2 排在 file10 之前
 */
export function naturalCompare(a: string, b: string): number {
  return collator.compare(a, b) || (a < b ? -1 : a > b ? 1 : 0);
}

export function toFileEntry(filePath: string): FileEntry {
  return {
    path: filePath,
    extension: path.extname(filePath).toLowerCase(),
    sortKey: filePath,
  };
}

/**
 * 读取目录中的文件并校验扩展名
 *
 * 仅统计普通文件，子目录（例如拆分输出目录）会被忽略。
 * 所有文件必须共享同一扩展名，且该扩展名在允许列表中。
 */
export function discoverFiles(directory: string, allowedExtensions: readonly string[] = ['.pdf']): DiscoveredFileSet {
  const root = path.resolve(directory);

  if (!fs.existsSync(root)) {
    throw new BatchRenameError('NotFound', `目录不存在: ${root}`, { path: root });
  }
  if (!fs.statSync(root).isDirectory()) {
    throw new BatchRenameError('InvalidTarget', `不是目录: ${root}`, { path: root });
  }

  const files: FileEntry[] = fs
    .readdirSync(root)
    .map((name) => path.join(root, name))
    .filter((filePath) => fs.statSync(filePath).isFile())
    .map(toFileEntry);

  if (files.length === 0) {
    throw new BatchRenameError('EmptySet', `目录中没有文件: ${root}`, { path: root });
  }

  const extensions = [...new Set(files.map((file) => file.extension))].sort();
  if (extensions.length !== 1) {
    throw new BatchRenameError('MixedExtensions', `目录中存在多种扩展名: ${extensions.join(', ')}`, {
      extensions,
    });
  }

  const [extension] = extensions;
  const allowed = normalizeExtensions(allowedExtensions);
  if (!allowed.includes(extension)) {
    throw new BatchRenameError(
      'DisallowedExtension',
      `不允许的扩展名: ${extension || '(无)'}，允许: ${allowed.join(', ')}`,
      { extension, allowed },
    );
  }

  files.sort((a, b) => naturalCompare(a.sortKey, b.sortKey));
  logger.info(`Discovered ${files.length} ${extension} file(s) in ${root}`);

  return { files, extension };
}
