import * as fs from 'node:fs';
import * as path from 'node:path';
import type { RenamePlanEntry, RenameSummary } from '@shared/types/batch-rename';
import { BatchRenameError } from '../errors';
import { getLogger } from '../logger';

const logger = getLogger('file-rename');

export interface FileRenameOptions {
  /** 按自然顺序排列的原文件绝对路径 */
  files: readonly string[];
  /** 新文件名（不含扩展名），与 files 一一对应 */
  names: readonly string[];
  dryRun?: boolean;
  onProgress?: (message: string) => void;
}

function isSameFile(a: string, b: string): boolean {
  if (a === b) return true;
  try {
    const statA = fs.statSync(a);
    const statB = fs.statSync(b);
    return statA.ino === statB.ino && statA.dev === statB.dev;
  } catch {
    return false;
  }
}

function renameFailure(entry: RenamePlanEntry, reason: string): BatchRenameError {
  return new BatchRenameError(
    'RenameFailure',
    `第 ${entry.index + 1} 个文件重命名失败 ${entry.source} → ${entry.destination}: ${reason}`,
    { index: entry.index, source: entry.source, destination: entry.destination },
  );
}

/**
 * 生成重命名计划并在执行前完成校验
 *
 * 目标路径为 原目录/新文件名 + 原扩展名。
 * 若新文件名列表首项为空字符串，视为占位并丢弃。
 */
export function planRenames(files: readonly string[], names: readonly string[]): RenamePlanEntry[] {
  const newNames = names.length > 0 && names[0] === '' ? names.slice(1) : names;

  if (files.length !== newNames.length) {
    throw new BatchRenameError(
      'CountMismatch',
      `原文件数量 (${files.length}) 与新文件名数量 (${newNames.length}) 不一致`,
      { expected: files.length, actual: newNames.length },
    );
  }

  const plan: RenamePlanEntry[] = files.map((source, index) => ({
    index,
    source,
    destination: path.join(path.dirname(source), `${newNames[index]}${path.extname(source)}`),
  }));

  const sources = new Set(files);
  const seen = new Map<string, number>();

  for (const entry of plan) {
    if (newNames[entry.index].trim() === '') {
      throw renameFailure(entry, '新文件名为空');
    }

    // 不论文件系统是否区分大小写，仅大小写不同的目标名都视为重复
    const key = entry.destination.toLowerCase();
    const previous = seen.get(key);
    if (previous !== undefined) {
      throw renameFailure(entry, `与第 ${previous + 1} 个文件的目标名称重复`);
    }
    seen.set(key, entry.index);

    if (
      entry.destination !== entry.source &&
      !sources.has(entry.destination) &&
      fs.existsSync(entry.destination) &&
      !isSameFile(entry.source, entry.destination)
    ) {
      throw renameFailure(entry, '目标文件已存在');
    }
  }

  return plan;
}

/**
 * 执行文件重命名
 */
export async function renameFiles(options: FileRenameOptions): Promise<RenameSummary> {
  const { files, names, dryRun = false, onProgress } = options;

  const plan = planRenames(files, names);
  const pending = plan.filter((entry) => entry.destination !== entry.source);
  const skipped = plan.length - pending.length;

  if (dryRun) {
    onProgress?.('🔍 预览模式：仅显示重命名结果，不会实际修改文件');
    for (const entry of plan) {
      onProgress?.(`   ${path.basename(entry.source)} → ${path.basename(entry.destination)}`);
    }
    onProgress?.(`✅ 预览完成，共 ${pending.length} 个文件将被重命名`);
    return { renamed: 0, skipped, plan };
  }

  if (pending.length === 0) {
    onProgress?.('⚠️  没有文件需要重命名');
    return { renamed: 0, skipped, plan };
  }

  onProgress?.(`🔄 准备重命名 ${pending.length} 个文件`);

  // 第一步：目标名称被批次内其他文件占用时，先将这些文件移到临时文件名，避免冲突
  const destinations = new Set(pending.map((entry) => entry.destination));
  const staged = new Map<string, string>();
  const timestamp = Date.now();

  for (const entry of pending) {
    if (!destinations.has(entry.source)) continue;

    const tempPath = path.join(path.dirname(entry.source), `${timestamp}_${entry.index}_${path.basename(entry.source)}`);
    try {
      fs.renameSync(entry.source, tempPath);
      staged.set(entry.source, tempPath);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw renameFailure(entry, `创建临时文件失败: ${errorMessage}`);
    }
  }

  // 第二步：按顺序重命名为最终文件名
  let renamed = 0;
  for (const entry of pending) {
    const from = staged.get(entry.source) ?? entry.source;
    try {
      fs.renameSync(from, entry.destination);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      const leftovers = [...staged.values()].filter((tempPath) => fs.existsSync(tempPath));
      if (leftovers.length > 0) {
        onProgress?.(`⚠️  临时文件保留为: ${leftovers.map((p) => path.basename(p)).join(', ')}`);
      }
      logger.error(`Rename failed at index ${entry.index}: ${from} -> ${entry.destination}: ${errorMessage}`);
      throw renameFailure(entry, errorMessage);
    }
    renamed++;
    logger.info(`Renaming: ${entry.source} -> ${entry.destination}`);
    onProgress?.(`✅ ${path.basename(entry.source)} → ${path.basename(entry.destination)}`);
  }

  onProgress?.(`📈 重命名完成: 成功 ${renamed} 个${skipped > 0 ? `，跳过 ${skipped} 个` : ''}`);
  return { renamed, skipped, plan };
}
