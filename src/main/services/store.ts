import Conf from 'conf';
import type { BatchRenameConfig, LoggingConfig } from '@shared/types/batch-rename';

// 定义存储的配置类型
type StoreSchema = {
  'batch-rename': BatchRenameConfig;
  logging: LoggingConfig;
};

const defaults: StoreSchema = {
  'batch-rename': {
    allowedExtensions: ['.pdf'],
    spreadsheetExtensions: ['.xls', '.xlsx'],
    splittableExtensions: ['.pdf'],
    splitDirectoryName: 'split',
    defaultPagesPerChunk: 1,
  },
  logging: {
    level: 'info',
    file: true,
  },
};

export interface StoreOptions {
  /** 配置文件所在目录，默认使用系统配置目录 */
  cwd?: string;
}

let storeInstance: Conf<StoreSchema> | null = null;

export function createStore(options: StoreOptions = {}): Conf<StoreSchema> {
  return new Conf<StoreSchema>({
    projectName: 'batch-renamer',
    configName: 'app-config',
    cwd: options.cwd,
    defaults,
  });
}

// 导出 store 操作函数
export function getStore(options: StoreOptions = {}): Conf<StoreSchema> {
  if (!storeInstance) {
    storeInstance = createStore(options);
  }
  return storeInstance;
}

/**
 * 扩展名统一为小写并带前导点
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  if (!trimmed) return '';
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

export function normalizeExtensions(extensions: readonly string[]): string[] {
  return [...new Set(extensions.map(normalizeExtension).filter(Boolean))];
}

export function getBatchRenameConfig(store: Conf<StoreSchema> = getStore()): BatchRenameConfig {
  const config = { ...defaults['batch-rename'], ...store.get('batch-rename') };
  const pages = Math.floor(config.defaultPagesPerChunk);

  return {
    allowedExtensions: normalizeExtensions(config.allowedExtensions),
    spreadsheetExtensions: normalizeExtensions(config.spreadsheetExtensions),
    splittableExtensions: normalizeExtensions(config.splittableExtensions),
    splitDirectoryName: config.splitDirectoryName.trim() || defaults['batch-rename'].splitDirectoryName,
    defaultPagesPerChunk: Number.isFinite(pages) && pages > 0 ? pages : 1,
  };
}

export function getLoggingConfig(store: Conf<StoreSchema> = getStore()): LoggingConfig {
  return { ...defaults.logging, ...store.get('logging') };
}

export type { StoreSchema };
