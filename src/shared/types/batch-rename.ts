/**
 * 批量重命名相关类型定义
 * 在服务、向导和终端之间共享
 */

export type BatchRenameErrorCode =
  | 'NotFound'
  | 'InvalidTarget'
  | 'EmptySet'
  | 'MixedExtensions'
  | 'DisallowedExtension'
  | 'UnsupportedSpreadsheet'
  | 'EmptyTable'
  | 'MissingColumn'
  | 'InvalidCharacters'
  | 'CountMismatch'
  | 'RenameFailure'
  | 'SplitFailure'
  | 'InvalidStage';

export interface FileEntry {
  /** 绝对路径 */
  path: string;
  /** 小写扩展名，带前导点 */
  extension: string;
  sortKey: string;
}

export interface DiscoveredFileSet {
  files: FileEntry[];
  extension: string;
}

export type CellValue = string | number | boolean | Date | null;

export type DataRow = Record<string, CellValue>;

export interface DataTable {
  columns: string[];
  rows: DataRow[];
}

export type TemplateToken = { kind: 'field'; field: string } | { kind: 'literal'; text: string };

export interface NameTemplate {
  tokens: TemplateToken[];
  /** 目标扩展名，仅用于展示；实际重命名沿用原文件扩展名 */
  extension: string;
}

export interface RenamePlanEntry {
  index: number;
  source: string;
  destination: string;
}

export interface RenameSummary {
  renamed: number;
  skipped: number;
  plan: RenamePlanEntry[];
}

export type WizardStage = 'select-folder' | 'select-data' | 'build-format' | 'confirm';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export interface BatchRenameConfig {
  allowedExtensions: string[];
  spreadsheetExtensions: string[];
  splittableExtensions: string[];
  splitDirectoryName: string;
  defaultPagesPerChunk: number;
}

export interface LoggingConfig {
  level: LogLevel | false;
  file: boolean;
}
