import type { BatchRenameErrorCode } from './batch-rename';

/**
 * 工具函数的基础返回结果
 */
export type ToolResult =
  | {
      success: true;
      summary?: string;
      error?: never;
      code?: never;
    }
  | {
      success: false;
      summary?: never;
      error: string;
      code?: BatchRenameErrorCode;
    };
