import type { BatchRenameErrorCode } from '@shared/types/batch-rename';
import type { ToolResult } from '@shared/types/common';

export type BatchRenameErrorDetails = Record<string, string | number | string[] | number[]>;

export class BatchRenameError extends Error {
  readonly code: BatchRenameErrorCode;
  readonly details: BatchRenameErrorDetails;

  constructor(code: BatchRenameErrorCode, message: string, details: BatchRenameErrorDetails = {}) {
    super(message);
    this.name = 'BatchRenameError';
    this.code = code;
    this.details = details;
  }
}

/**
 * 将异常转换为失败结果，供向导与终端命令返回
 */
export function toFailure(error: unknown): ToolResult {
  if (error instanceof BatchRenameError) {
    return { success: false, error: error.message, code: error.code };
  }
  return {
    success: false,
    error: error instanceof Error ? error.message : String(error),
  };
}
