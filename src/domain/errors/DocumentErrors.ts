/**
 * 文档替换领域错误
 * @description 领域层不关心 HTTP 状态码，由 API 层负责映射
 */

/**
 * 领域错误码
 */
export enum DocumentErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  CORRUPT_INPUT = 'CORRUPT_INPUT',
  OUTPUT_WRITE_FAILED = 'OUTPUT_WRITE_FAILED',
}

/**
 * 文档替换错误基类
 */
export class DocumentReplaceError extends Error {
  public readonly code: DocumentErrorCode;
  public readonly details?: Record<string, unknown>;

  /**
   * 创建领域错误
   * @param code - 错误码
   * @param message - 错误信息
   * @param details - 错误详细信息
   */
  constructor(
    code: DocumentErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DocumentReplaceError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype); // 修复原型链
  }
}

/**
 * 输入校验失败：缺少文件、查找文本为空、替换文本无法编码等
 */
export class ValidationError extends DocumentReplaceError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code: DocumentErrorCode = DocumentErrorCode.VALIDATION_ERROR,
  ) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * 不支持的文件扩展名
 */
export class UnsupportedFormatError extends ValidationError {
  public readonly extension: string;

  constructor(extension: string) {
    super(
      `Unsupported file type: ${extension}`,
      { extension },
      DocumentErrorCode.UNSUPPORTED_FORMAT,
    );
    this.name = 'UnsupportedFormatError';
    this.extension = extension;
  }
}

/**
 * 文件无法按预期格式解析
 */
export class CorruptInputError extends DocumentReplaceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(DocumentErrorCode.CORRUPT_INPUT, message, details);
    this.name = 'CorruptInputError';
  }
}

/**
 * 读取源文件或写入输出文件失败
 */
export class OutputWriteError extends DocumentReplaceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(DocumentErrorCode.OUTPUT_WRITE_FAILED, message, details);
    this.name = 'OutputWriteError';
  }
}

/**
 * 从未知错误中提取消息
 * @param error - 捕获到的错误
 * @returns 错误消息
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
