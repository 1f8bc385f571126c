import { z } from 'zod';
import {
  DocumentErrorCode,
  DocumentReplaceError,
} from '../../domain/errors/DocumentErrors.js';

/**
 * 定义统一错误格式的Zod Schema
 * @description 定义API响应中错误信息的标准格式
 */
export const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.string().describe('错误码，例如 VALIDATION_ERROR'),
    message: z.string().describe('人类可读的错误信息'),
    details: z
      .record(z.unknown())
      .optional()
      .describe('可选：错误的额外详细信息'),
  }),
});

/**
 * ErrorResponse类型定义
 * @description 从ErrorResponseSchema推断出的TypeScript类型
 */
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

/**
 * 错误码枚举
 * @description 定义 API 可能返回的所有错误码
 */
export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  FILE_TOO_LARGE = 'FILE_TOO_LARGE',
  UNSUPPORTED_FILE_TYPE = 'UNSUPPORTED_FILE_TYPE',
  CORRUPT_INPUT = 'CORRUPT_INPUT',
  OUTPUT_WRITE_FAILED = 'OUTPUT_WRITE_FAILED',
}

/**
 * 领域错误码到 API 错误码与 HTTP 状态码的映射
 */
const DOMAIN_ERROR_MAPPING: Record<
  DocumentErrorCode,
  { code: ErrorCode; httpStatus: number }
> = {
  [DocumentErrorCode.VALIDATION_ERROR]: {
    code: ErrorCode.VALIDATION_ERROR,
    httpStatus: 400,
  },
  [DocumentErrorCode.UNSUPPORTED_FORMAT]: {
    code: ErrorCode.UNSUPPORTED_FILE_TYPE,
    httpStatus: 400,
  },
  [DocumentErrorCode.CORRUPT_INPUT]: {
    code: ErrorCode.CORRUPT_INPUT,
    httpStatus: 422,
  },
  [DocumentErrorCode.OUTPUT_WRITE_FAILED]: {
    code: ErrorCode.OUTPUT_WRITE_FAILED,
    httpStatus: 500,
  },
};

/**
 * 应用程序错误类
 * @description 统一的错误处理类，包含错误码、HTTP状态码和详细信息
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly httpStatus: number;
  public readonly details?: Record<string, unknown>;

  /**
   * 创建AppError实例
   * @param code - 错误码
   * @param message - 错误信息
   * @param httpStatus - HTTP状态码
   * @param details - 错误详细信息
   */
  constructor(
    code: ErrorCode,
    message: string,
    httpStatus: number = 500,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.httpStatus = httpStatus;
    this.details = details;
    Object.setPrototypeOf(this, AppError.prototype); // 修复原型链
  }

  /**
   * 将错误转换为JSON格式
   * @returns 符合API响应格式的错误对象
   */
  public toJSON(): ErrorResponse {
    const response: ErrorResponse = {
      error: {
        code: this.code,
        message: this.message,
      },
    };

    // 只有当details存在且有内容时才添加
    if (this.details && Object.keys(this.details).length > 0) {
      response.error.details = this.details;
    }

    return response;
  }

  /**
   * 将领域错误映射为带 HTTP 状态码的 AppError
   * @param error - 领域错误
   * @returns AppError 实例
   */
  public static fromDomainError(error: DocumentReplaceError): AppError {
    const { code, httpStatus } = DOMAIN_ERROR_MAPPING[error.code];
    return new AppError(code, error.message, httpStatus, error.details);
  }

  /**
   * 将任意错误转换为AppError，未知错误为 INTERNAL_ERROR
   * @param error - 原始错误
   * @returns AppError 实例
   */
  public static fromError(error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }
    if (error instanceof DocumentReplaceError) {
      return AppError.fromDomainError(error);
    }

    const message =
      error instanceof Error && error.message
        ? error.message
        : 'An unexpected internal error occurred.';
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, {
      name: error instanceof Error ? error.name : typeof error,
    });
  }

  /**
   * 创建一个VALIDATION_ERROR 类型的AppError
   * @param details - 错误的详细信息，通常是验证失败的字段和原因
   * @param message - 可选的错误信息
   * @returns AppError 实例
   */
  public static createValidationError(
    details: Record<string, unknown>,
    message: string = 'Validation failed.',
  ): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  /**
   * Creates a NOT_FOUND error.
   * @param message - The error message.
   * @returns A new AppError instance.
   */
  public static createNotFoundError(
    message: string = 'Resource not found.',
  ): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404);
  }

  /**
   * Creates a FILE_TOO_LARGE error.
   * @param maxBytes - 允许的最大字节数
   * @returns A new AppError instance.
   */
  public static createFileTooLargeError(maxBytes?: number): AppError {
    return new AppError(
      ErrorCode.FILE_TOO_LARGE,
      'File size exceeds the maximum limit.',
      413,
      maxBytes === undefined ? undefined : { maxBytes },
    );
  }
}
