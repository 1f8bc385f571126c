import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { AppError, ErrorCode } from '../contracts/error.js';
import { Logger, logger as defaultLogger } from '../../infrastructure/logging/logger.js';
import { LoggedRequest } from '../../middlewares/logging.js';

/**
 * 将上传中间件的错误转换为 AppError
 * @param error - multer 抛出的错误
 * @param maxUploadBytes - 上传大小限制
 */
function fromMulterError(error: multer.MulterError, maxUploadBytes?: number): AppError {
  if (error.code === 'LIMIT_FILE_SIZE') {
    return AppError.createFileTooLargeError(maxUploadBytes);
  }
  return new AppError(ErrorCode.VALIDATION_ERROR, error.message, 400, {
    multerCode: error.code,
    field: error.field,
  });
}

/**
 * 判断是否为请求体过大错误（body-parser）
 */
function isPayloadTooLargeError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'type' in error &&
    error.type === 'entity.too.large'
  );
}

/**
 * 创建全局错误处理中间件
 * 能够识别 AppError、领域错误与上传错误，返回结构化的错误响应；
 * 其他错误统一返回 500 并记录详细日志
 *
 * @param options - 配置
 * @param options.logger - 没有请求级日志器时使用的日志器
 * @param options.maxUploadBytes - 上传大小限制，用于错误详情
 * @returns Express 错误处理中间件
 */
export function createErrorHandler(
  options: { logger?: Logger; maxUploadBytes?: number } = {},
) {
  return (
    err: unknown,
    req: LoggedRequest,
    res: Response,
    _next: NextFunction,
  ): void => {
    const logger = req.logger ?? options.logger ?? defaultLogger;

    let mappedError: AppError;
    if (err instanceof multer.MulterError) {
      mappedError = fromMulterError(err, options.maxUploadBytes);
    } else if (isPayloadTooLargeError(err)) {
      mappedError = AppError.createFileTooLargeError(options.maxUploadBytes);
    } else {
      mappedError = AppError.fromError(err);
    }

    // 记录错误日志
    if (mappedError.httpStatus >= 500) {
      logger.error(`Server error: ${mappedError.code} - ${mappedError.message}`, {
        code: mappedError.code,
        statusCode: mappedError.httpStatus,
        details: mappedError.details,
        path: req.path,
        method: req.method,
        stack: err instanceof Error ? err.stack : undefined,
      });
    } else {
      logger.warn(`Client error: ${mappedError.code} - ${mappedError.message}`, {
        code: mappedError.code,
        statusCode: mappedError.httpStatus,
        details: mappedError.details,
        path: req.path,
        method: req.method,
      });
    }

    res.status(mappedError.httpStatus).json(mappedError.toJSON());
  };
}

/**
 * 使用默认日志器的错误处理中间件
 */
export const errorHandler = createErrorHandler();

/**
 * 未匹配路由的处理中间件
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(AppError.createNotFoundError(`Route not found: ${req.method} ${req.path}`));
}
