import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { Logger, withContext } from '../infrastructure/logging/logger.js';

/** 传递 traceId 的请求头 */
export const TRACE_ID_HEADER = 'x-request-id';

/**
 * 扩展Express Request接口，添加日志相关属性
 */
export interface LoggedRequest extends Request {
  traceId?: string;
  logger?: Logger;
}

/**
 * 从请求头中提取 traceId，没有则生成新的
 */
function extractOrGenerateTraceId(req: Request): string {
  const header = req.headers[TRACE_ID_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim() !== '' ? value.trim() : uuidv4();
}

/**
 * 创建日志中间件，为每个请求生成traceID并添加到请求对象中
 * @param logger - 日志器实例
 * @returns Express中间件函数
 */
export function loggingMiddleware(logger: Logger) {
  return (req: LoggedRequest, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    const traceId = extractOrGenerateTraceId(req);

    req.traceId = traceId;
    req.logger = withContext(logger, { traceId });
    res.setHeader('X-Request-ID', traceId);

    req.logger.info(`请求开始: ${req.method} ${req.originalUrl}`, {
      method: req.method,
      url: req.originalUrl,
      userAgent: req.get('User-Agent'),
      ip: req.ip,
    });

    // 记录响应结束
    res.on('finish', () => {
      req.logger?.info(`请求结束: ${req.method} ${req.originalUrl}`, {
        method: req.method,
        url: req.originalUrl,
        statusCode: res.statusCode,
        duration: `${Date.now() - startTime}ms`,
      });
    });

    next();
  };
}
