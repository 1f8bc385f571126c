/**
 * 日志模块，基于 Winston 实现结构化、分级别的日志输出
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'node:path';
import { AppConfig } from '../config/config.js';

/**
 * 定义日志器接口，支持不同级别的日志输出
 */
export interface Logger {
  /**
   * 输出调试级别日志
   * @param message - 日志消息
   * @param args - 额外参数
   */
  debug(message: string, ...args: unknown[]): void;
  /**
   * 输出信息级别日志
   * @param message - 日志消息
   * @param args - 额外参数
   */
  info(message: string, ...args: unknown[]): void;
  /**
   * 输出警告级别日志
   * @param message - 日志消息
   * @param args - 额外参数
   */
  warn(message: string, ...args: unknown[]): void;
  /**
   * 输出错误级别日志
   * @param message - 日志消息
   * @param args - 额外参数
   */
  error(message: string, ...args: unknown[]): void;
}

/**
 * 日志上下文，例如 traceId
 */
export type LogContext = Record<string, unknown>;

/**
 * 创建一个 Winston Logger 实例
 * @param config - 应用程序配置，用于获取日志级别
 * @returns 配置好的日志器实例
 */
export function createLogger(config: Pick<AppConfig, 'log'>): Logger {
  const { combine, timestamp, json, colorize, simple } = winston.format;

  // 配置按日期滚动的文件传输器（可选）
  const fileTransports = config.log.toFile
    ? [
        new DailyRotateFile({
          dirname: path.resolve(process.cwd(), config.log.dirname || 'logs'),
          filename: 'app-%DATE%.log',
          datePattern: config.log.datePattern || 'YYYY-MM-DD',
          zippedArchive: config.log.zippedArchive ?? true,
          maxSize: config.log.maxSize || '20m',
          // 支持天数(如 '14d')或数量(如 '30')。
          maxFiles: config.log.maxFiles || '14d',
          level: config.log.level,
        }),
      ]
    : [];

  return winston.createLogger({
    level: config.log.level, // 从配置中获取日志级别
    format: combine(timestamp(), json()), // 结合时间戳和 JSON 格式进行结构化日志输出
    transports: [
      // 配置控制台传输器
      new winston.transports.Console({
        format: combine(colorize(), simple()), // 控制台输出带颜色和简洁格式
      }),
      ...fileTransports,
    ],
  });
}

/**
 * 合并上下文与调用方传入的元数据
 * 第一个对象参数会被合并，其余参数原样透传
 */
function mergeContext(context: LogContext, args: unknown[]): unknown[] {
  const [first, ...rest] = args;
  if (first !== null && typeof first === 'object' && !Array.isArray(first)) {
    return [{ ...context, ...first }, ...rest];
  }
  return [context, ...args];
}

/**
 * 创建绑定上下文的日志器，每条日志都会带上上下文字段
 *
 * @param logger - 底层日志器
 * @param context - 上下文字段
 * @returns 绑定上下文后的日志器
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  return {
    debug: (message, ...args) =>
      logger.debug(message, ...mergeContext(context, args)),
    info: (message, ...args) =>
      logger.info(message, ...mergeContext(context, args)),
    warn: (message, ...args) =>
      logger.warn(message, ...mergeContext(context, args)),
    error: (message, ...args) =>
      logger.error(message, ...mergeContext(context, args)),
  };
}

/**
 * 默认的日志器实例，方便在未明确配置时使用
 */
export const logger: Logger = createLogger({
  log: { level: process.env.LOG_LEVEL || 'info' },
});
