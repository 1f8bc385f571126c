import os from 'node:os';
import dotenv from 'dotenv';
import { FILE_SIZE_LIMITS } from '../../domain/constants/FileConstants.js';
dotenv.config();

/**
 * PDF 字号查找范围
 * - match: 使用匹配所在文本片段的字号
 * - page: 使用页面上第一个包含查找文本的片段字号
 */
export type FontSizeScope = 'match' | 'page';

/**
 * XPT 字符单元的编码
 */
export type XptEncoding = 'utf8' | 'latin1';

/**
 * 应用程序配置对象的接口定义
 */
export type AppConfig = {
  env: { production: boolean };
  api: { port: number; host: string };
  upload: { maxBytes: number };
  storage: { tempDir: string };
  replace: {
    pdfFontSizeScope: FontSizeScope;
    xptEncoding: XptEncoding;
  };
  log: {
    level: string;
    // 以下为可选的日志轮转配置（不填则采用默认值）
    toFile?: boolean; // 是否启用按日期滚动的文件日志
    dirname?: string; // 日志目录
    maxFiles?: string | number; // 例如 '14d' 或 30
    maxSize?: string; // 例如 '20m'
    datePattern?: string; // 例如 'YYYY-MM-DD'
    zippedArchive?: boolean; // 是否压缩归档
  };
};

/**
 * 校验字符串参数，确保非空，并去除可能的引号
 *
 * @param value - 要校验的值
 * @param name - 参数名称
 * @returns 校验后的字符串
 */
function validateString(value: unknown, name: string): string {
  if (!value || String(value).trim() === '') {
    throw new Error(`validateConfig: Missing ${name}`);
  }
  return String(value)
    .replace(/^"(.*)"$/, '$1')
    .replace(/^'(.*)'$/, '$1');
}

/**
 * 校验数值参数，确保为正整数
 *
 * @param value - 要校验的值
 * @param name - 参数名称
 * @param defaultValue - 默认值
 * @returns 校验后的数字
 */
function validateNumber(
  value: unknown,
  name: string,
  defaultValue: number,
): number {
  const num = Number(value === undefined || value === '' ? defaultValue : value);
  if (isNaN(num) || !Number.isInteger(num) || num <= 0) {
    throw new Error(`validateConfig: Invalid ${name}`);
  }
  return num;
}

/**
 * 校验枚举参数
 *
 * @param value - 要校验的值
 * @param name - 参数名称
 * @param allowed - 允许的取值
 * @param defaultValue - 默认值
 * @returns 校验后的取值
 */
function validateChoice<T extends string>(
  value: string | undefined,
  name: string,
  allowed: readonly T[],
  defaultValue: T,
): T {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  const match = allowed.find((candidate) => candidate === normalized);
  if (match === undefined) {
    throw new Error(`validateConfig: Invalid ${name}`);
  }
  return match;
}

/**
 * 校验布尔参数，只接受 true/false
 *
 * @param value - 要校验的值
 * @param name - 参数名称
 * @param defaultValue - 默认值
 * @returns 校验后的布尔值
 */
function validateBoolean(
  value: string | undefined,
  name: string,
  defaultValue: boolean,
): boolean {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized !== 'true' && normalized !== 'false') {
    throw new Error(`validateConfig: Invalid ${name}`);
  }
  return normalized === 'true';
}

/**
 * 读取并校验配置
 *
 * @param env - 环境变量对象
 * @returns 验证后的配置对象
 */
export function validateConfig(env = process.env): AppConfig {
  // Railway 部署时会注入 RAILWAY_ENVIRONMENT
  const PRODUCTION =
    env.NODE_ENV === 'production' || Boolean(env.RAILWAY_ENVIRONMENT);

  const PORT = validateNumber(env.PORT, 'PORT', 5000);
  const HOST = env.HOST ? validateString(env.HOST, 'HOST') : '0.0.0.0';

  const UPLOAD_MAX_BYTES = validateNumber(
    env.UPLOAD_MAX_BYTES,
    'UPLOAD_MAX_BYTES',
    FILE_SIZE_LIMITS.MAX_UPLOAD_SIZE,
  );
  const TEMP_DIR = env.TEMP_DIR
    ? validateString(env.TEMP_DIR, 'TEMP_DIR')
    : os.tmpdir();

  const PDF_FONT_SIZE_SCOPE = validateChoice(
    env.PDF_FONT_SIZE_SCOPE,
    'PDF_FONT_SIZE_SCOPE',
    ['match', 'page'],
    'match',
  );
  const XPT_ENCODING = validateChoice(
    env.XPT_ENCODING,
    'XPT_ENCODING',
    ['utf8', 'latin1'],
    'utf8',
  );

  return {
    env: { production: PRODUCTION },
    api: { port: PORT, host: HOST },
    upload: { maxBytes: UPLOAD_MAX_BYTES },
    storage: { tempDir: TEMP_DIR },
    replace: {
      pdfFontSizeScope: PDF_FONT_SIZE_SCOPE,
      xptEncoding: XPT_ENCODING,
    },
    log: {
      level: env.LOG_LEVEL || (PRODUCTION ? 'info' : 'debug'),
      toFile: validateBoolean(env.LOG_TO_FILE, 'LOG_TO_FILE', false),
      dirname: env.LOG_DIR || 'logs',
      maxFiles: env.LOG_MAX_FILES || '14d',
      maxSize: env.LOG_MAX_SIZE || '20m',
      datePattern: env.LOG_DATE_PATTERN || undefined,
      zippedArchive: env.LOG_ZIP ? env.LOG_ZIP === 'true' : undefined,
    },
  };
}
