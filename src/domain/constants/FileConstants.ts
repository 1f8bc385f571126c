/**
 * 文件相关常量定义
 *
 * @fileoverview 上传限制、输出文件命名等常量
 */

/**
 * File size limits in bytes
 */
export const FILE_SIZE_LIMITS = {
  /** Maximum upload size per file (16MB) */
  MAX_UPLOAD_SIZE: 16 * 1024 * 1024, // 16MB
} as const;

/**
 * Output naming constants
 */
export const OUTPUT_NAMING = {
  /** 插入到扩展名之前的后缀 */
  MODIFIED_SUFFIX: '_modified',
  /** 下载文件名前缀 */
  DOWNLOAD_PREFIX: 'modified_',
} as const;

/**
 * 临时工作目录前缀
 */
export const WORKSPACE_PREFIX = 'docreplace-';
