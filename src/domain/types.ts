/**
 * 文档替换领域类型定义
 */

/**
 * 支持的文档格式（封闭联合类型）
 */
export type DocumentFormat = 'pdf' | 'csv' | 'xml' | 'xpt';

/**
 * 文档格式描述
 */
export interface DocumentFormatDescriptor {
  format: DocumentFormat;
  /** 小写扩展名，带点，例如 `.pdf` */
  extension: string;
  mimeType: string;
  label: string;
}

/**
 * 替换请求
 */
export interface ReplacementRequest {
  sourcePath: string;
  /** 要查找的文本，不能为空 */
  searchText: string;
  /** 替换文本，可以为空 */
  replacementText: string;
}

/**
 * 替换结果，输出文件归调用方所有
 */
export interface ReplacementResult {
  outputPath: string;
  format: DocumentFormat;
  /** 实际替换的次数 */
  replacements: number;
}

/**
 * 上传文件替换后的结果
 */
export interface ReplacedDocument {
  /** 下载文件名，`modified_<原文件名>` */
  fileName: string;
  content: Buffer;
  format: DocumentFormat;
  replacements: number;
}

/**
 * 上传的文件
 */
export interface UploadedDocument {
  originalName: string;
  buffer: Buffer;
}
