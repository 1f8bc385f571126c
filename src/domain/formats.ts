import path from 'node:path';
import mime from 'mime-types';
import { DocumentFormat, DocumentFormatDescriptor } from './types.js';
import { UnsupportedFormatError } from './errors/DocumentErrors.js';

const SUPPORTED_FORMATS: readonly DocumentFormat[] = ['pdf', 'csv', 'xml', 'xpt'];

const FORMAT_LABELS: Record<DocumentFormat, string> = {
  pdf: 'PDF document',
  csv: 'Comma-separated values',
  xml: 'XML document',
  xpt: 'SAS transport library',
};

/**
 * 所有支持的文档格式
 * mime-types 不认识 .xpt，回退为 application/octet-stream
 */
export const DOCUMENT_FORMATS: readonly DocumentFormatDescriptor[] =
  SUPPORTED_FORMATS.map((format) => ({
    format,
    extension: `.${format}`,
    mimeType: mime.lookup(format) || 'application/octet-stream',
    label: FORMAT_LABELS[format],
  }));

/**
 * 类型守卫：判断字符串是否为支持的格式
 * @param value - 待判断的字符串
 * @returns 是否为 DocumentFormat
 */
export function isDocumentFormat(value: string): value is DocumentFormat {
  return SUPPORTED_FORMATS.some((format) => format === value);
}

/**
 * 根据文件名解析文档格式（扩展名不区分大小写）
 *
 * @param fileName - 文件名或路径
 * @returns 对应的文档格式
 * @throws {UnsupportedFormatError} 扩展名不受支持时抛出，携带原始扩展名
 */
export function resolveDocumentFormat(fileName: string): DocumentFormat {
  const extension = path.extname(fileName);
  const candidate = extension.slice(1).toLowerCase();
  if (!isDocumentFormat(candidate)) {
    throw new UnsupportedFormatError(extension);
  }
  return candidate;
}
