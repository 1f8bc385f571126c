import { Logger } from '../logging/logger.js';
import { AppConfig } from '../config/config.js';
import { DocumentReplacerRegistry } from '../../domain/services/IDocumentReplacer.js';
import { CsvReplacer } from './CsvReplacer.js';
import { PdfReplacer } from './PdfReplacer.js';
import { XmlReplacer } from './XmlReplacer.js';
import { XptReplacer } from './XptReplacer.js';

export { BaseDocumentReplacer, buildOutputPath } from './BaseDocumentReplacer.js';
export { CsvReplacer, PdfReplacer, XmlReplacer, XptReplacer };

/**
 * 创建格式到替换器的映射
 *
 * @param logger - 日志记录器
 * @param config - 替换相关配置
 * @returns 替换器注册表
 */
export function createReplacerRegistry(
  logger: Logger,
  config: Pick<AppConfig, 'replace'>,
): DocumentReplacerRegistry {
  return {
    pdf: new PdfReplacer(logger, config.replace.pdfFontSizeScope),
    csv: new CsvReplacer(logger),
    xml: new XmlReplacer(logger),
    xpt: new XptReplacer(logger, config.replace.xptEncoding),
  };
}
