import { BaseDocumentReplacer, TransformOutcome } from './BaseDocumentReplacer.js';
import { Logger } from '../logging/logger.js';
import { replaceLiteral } from '../../domain/services/textReplace.js';
import { readXptLibrary } from '../xpt/XptReader.js';
import { writeXptLibrary } from '../xpt/XptWriter.js';
import { XptLibrary, XptTextEncoding } from '../xpt/types.js';

/**
 * 对传输库中所有字符单元执行替换，数值与缺失值不变
 *
 * @returns 替换次数
 */
export function replaceInXptLibrary(
  library: XptLibrary,
  searchText: string,
  replacementText: string,
): number {
  let count = 0;
  for (const member of library.members) {
    member.variables.forEach((variable, column) => {
      if (variable.type !== 'character') return;
      for (const row of member.rows) {
        const cell = row[column];
        if (typeof cell !== 'string') continue;
        const result = replaceLiteral(cell, searchText, replacementText);
        row[column] = result.text;
        count += result.count;
      }
    });
  }
  return count;
}

/**
 * SAS 传输格式（.xpt）替换器
 * 输出沿用源文件的版本、数据集名、标签、格式与时间戳
 */
export class XptReplacer extends BaseDocumentReplacer {
  readonly format = 'xpt' as const;

  /**
   * @param logger - 日志记录器
   * @param encoding - 字符单元编码
   */
  constructor(
    logger: Logger,
    private readonly encoding: XptTextEncoding = 'utf8',
  ) {
    super(logger);
  }

  protected async transform(
    source: Buffer,
    searchText: string,
    replacementText: string,
  ): Promise<TransformOutcome> {
    const library = readXptLibrary(source, this.encoding);
    this.logger.debug('XPT 传输库解析完成', {
      version: library.version,
      members: library.members.map((member) => ({
        name: member.name,
        variables: member.variables.length,
        rows: member.rows.length,
      })),
    });

    const replacements = replaceInXptLibrary(library, searchText, replacementText);
    return {
      content: writeXptLibrary(library, this.encoding),
      replacements,
    };
  }
}
