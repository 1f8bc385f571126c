import fs from 'node:fs/promises';
import path from 'node:path';
import { Logger } from '../logging/logger.js';
import { IDocumentReplacer } from '../../domain/services/IDocumentReplacer.js';
import { assertSearchText } from '../../domain/services/textReplace.js';
import { DocumentFormat, ReplacementResult } from '../../domain/types.js';
import { OUTPUT_NAMING } from '../../domain/constants/FileConstants.js';
import {
  CorruptInputError,
  DocumentReplaceError,
  OutputWriteError,
  errorMessage,
} from '../../domain/errors/DocumentErrors.js';

/**
 * 子类转换结果
 */
export interface TransformOutcome {
  content: Uint8Array | string;
  replacements: number;
}

/**
 * 生成输出路径：在扩展名前插入 `_modified`，保留扩展名大小写
 *
 * @param sourcePath - 源文件路径
 * @returns 输出文件路径
 */
export function buildOutputPath(sourcePath: string): string {
  const { dir, name, ext } = path.parse(sourcePath);
  return path.join(dir, `${name}${OUTPUT_NAMING.MODIFIED_SUFFIX}${ext}`);
}

/**
 * 文档替换器抽象基类
 * 负责读取源文件、写出结果与错误归类，子类只实现格式相关的转换
 */
export abstract class BaseDocumentReplacer implements IDocumentReplacer {
  abstract readonly format: DocumentFormat;

  protected readonly logger: Logger;

  /**
   * 构造函数
   * @param logger - 日志记录器
   */
  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * 执行替换（模板方法）
   * @param sourcePath - 源文件路径
   * @param searchText - 查找文本
   * @param replacementText - 替换文本
   * @returns 替换结果
   */
  public async replace(
    sourcePath: string,
    searchText: string,
    replacementText: string,
  ): Promise<ReplacementResult> {
    assertSearchText(searchText);
    const startTime = Date.now();
    const outputPath = buildOutputPath(sourcePath);

    this.logger.debug(`开始替换文件: ${path.basename(sourcePath)}`, {
      format: this.format,
    });

    // 1. 读取源文件
    const source = await this.readSource(sourcePath);

    // 2. 格式相关的转换
    const outcome = await this.runTransform(source, searchText, replacementText);

    // 3. 写出结果
    await this.writeOutput(outputPath, outcome.content);

    const duration = Date.now() - startTime;
    this.logger.info(
      `文件替换完成: ${path.basename(sourcePath)} -> ${outcome.replacements}处替换, 耗时: ${duration}ms`,
      { format: this.format, replacements: outcome.replacements, duration },
    );

    return {
      outputPath,
      format: this.format,
      replacements: outcome.replacements,
    };
  }

  /**
   * 格式相关的转换（子类必须实现）
   * @param source - 源文件内容
   * @param searchText - 查找文本
   * @param replacementText - 替换文本
   * @returns 输出内容与替换次数
   */
  protected abstract transform(
    source: Buffer,
    searchText: string,
    replacementText: string,
  ): Promise<TransformOutcome>;

  private async runTransform(
    source: Buffer,
    searchText: string,
    replacementText: string,
  ): Promise<TransformOutcome> {
    try {
      return await this.transform(source, searchText, replacementText);
    } catch (error) {
      if (error instanceof DocumentReplaceError) {
        throw error;
      }
      // 解析库抛出的未知错误统一视为输入损坏
      throw new CorruptInputError(errorMessage(error), { format: this.format });
    }
  }

  private async readSource(sourcePath: string): Promise<Buffer> {
    try {
      return await fs.readFile(sourcePath);
    } catch (error) {
      throw new OutputWriteError(
        `Failed to read source file: ${errorMessage(error)}`,
        { path: sourcePath },
      );
    }
  }

  /**
   * 写出结果，失败时删除残留文件
   */
  private async writeOutput(
    outputPath: string,
    content: Uint8Array | string,
  ): Promise<void> {
    try {
      await fs.writeFile(outputPath, content);
    } catch (error) {
      await fs.rm(outputPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn('删除不完整的输出文件失败', {
          path: outputPath,
          error: errorMessage(cleanupError),
        });
      });
      throw new OutputWriteError(
        `Failed to write output file: ${errorMessage(error)}`,
        { path: outputPath },
      );
    }
  }
}
