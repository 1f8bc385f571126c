import { DocumentFormat, ReplacementResult } from '../types.js';

/**
 * 文档替换器接口
 * @description 每种格式对应一个实现，签名统一为 (源路径, 查找文本, 替换文本) → 结果
 */
export interface IDocumentReplacer {
  /**
   * 替换器负责的格式
   */
  readonly format: DocumentFormat;

  /**
   * 执行替换，输出写入源文件旁的 `_modified` 文件
   *
   * @param sourcePath - 源文件路径，不会被修改
   * @param searchText - 查找文本
   * @param replacementText - 替换文本
   * @returns 替换结果
   */
  replace(
    sourcePath: string,
    searchText: string,
    replacementText: string,
  ): Promise<ReplacementResult>;
}

/**
 * 格式到替换器的映射，编译器保证穷尽
 */
export type DocumentReplacerRegistry = Record<DocumentFormat, IDocumentReplacer>;
