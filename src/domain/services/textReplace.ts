import { ValidationError } from '../errors/DocumentErrors.js';

/**
 * 字面量替换结果
 */
export interface LiteralReplaceResult {
  text: string;
  count: number;
}

/**
 * 校验查找文本非空
 * @param searchText - 查找文本
 * @throws {ValidationError} 查找文本为空时抛出
 */
export function assertSearchText(searchText: string): void {
  if (searchText.length === 0) {
    throw new ValidationError('Text to find is required', {
      field: 'searchText',
    });
  }
}

/**
 * 精确、区分大小写、不使用正则的子串替换
 * 从左到右扫描，匹配之间不重叠
 *
 * @param source - 原始文本
 * @param searchText - 查找文本
 * @param replacementText - 替换文本
 * @returns 替换后的文本与替换次数
 */
export function replaceLiteral(
  source: string,
  searchText: string,
  replacementText: string,
): LiteralReplaceResult {
  assertSearchText(searchText);
  const parts = source.split(searchText);
  if (parts.length === 1) {
    return { text: source, count: 0 };
  }
  return { text: parts.join(replacementText), count: parts.length - 1 };
}

/**
 * 查找所有不重叠匹配的起始位置
 *
 * @param source - 原始文本
 * @param searchText - 查找文本
 * @returns 匹配起始下标数组
 */
export function findLiteralOccurrences(
  source: string,
  searchText: string,
): number[] {
  assertSearchText(searchText);
  const positions: number[] = [];
  let from = source.indexOf(searchText);
  while (from !== -1) {
    positions.push(from);
    from = source.indexOf(searchText, from + searchText.length);
  }
  return positions;
}
