/**
 * 按字节区间替换内容流中的操作
 */
export interface ContentEdit {
  start: number;
  end: number;
  replacement: string;
}

/**
 * 应用编辑，编辑区间不能重叠；未编辑的字节原样保留
 *
 * @param data - 原始内容流
 * @param edits - 编辑列表
 * @returns 新内容流
 */
export function applyContentEdits(data: Uint8Array, edits: ContentEdit[]): Uint8Array {
  const sorted = [...edits].sort((a, b) => a.start - b.start);
  const chunks: Uint8Array[] = [];
  let cursor = 0;
  for (const edit of sorted) {
    if (edit.start < cursor) {
      throw new Error(`Overlapping content stream edit at offset ${edit.start}`);
    }
    chunks.push(data.subarray(cursor, edit.start));
    chunks.push(Buffer.from(edit.replacement, 'latin1'));
    cursor = edit.end;
  }
  chunks.push(data.subarray(cursor));
  return Buffer.concat(chunks);
}

/**
 * 格式化数字：最多三位小数，不使用指数形式
 */
export function formatNumber(value: number): string {
  const rounded = Math.round(value * 1000) / 1000;
  if (rounded === 0) return '0';
  return Number.isInteger(rounded)
    ? String(rounded)
    : rounded.toFixed(3).replace(/0+$/, '');
}

export function hexString(bytes: ArrayLike<number>): string {
  let hex = '';
  for (let i = 0; i < bytes.length; i++) {
    hex += bytes[i].toString(16).padStart(2, '0').toUpperCase();
  }
  return `<${hex}>`;
}
