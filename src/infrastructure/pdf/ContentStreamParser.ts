import { ContentStreamLexer } from './ContentStreamLexer.js';

/**
 * 内容流操作数
 */
export type ContentOperand =
  | { kind: 'number'; value: number }
  | { kind: 'string'; bytes: Uint8Array; hex: boolean }
  | { kind: 'name'; value: string }
  | { kind: 'keyword'; value: string }
  | { kind: 'array'; items: ContentOperand[] }
  | { kind: 'dict'; items: ContentOperand[] };

/**
 * 一条内容流操作，`start`/`end` 覆盖操作数与操作符的原始字节
 */
export interface ContentOperation {
  operator: string;
  operands: ContentOperand[];
  start: number;
  end: number;
}

// 可以出现在操作数位置的关键字
const OPERAND_KEYWORDS = new Set(['true', 'false', 'null']);

interface OpenContainer {
  kind: 'array' | 'dict';
  items: ContentOperand[];
}

/**
 * 将内容流解析为操作序列；内联图像整体作为一条 `BI` 操作
 */
export function parseContentStream(data: Uint8Array): ContentOperation[] {
  const lexer = new ContentStreamLexer(data);
  const operations: ContentOperation[] = [];
  const stack: OpenContainer[] = [];
  let operands: ContentOperand[] = [];
  let operandStart: number | null = null;

  const push = (operand: ContentOperand) => {
    const top = stack[stack.length - 1];
    if (top) {
      top.items.push(operand);
    } else {
      operands.push(operand);
    }
  };

  for (let token = lexer.nextToken(); token !== null; token = lexer.nextToken()) {
    if (token.type === 'keyword' && stack.length === 0 && !OPERAND_KEYWORDS.has(token.value)) {
      const start = operandStart ?? token.start;
      if (token.value === 'BI') {
        operations.push({ operator: 'BI', operands: [], start, end: lexer.skipInlineImage() });
      } else {
        operations.push({ operator: token.value, operands, start, end: token.end });
      }
      operands = [];
      operandStart = null;
      continue;
    }

    operandStart ??= token.start;
    switch (token.type) {
      case 'number':
        push({ kind: 'number', value: token.value });
        break;
      case 'string':
        push({ kind: 'string', bytes: token.bytes, hex: token.hex });
        break;
      case 'name':
        push({ kind: 'name', value: token.value });
        break;
      case 'keyword':
        push({ kind: 'keyword', value: token.value });
        break;
      case 'arrayStart':
        stack.push({ kind: 'array', items: [] });
        break;
      case 'dictStart':
        stack.push({ kind: 'dict', items: [] });
        break;
      case 'arrayEnd':
      case 'dictEnd': {
        const closed = stack.pop();
        if (closed) {
          push(
            closed.kind === 'array'
              ? { kind: 'array', items: closed.items }
              : { kind: 'dict', items: closed.items },
          );
        }
        break;
      }
    }
  }

  return operations;
}

export function numberOperand(operand: ContentOperand | undefined): number | null {
  return operand?.kind === 'number' ? operand.value : null;
}
