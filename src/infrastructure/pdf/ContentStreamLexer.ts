/**
 * PDF 内容流词法分析器
 * 记录每个词法单元在原始字节中的起止偏移，供后续按区间改写
 */

interface TokenSpan {
  start: number;
  end: number;
}

export type ContentToken = TokenSpan &
  (
    | { type: 'number'; value: number }
    | { type: 'string'; bytes: Uint8Array; hex: boolean }
    | { type: 'name'; value: string }
    | { type: 'keyword'; value: string }
    | { type: 'arrayStart' | 'arrayEnd' | 'dictStart' | 'dictEnd' }
  );

const WHITESPACE = new Set([0x00, 0x09, 0x0a, 0x0c, 0x0d, 0x20]);
// ( ) < > [ ] { } / %
const DELIMITERS = new Set([
  0x28, 0x29, 0x3c, 0x3e, 0x5b, 0x5d, 0x7b, 0x7d, 0x2f, 0x25,
]);

const ESCAPES: Record<number, number> = {
  0x6e: 0x0a, // \n
  0x72: 0x0d, // \r
  0x74: 0x09, // \t
  0x62: 0x08, // \b
  0x66: 0x0c, // \f
};

export function isWhitespace(byte: number): boolean {
  return WHITESPACE.has(byte);
}

function isRegular(byte: number): boolean {
  return !WHITESPACE.has(byte) && !DELIMITERS.has(byte);
}

function hexValue(byte: number): number {
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30;
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x41 + 10;
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x61 + 10;
  return -1;
}

export class ContentStreamLexer {
  private pos = 0;

  constructor(private readonly data: Uint8Array) {}

  /**
   * 读取下一个词法单元，到达末尾返回 null
   */
  nextToken(): ContentToken | null {
    this.skipWhitespaceAndComments();
    if (this.pos >= this.data.length) {
      return null;
    }

    const start = this.pos;
    const ch = this.data[this.pos];

    if (ch === 0x28) {
      return this.readLiteralString(start);
    }
    if (ch === 0x3c) {
      if (this.data[this.pos + 1] === 0x3c) {
        this.pos += 2;
        return { type: 'dictStart', start, end: this.pos };
      }
      return this.readHexString(start);
    }
    if (ch === 0x3e && this.data[this.pos + 1] === 0x3e) {
      this.pos += 2;
      return { type: 'dictEnd', start, end: this.pos };
    }
    if (ch === 0x5b) {
      this.pos++;
      return { type: 'arrayStart', start, end: this.pos };
    }
    if (ch === 0x5d) {
      this.pos++;
      return { type: 'arrayEnd', start, end: this.pos };
    }
    if (ch === 0x2f) {
      return this.readName(start);
    }
    if (isRegular(ch)) {
      return this.readRegular(start);
    }

    // 孤立的 ) > { } 不构成词法单元
    this.pos++;
    return this.nextToken();
  }

  /**
   * 跳过内联图像（BI 之后到 EI 结束），返回 EI 之后的偏移
   */
  skipInlineImage(): number {
    let token = this.nextToken();
    while (token !== null && !(token.type === 'keyword' && token.value === 'ID')) {
      token = this.nextToken();
    }
    if (token === null) {
      return this.pos;
    }

    // ID 之后恰好一个空白字节，其后是二进制数据
    const dataStart = this.pos + 1;
    for (let i = dataStart; i + 1 < this.data.length; i++) {
      if (
        this.data[i] === 0x45 &&
        this.data[i + 1] === 0x49 &&
        (i === dataStart || isWhitespace(this.data[i - 1])) &&
        (i + 2 >= this.data.length || !isRegular(this.data[i + 2]))
      ) {
        this.pos = i + 2;
        return this.pos;
      }
    }
    this.pos = this.data.length;
    return this.pos;
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.data.length) {
      const ch = this.data[this.pos];
      if (WHITESPACE.has(ch)) {
        this.pos++;
      } else if (ch === 0x25) {
        while (
          this.pos < this.data.length &&
          this.data[this.pos] !== 0x0a &&
          this.data[this.pos] !== 0x0d
        ) {
          this.pos++;
        }
      } else {
        return;
      }
    }
  }

  private readLiteralString(start: number): ContentToken {
    this.pos++;
    const bytes: number[] = [];
    let depth = 1;

    while (this.pos < this.data.length) {
      const ch = this.data[this.pos++];
      if (ch === 0x5c) {
        this.readEscape(bytes);
        continue;
      }
      if (ch === 0x28) {
        depth++;
      } else if (ch === 0x29) {
        depth--;
        if (depth === 0) break;
      }
      bytes.push(ch);
    }

    return {
      type: 'string',
      bytes: Uint8Array.from(bytes),
      hex: false,
      start,
      end: this.pos,
    };
  }

  private readEscape(bytes: number[]): void {
    if (this.pos >= this.data.length) return;
    const next = this.data[this.pos++];

    const mapped = ESCAPES[next];
    if (mapped !== undefined) {
      bytes.push(mapped);
      return;
    }
    // 续行
    if (next === 0x0d) {
      if (this.data[this.pos] === 0x0a) this.pos++;
      return;
    }
    if (next === 0x0a) return;

    if (next >= 0x30 && next <= 0x37) {
      let value = next - 0x30;
      for (let i = 0; i < 2; i++) {
        const digit = this.data[this.pos];
        if (digit === undefined || digit < 0x30 || digit > 0x37) break;
        value = value * 8 + (digit - 0x30);
        this.pos++;
      }
      bytes.push(value & 0xff);
      return;
    }
    // \( \) \\ 以及未知转义都取字符本身
    bytes.push(next);
  }

  private readHexString(start: number): ContentToken {
    this.pos++;
    const digits: number[] = [];
    while (this.pos < this.data.length && this.data[this.pos] !== 0x3e) {
      const value = hexValue(this.data[this.pos++]);
      if (value >= 0) digits.push(value);
    }
    this.pos++;

    if (digits.length % 2 === 1) digits.push(0);
    const bytes = new Uint8Array(digits.length / 2);
    for (let i = 0; i < bytes.length; i++) {
      bytes[i] = digits[i * 2] * 16 + digits[i * 2 + 1];
    }
    return { type: 'string', bytes, hex: true, start, end: this.pos };
  }

  private readName(start: number): ContentToken {
    this.pos++;
    let value = '';
    while (this.pos < this.data.length && isRegular(this.data[this.pos])) {
      const ch = this.data[this.pos];
      const hi = hexValue(this.data[this.pos + 1] ?? -1);
      const lo = hexValue(this.data[this.pos + 2] ?? -1);
      if (ch === 0x23 && hi >= 0 && lo >= 0) {
        value += String.fromCharCode(hi * 16 + lo);
        this.pos += 3;
      } else {
        value += String.fromCharCode(ch);
        this.pos++;
      }
    }
    return { type: 'name', value, start, end: this.pos };
  }

  /**
   * 数字或关键字
   */
  private readRegular(start: number): ContentToken {
    while (this.pos < this.data.length && isRegular(this.data[this.pos])) {
      this.pos++;
    }
    const text = String.fromCharCode(...this.data.subarray(start, this.pos));
    if (/^[+-]?(\d+\.?\d*|\.\d+)$/.test(text)) {
      return { type: 'number', value: Number(text), start, end: this.pos };
    }
    return { type: 'keyword', value: text, start, end: this.pos };
  }
}
