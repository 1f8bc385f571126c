import { XptTextEncoding, XptVersion } from './types.js';

/** 传输格式记录长度 */
export const RECORD_LENGTH = 80;
/** namestr 长度（VAX/VMS 为 136） */
export const NAMESTR_LENGTH = 140;
export const VAX_NAMESTR_LENGTH = 136;

const HEADER_PREFIX = 'HEADER RECORD*******';
const HEADER_MIDDLE = 'HEADER RECORD!!!!!!!';

/** 各版本的头记录名称 */
export const HEADER_NAMES: Record<
  XptVersion,
  {
    library: string;
    member: string;
    descriptor: string;
    namestr: string;
    observations: string;
  }
> = {
  5: {
    library: 'LIBRARY',
    member: 'MEMBER',
    descriptor: 'DSCRPTR',
    namestr: 'NAMESTR',
    observations: 'OBS',
  },
  8: {
    library: 'LIBV8',
    member: 'MEMBV8',
    descriptor: 'DSCPTV8',
    namestr: 'NAMSTV8',
    observations: 'OBSV8',
  },
};

/** 标签扩展段头记录名称 */
export const LABEL_HEADER_NAMES = {
  v8: 'LABELV8',
  v9: 'LABELV9',
} as const;

/** 字符型变量的最大长度 */
export const MAX_CHARACTER_LENGTH: Record<XptVersion, number> = {
  5: 200,
  8: 32767,
};

/** 变量名的最大长度 */
export const MAX_NAME_LENGTH: Record<XptVersion, number> = {
  5: 8,
  8: 32,
};

/**
 * 已解析的头记录
 */
export interface HeaderRecord {
  name: string;
  /** 48-78 列的六个 5 位数字 */
  numbers: number[];
}

/**
 * 解析 80 字节头记录
 * @returns 不是头记录时返回 null
 */
export function parseHeaderRecord(record: Buffer): HeaderRecord | null {
  const text = record.toString('latin1');
  if (
    text.length !== RECORD_LENGTH ||
    !text.startsWith(HEADER_PREFIX) ||
    text.slice(28, 48) !== HEADER_MIDDLE
  ) {
    return null;
  }
  const numbers: number[] = [];
  for (let i = 0; i < 6; i++) {
    const field = text.slice(48 + i * 5, 53 + i * 5).trim();
    const parsed = Number.parseInt(field, 10);
    numbers.push(Number.isNaN(parsed) ? 0 : parsed);
  }
  return { name: text.slice(20, 28).trim(), numbers };
}

/**
 * 构造 80 字节头记录
 *
 * @param name - 记录名称，最多 8 个字符
 * @param digits - 48 列起的 30 个字符
 */
export function headerRecord(name: string, digits: string): Buffer {
  const text = `${HEADER_PREFIX}${name.padEnd(8, ' ')}${HEADER_MIDDLE}${digits.padEnd(30, ' ')}  `;
  return Buffer.from(text, 'latin1');
}

/**
 * 按编码生成定长、空格补齐的文本字段，超长部分按字节截断
 */
export function fixedText(
  value: string,
  width: number,
  encoding: XptTextEncoding = 'latin1',
): Buffer {
  const out = Buffer.alloc(width, 0x20);
  Buffer.from(value, encoding).copy(out, 0, 0, width);
  return out;
}

/**
 * 解码定长文本字段，去掉尾部空格与 NUL
 */
export function readText(
  bytes: Buffer,
  encoding: XptTextEncoding = 'latin1',
): string {
  let end = bytes.length;
  while (end > 0 && (bytes[end - 1] === 0x20 || bytes[end - 1] === 0x00)) {
    end--;
  }
  return bytes.subarray(0, end).toString(encoding);
}

/**
 * 用空格把缓冲区补齐到 80 字节的整数倍
 */
export function padToRecord(buffer: Buffer): Buffer {
  const remainder = buffer.length % RECORD_LENGTH;
  if (remainder === 0) {
    return buffer;
  }
  return Buffer.concat([buffer, Buffer.alloc(RECORD_LENGTH - remainder, 0x20)]);
}
