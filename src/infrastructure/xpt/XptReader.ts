import { CorruptInputError } from '../../domain/errors/DocumentErrors.js';
import { ibmToIeee } from './ibmFloat.js';
import {
  HEADER_NAMES,
  HeaderRecord,
  LABEL_HEADER_NAMES,
  NAMESTR_LENGTH,
  RECORD_LENGTH,
  VAX_NAMESTR_LENGTH,
  parseHeaderRecord,
  readText,
} from './records.js';
import {
  XptCell,
  XptLibrary,
  XptMember,
  XptTextEncoding,
  XptVariable,
  XptVersion,
} from './types.js';

/** 缺失值首字节：`.`、`_`、`A`-`Z` */
function missingCode(first: number): string | null {
  if (first === 0x2e) return '.';
  if (first === 0x5f) return '._';
  if (first >= 0x41 && first <= 0x5a) return `.${String.fromCharCode(first)}`;
  return null;
}

/**
 * 按 80 字节记录顺序读取的游标
 */
class RecordCursor {
  private offset = 0;

  constructor(private readonly buffer: Buffer) {}

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  take(length: number, what: string): Buffer {
    if (this.offset + length > this.buffer.length) {
      throw new CorruptInputError(`Truncated transport file while reading ${what}`, {
        offset: this.offset,
      });
    }
    const slice = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  /** 跳过到下一个 80 字节边界 */
  align(): void {
    const remainder = this.offset % RECORD_LENGTH;
    if (remainder !== 0) {
      this.offset = Math.min(
        this.buffer.length,
        this.offset + RECORD_LENGTH - remainder,
      );
    }
  }

  peekHeader(): HeaderRecord | null {
    if (this.remaining < RECORD_LENGTH) {
      return null;
    }
    return parseHeaderRecord(
      this.buffer.subarray(this.offset, this.offset + RECORD_LENGTH),
    );
  }

  expectHeader(expected: string): HeaderRecord {
    const header = parseHeaderRecord(this.take(RECORD_LENGTH, `${expected} header`));
    if (!header || header.name !== expected) {
      throw new CorruptInputError(
        `Expected ${expected} header record, found ${header ? header.name : 'data'}`,
        { offset: this.offset - RECORD_LENGTH },
      );
    }
    return header;
  }

  /**
   * 查找下一个成员头记录的偏移（按 80 字节对齐扫描），没有则返回文件末尾
   */
  findNextMember(version: XptVersion): number {
    for (
      let offset = this.offset;
      offset + RECORD_LENGTH <= this.buffer.length;
      offset += RECORD_LENGTH
    ) {
      const header = parseHeaderRecord(
        this.buffer.subarray(offset, offset + RECORD_LENGTH),
      );
      if (header && header.name === HEADER_NAMES[version].member) {
        return offset;
      }
    }
    return this.buffer.length;
  }
}

interface NamestrEntry {
  variable: XptVariable;
  position: number;
}

function parseNamestr(
  bytes: Buffer,
  version: XptVersion,
  encoding: XptTextEncoding,
): NamestrEntry {
  const ntype = bytes.readInt16BE(0);
  const shortName = readText(bytes.subarray(8, 16), encoding);
  const longName =
    version === 8 && bytes.length >= 120
      ? readText(bytes.subarray(88, 120), encoding)
      : '';

  return {
    variable: {
      name: longName || shortName,
      label: readText(bytes.subarray(16, 56), encoding),
      type: ntype === 2 ? 'character' : 'numeric',
      length: bytes.readInt16BE(4),
      format: {
        name: readText(bytes.subarray(56, 64), encoding),
        length: bytes.readInt16BE(64),
        decimals: bytes.readInt16BE(66),
      },
      justification: bytes.readInt16BE(68),
      informat: {
        name: readText(bytes.subarray(72, 80), encoding),
        length: bytes.readInt16BE(80),
        decimals: bytes.readInt16BE(82),
      },
    },
    position: bytes.readInt32BE(84),
  };
}

/**
 * 读取 LABELV8 / LABELV9 扩展段，覆盖长变量名、长标签与长格式名
 */
function applyLabelSection(
  cursor: RecordCursor,
  header: HeaderRecord,
  entries: NamestrEntry[],
  encoding: XptTextEncoding,
): void {
  const withFormats = header.name === LABEL_HEADER_NAMES.v9;
  const count = header.numbers[0];

  for (let i = 0; i < count; i++) {
    const fixed = cursor.take(withFormats ? 10 : 6, 'label entry');
    const varnum = fixed.readInt16BE(0);
    const nameLength = fixed.readInt16BE(2);
    const labelLength = fixed.readInt16BE(4);
    const formatLength = withFormats ? fixed.readInt16BE(6) : 0;
    const informatLength = withFormats ? fixed.readInt16BE(8) : 0;

    const name = cursor.take(nameLength, 'label entry name').toString(encoding);
    const label = cursor.take(labelLength, 'label entry label').toString(encoding);
    const format = cursor.take(formatLength, 'label entry format').toString(encoding);
    const informat = cursor
      .take(informatLength, 'label entry informat')
      .toString(encoding);

    const entry = entries[varnum - 1];
    if (!entry) {
      throw new CorruptInputError(`Label entry refers to unknown variable ${varnum}`);
    }
    entry.variable.name = name;
    entry.variable.label = label;
    if (withFormats) {
      entry.variable.format.name = format;
      entry.variable.informat.name = informat;
    }
  }
  cursor.align();
}

function decodeRow(
  row: Buffer,
  entries: NamestrEntry[],
  encoding: XptTextEncoding,
): XptCell[] {
  return entries.map(({ variable, position }) => {
    const bytes = row.subarray(position, position + variable.length);
    if (variable.type === 'character') {
      return readText(bytes, encoding);
    }
    const code = missingCode(bytes[0]);
    if (code !== null && bytes.subarray(1).every((b) => b === 0)) {
      return { missing: code };
    }
    return ibmToIeee(bytes);
  });
}

function readMember(
  cursor: RecordCursor,
  version: XptVersion,
  memberHeader: HeaderRecord,
  encoding: XptTextEncoding,
): XptMember {
  const names = HEADER_NAMES[version];
  const namestrLength =
    memberHeader.numbers[5] === VAX_NAMESTR_LENGTH
      ? VAX_NAMESTR_LENGTH
      : NAMESTR_LENGTH;

  cursor.expectHeader(names.descriptor);
  const first = cursor.take(RECORD_LENGTH, 'member descriptor');
  const second = cursor.take(RECORD_LENGTH, 'member descriptor');

  const nameWidth = version === 8 ? 32 : 8;
  const afterName = 8 + nameWidth + 8;
  const member: XptMember = {
    name: readText(first.subarray(8, 8 + nameWidth), encoding),
    sasVersion: readText(first.subarray(afterName, afterName + 8)),
    os: readText(first.subarray(afterName + 8, afterName + 16)),
    created: first.subarray(64, 80).toString('latin1'),
    modified: second.subarray(0, 16).toString('latin1'),
    label: readText(second.subarray(32, 72), encoding),
    datasetType: readText(second.subarray(72, 80)),
    variables: [],
    rows: [],
  };

  const namestrHeader = cursor.expectHeader(names.namestr);
  const variableCount = namestrHeader.numbers[1];
  const entries: NamestrEntry[] = [];
  for (let i = 0; i < variableCount; i++) {
    entries.push(
      parseNamestr(cursor.take(namestrLength, 'namestr'), version, encoding),
    );
  }
  cursor.align();

  const labelHeader = cursor.peekHeader();
  if (
    labelHeader &&
    (labelHeader.name === LABEL_HEADER_NAMES.v8 ||
      labelHeader.name === LABEL_HEADER_NAMES.v9)
  ) {
    cursor.take(RECORD_LENGTH, 'label header');
    applyLabelSection(cursor, labelHeader, entries, encoding);
  }

  cursor.expectHeader(names.observations);

  const dataEnd = cursor.findNextMember(version);
  const data = cursor.take(dataEnd - cursor.position, 'observations');
  const observationLength = entries.reduce(
    (max, { variable, position }) => Math.max(max, position + variable.length),
    0,
  );

  member.variables = entries.map((entry) => entry.variable);
  if (observationLength > 0) {
    let rowCount = Math.floor(data.length / observationLength);
    // 末尾不足一条记录的空格填充不是观测
    while (rowCount > 0) {
      const start = (rowCount - 1) * observationLength;
      const row = data.subarray(start, start + observationLength);
      if (start < data.length - RECORD_LENGTH || !row.every((b) => b === 0x20)) {
        break;
      }
      rowCount--;
    }
    for (let i = 0; i < rowCount; i++) {
      const start = i * observationLength;
      member.rows.push(
        decodeRow(data.subarray(start, start + observationLength), entries, encoding),
      );
    }
  }

  return member;
}

/**
 * 解析 SAS 传输库（v5 或 v8，可包含多个成员）
 *
 * @param buffer - 文件内容
 * @param encoding - 字符单元编码
 * @returns 传输库
 * @throws {CorruptInputError} 不是传输库或头记录、namestr 被截断时抛出
 */
export function readXptLibrary(
  buffer: Buffer,
  encoding: XptTextEncoding = 'utf8',
): XptLibrary {
  const cursor = new RecordCursor(buffer);
  const libraryHeader = cursor.peekHeader();
  let version: XptVersion;
  if (libraryHeader?.name === HEADER_NAMES[5].library) {
    version = 5;
  } else if (libraryHeader?.name === HEADER_NAMES[8].library) {
    version = 8;
  } else {
    throw new CorruptInputError(
      'File is not a SAS transport library (missing library header record)',
    );
  }
  cursor.take(RECORD_LENGTH, 'library header');

  const first = cursor.take(RECORD_LENGTH, 'library descriptor');
  const second = cursor.take(RECORD_LENGTH, 'library descriptor');
  const library: XptLibrary = {
    version,
    sasVersion: readText(first.subarray(24, 32)),
    os: readText(first.subarray(32, 40)),
    created: first.subarray(64, 80).toString('latin1'),
    modified: second.subarray(0, 16).toString('latin1'),
    members: [],
  };

  while (cursor.remaining >= RECORD_LENGTH) {
    const memberHeader = cursor.expectHeader(HEADER_NAMES[version].member);
    library.members.push(readMember(cursor, version, memberHeader, encoding));
  }

  if (library.members.length === 0) {
    throw new CorruptInputError('Transport library contains no members');
  }
  return library;
}
