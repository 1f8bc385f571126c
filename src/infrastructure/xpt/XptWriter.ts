import { ValidationError } from '../../domain/errors/DocumentErrors.js';
import { ieeeToIbm } from './ibmFloat.js';
import {
  HEADER_NAMES,
  LABEL_HEADER_NAMES,
  MAX_CHARACTER_LENGTH,
  MAX_NAME_LENGTH,
  NAMESTR_LENGTH,
  RECORD_LENGTH,
  fixedText,
  headerRecord,
  padToRecord,
} from './records.js';
import {
  XptCell,
  XptLibrary,
  XptMember,
  XptTextEncoding,
  XptVariable,
  XptVersion,
  isXptMissing,
} from './types.js';

const ZEROS = '0'.repeat(30);
const MEMBER_DIGITS = `00000000000000000160000000${String(NAMESTR_LENGTH).padStart(4, '0')}`;
const SHORT_NAME_LENGTH = 8;
const SHORT_LABEL_LENGTH = 40;

const blanks = (length: number) => Buffer.alloc(length, 0x20);
const ascii = (text: string) => Buffer.from(text, 'latin1');

interface LaidOutVariable {
  variable: XptVariable;
  length: number;
  position: number;
}

function byteLength(text: string, encoding: XptTextEncoding): number {
  return Buffer.byteLength(text, encoding);
}

function assertEncodable(text: string, encoding: XptTextEncoding): void {
  if (encoding === 'latin1' && /[^\u0000-\u00ff]/.test(text)) {
    throw new ValidationError(
      `Value "${text}" cannot be encoded as latin1 for the transport file`,
    );
  }
}

/**
 * 计算变量长度与偏移；字符型变量按最长取值扩展，不会缩短
 */
function layoutVariables(
  member: XptMember,
  version: XptVersion,
  encoding: XptTextEncoding,
): LaidOutVariable[] {
  let position = 0;
  return member.variables.map((variable, column) => {
    let length = variable.length;
    if (variable.type === 'character') {
      for (const row of member.rows) {
        const cell = row[column];
        if (typeof cell !== 'string') {
          throw new ValidationError(
            `Character variable ${variable.name} holds a non-text value`,
          );
        }
        assertEncodable(cell, encoding);
        length = Math.max(length, byteLength(cell, encoding));
      }
      if (length > MAX_CHARACTER_LENGTH[version]) {
        throw new ValidationError(
          `Value of variable ${variable.name} exceeds ${MAX_CHARACTER_LENGTH[version]} bytes allowed by transport version ${version}`,
          { variable: variable.name, length },
        );
      }
    }
    const laidOut = { variable, length, position };
    position += length;
    return laidOut;
  });
}

function validateMetadata(
  member: XptMember,
  version: XptVersion,
  encoding: XptTextEncoding,
): void {
  if (byteLength(member.name, encoding) > MAX_NAME_LENGTH[version]) {
    throw new ValidationError(
      `Dataset name ${member.name} is too long for transport version ${version}`,
    );
  }
  for (const variable of member.variables) {
    if (byteLength(variable.name, encoding) > MAX_NAME_LENGTH[version]) {
      throw new ValidationError(
        `Variable name ${variable.name} is too long for transport version ${version}`,
      );
    }
    if (
      version === 5 &&
      (byteLength(variable.label, encoding) > SHORT_LABEL_LENGTH ||
        variable.format.name.length > SHORT_NAME_LENGTH ||
        variable.informat.name.length > SHORT_NAME_LENGTH)
    ) {
      throw new ValidationError(
        `Metadata of variable ${variable.name} does not fit transport version 5`,
      );
    }
  }
}

function namestr(
  { variable, length, position }: LaidOutVariable,
  index: number,
  version: XptVersion,
  encoding: XptTextEncoding,
): Buffer {
  const out = Buffer.alloc(NAMESTR_LENGTH, 0);
  out.writeInt16BE(variable.type === 'character' ? 2 : 1, 0);
  out.writeInt16BE(0, 2);
  out.writeInt16BE(length, 4);
  out.writeInt16BE(index + 1, 6);
  fixedText(variable.name, 8, encoding).copy(out, 8);
  fixedText(variable.label, 40, encoding).copy(out, 16);
  fixedText(variable.format.name, 8).copy(out, 56);
  out.writeInt16BE(variable.format.length, 64);
  out.writeInt16BE(variable.format.decimals, 66);
  out.writeInt16BE(variable.justification, 68);
  fixedText(variable.informat.name, 8).copy(out, 72);
  out.writeInt16BE(variable.informat.length, 80);
  out.writeInt16BE(variable.informat.decimals, 82);
  out.writeInt32BE(position, 84);
  if (version === 8) {
    fixedText(variable.name, 32, encoding).copy(out, 88);
    out.writeInt16BE(byteLength(variable.label, encoding), 120);
  }
  return out;
}

function needsLongFormats(variable: XptVariable): boolean {
  return (
    variable.format.name.length > SHORT_NAME_LENGTH ||
    variable.informat.name.length > SHORT_NAME_LENGTH
  );
}

/**
 * v8 的 LABELV8 / LABELV9 扩展段，没有超长元数据时返回空
 */
function labelSection(
  variables: XptVariable[],
  encoding: XptTextEncoding,
): Buffer[] {
  const withFormats = variables.some(needsLongFormats);
  const indexed = variables
    .map((variable, index) => ({ variable, index }))
    .filter(
      ({ variable }) =>
        variable.name.length > SHORT_NAME_LENGTH ||
        byteLength(variable.label, encoding) > SHORT_LABEL_LENGTH ||
        needsLongFormats(variable),
    );
  if (indexed.length === 0) {
    return [];
  }

  const entries = indexed.map(({ variable, index }) => {
    const name = Buffer.from(variable.name, encoding);
    const label = Buffer.from(variable.label, encoding);
    const fixed = Buffer.alloc(withFormats ? 10 : 6);
    fixed.writeInt16BE(index + 1, 0);
    fixed.writeInt16BE(name.length, 2);
    fixed.writeInt16BE(label.length, 4);
    if (!withFormats) {
      return Buffer.concat([fixed, name, label]);
    }
    const format = ascii(variable.format.name);
    const informat = ascii(variable.informat.name);
    fixed.writeInt16BE(format.length, 6);
    fixed.writeInt16BE(informat.length, 8);
    return Buffer.concat([fixed, name, label, format, informat]);
  });

  const headerName = withFormats ? LABEL_HEADER_NAMES.v9 : LABEL_HEADER_NAMES.v8;
  return [
    headerRecord(headerName, String(indexed.length).padStart(5, '0')),
    padToRecord(Buffer.concat(entries)),
  ];
}

function missingByte(code: string): number {
  if (code === '.') return 0x2e;
  if (code === '._') return 0x5f;
  const letter = code.charCodeAt(1);
  if (code.length === 2 && letter >= 0x41 && letter <= 0x5a) {
    return letter;
  }
  throw new ValidationError(`Unknown missing value code ${code}`);
}

function encodeCell(
  cell: XptCell,
  { variable, length }: LaidOutVariable,
  encoding: XptTextEncoding,
): Buffer {
  if (variable.type === 'character') {
    return fixedText(typeof cell === 'string' ? cell : '', length, encoding);
  }
  if (isXptMissing(cell)) {
    const out = Buffer.alloc(length, 0);
    out[0] = missingByte(cell.missing);
    return out;
  }
  if (typeof cell !== 'number') {
    throw new ValidationError(
      `Numeric variable ${variable.name} holds a non-numeric value`,
    );
  }
  return Buffer.from(ieeeToIbm(cell, length));
}

function writeMember(
  member: XptMember,
  version: XptVersion,
  encoding: XptTextEncoding,
): Buffer[] {
  validateMetadata(member, version, encoding);
  const names = HEADER_NAMES[version];
  const layout = layoutVariables(member, version, encoding);

  const descriptor =
    version === 8
      ? Buffer.concat([
          ascii('SAS     '),
          fixedText(member.name, 32, encoding),
          ascii('SASDATA '),
          fixedText(member.sasVersion, 8),
          fixedText(member.os, 8),
          fixedText(member.created, 16),
        ])
      : Buffer.concat([
          ascii('SAS     '),
          fixedText(member.name, 8, encoding),
          ascii('SASDATA '),
          fixedText(member.sasVersion, 8),
          fixedText(member.os, 8),
          blanks(24),
          fixedText(member.created, 16),
        ]);

  const namestrs = layout.map((entry, index) =>
    namestr(entry, index, version, encoding),
  );
  const rows = member.rows.map((row) =>
    Buffer.concat(layout.map((entry, column) => encodeCell(row[column], entry, encoding))),
  );

  return [
    headerRecord(names.member, MEMBER_DIGITS),
    headerRecord(names.descriptor, ZEROS),
    descriptor,
    Buffer.concat([
      fixedText(member.modified, 16),
      blanks(16),
      fixedText(member.label, 40, encoding),
      fixedText(member.datasetType, 8),
    ]),
    headerRecord(
      names.namestr,
      `000000${String(layout.length).padStart(4, '0')}${'0'.repeat(20)}`,
    ),
    padToRecord(Buffer.concat(namestrs)),
    ...(version === 8 ? labelSection(member.variables, encoding) : []),
    headerRecord(names.observations, ZEROS),
    padToRecord(Buffer.concat(rows)),
  ];
}

/**
 * 将传输库序列化为 SAS 传输格式
 *
 * @param library - 传输库
 * @param encoding - 字符单元编码
 * @returns 文件内容
 * @throws {ValidationError} 元数据或取值超出该版本限制时抛出
 */
export function writeXptLibrary(
  library: XptLibrary,
  encoding: XptTextEncoding = 'utf8',
): Buffer {
  const chunks: Buffer[] = [
    headerRecord(HEADER_NAMES[library.version].library, ZEROS),
    Buffer.concat([
      ascii('SAS     SAS     SASLIB  '),
      fixedText(library.sasVersion, 8),
      fixedText(library.os, 8),
      blanks(24),
      fixedText(library.created, 16),
    ]),
    padToRecord(fixedText(library.modified, 16)),
  ];
  for (const member of library.members) {
    chunks.push(...writeMember(member, library.version, encoding));
  }

  const output = Buffer.concat(chunks);
  if (output.length % RECORD_LENGTH !== 0) {
    throw new Error('Transport output is not aligned to 80-byte records');
  }
  return output;
}
