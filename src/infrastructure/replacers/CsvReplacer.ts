import Papa from 'papaparse';
import { BaseDocumentReplacer, TransformOutcome } from './BaseDocumentReplacer.js';
import { replaceLiteral } from '../../domain/services/textReplace.js';
import { CorruptInputError } from '../../domain/errors/DocumentErrors.js';

const BOM = '\uFEFF';
const QUOTE = '"';
const DELIMITERS_TO_GUESS = [',', ';', '\t', '|'];
const DELIMITER_PREVIEW_ROWS = 10;

/**
 * 解析后的 CSV 表格
 */
export interface CsvTable {
  rows: string[][];
  /** 与 rows 对应，源文件中该单元格是否带引号 */
  quoted: boolean[][];
  delimiter: string;
  linebreak: string;
  hasBom: boolean;
  trailingLinebreak: boolean;
}

/**
 * 对照原始文本推断每个单元格是否带引号
 * 无法对齐时返回 null，调用方按全部不带引号处理
 */
function detectQuoting(
  text: string,
  rows: string[][],
  delimiter: string,
  linebreak: string,
): boolean[][] | null {
  const flags: boolean[][] = [];
  let pos = 0;

  for (const row of rows) {
    const rowFlags: boolean[] = [];
    for (let col = 0; col < row.length; col++) {
      const value = row[col];
      if (text[pos] === QUOTE) {
        const escapedQuotes = value.split(QUOTE).length - 1;
        const rawLength = value.length + 2 + escapedQuotes;
        if (text[pos + rawLength - 1] !== QUOTE) {
          return null;
        }
        pos += rawLength;
        // 闭合引号与分隔符之间允许空格
        while (text[pos] === ' ') pos++;
        rowFlags.push(true);
      } else {
        if (text.slice(pos, pos + value.length) !== value) {
          return null;
        }
        pos += value.length;
        rowFlags.push(false);
      }

      if (col < row.length - 1) {
        if (!text.startsWith(delimiter, pos)) {
          return null;
        }
        pos += delimiter.length;
      }
    }
    if (text.startsWith(linebreak, pos)) {
      pos += linebreak.length;
    }
    flags.push(rowFlags);
  }

  return flags;
}

function isBlankRow(row: string[], quoted: boolean[]): boolean {
  return row.length === 1 && row[0] === '' && !quoted[0];
}

/**
 * 将 CSV 文本解析为字符串表格，不做类型推断
 *
 * @param input - CSV 文本
 * @returns 解析后的表格，空行已移除，短行已补齐
 * @throws {CorruptInputError} 空文件、引号未闭合或数据行列数多于表头时抛出
 */
export function parseCsv(input: string): CsvTable {
  const hasBom = input.startsWith(BOM);
  const text = hasBom ? input.slice(BOM.length) : input;

  if (text.trim() === '') {
    throw new CorruptInputError('No columns to parse from file');
  }

  // 空行会干扰分隔符推断，先在跳过空行的预览上推断
  const guess = Papa.parse<string[]>(text, {
    preview: DELIMITER_PREVIEW_ROWS,
    skipEmptyLines: 'greedy',
    delimitersToGuess: DELIMITERS_TO_GUESS,
  });

  const result = Papa.parse<string[]>(text, {
    header: false,
    dynamicTyping: false,
    skipEmptyLines: false,
    delimiter: guess.meta.delimiter,
  });

  // 只有引号错误视为损坏；单列文件无法推断分隔符属于正常情况
  const quoteError = result.errors.find((error) => error.type === 'Quotes');
  if (quoteError) {
    throw new CorruptInputError(
      `Error tokenizing data: ${quoteError.message} (row ${quoteError.row})`,
      { code: quoteError.code },
    );
  }

  const { delimiter, linebreak } = result.meta;
  const detected = detectQuoting(text, result.data, delimiter, linebreak);
  const quotedAll =
    detected ?? result.data.map((row) => row.map(() => false));

  const rows: string[][] = [];
  const quoted: boolean[][] = [];
  result.data.forEach((row, index) => {
    if (!isBlankRow(row, quotedAll[index])) {
      rows.push(row);
      quoted.push(quotedAll[index]);
    }
  });

  if (rows.length === 0) {
    throw new CorruptInputError('No columns to parse from file');
  }

  const width = rows[0].length;
  rows.forEach((row, index) => {
    if (row.length > width) {
      throw new CorruptInputError(
        `Error tokenizing data: expected ${width} fields in row ${index + 1}, saw ${row.length}`,
      );
    }
    while (row.length < width) {
      row.push('');
      quoted[index].push(false);
    }
  });

  return {
    rows,
    quoted,
    delimiter,
    linebreak,
    hasBom,
    trailingLinebreak: text.endsWith(linebreak),
  };
}

/** 单元格是否含有必须转义的字符 */
function needsEscaping(cell: string, delimiter: string): boolean {
  return (
    cell.includes(delimiter) || cell.includes('"') || cell.includes('\n') || cell.includes('\r')
  );
}

/**
 * 将表格序列化为 CSV 文本，保留分隔符、换行符、BOM 与逐单元格引号
 * 原本没有引号且不含分隔符、引号与换行的单元格原样写出，首尾空格不触发引号
 *
 * @param table - 表格
 * @returns CSV 文本
 */
export function serializeCsv(table: CsvTable): string {
  const lines = table.rows.map((row, index) =>
    row
      .map((cell, column) => {
        const quoted = table.quoted[index]?.[column] ?? false;
        if (!quoted && !needsEscaping(cell, table.delimiter)) return cell;
        return Papa.unparse([[cell]], {
          delimiter: table.delimiter,
          quotes: quoted,
          newline: table.linebreak,
        });
      })
      .join(table.delimiter),
  );
  const body = lines.join(table.linebreak);
  return `${table.hasBom ? BOM : ''}${body}${table.trailingLinebreak ? table.linebreak : ''}`;
}

/**
 * CSV 替换器
 * 表头不参与替换，空单元格视为缺失值保持不变
 */
export class CsvReplacer extends BaseDocumentReplacer {
  readonly format = 'csv' as const;

  protected async transform(
    source: Buffer,
    searchText: string,
    replacementText: string,
  ): Promise<TransformOutcome> {
    const table = parseCsv(source.toString('utf8'));
    let replacements = 0;

    for (const row of table.rows.slice(1)) {
      for (let col = 0; col < row.length; col++) {
        if (row[col] === '') continue;
        const { text, count } = replaceLiteral(
          row[col],
          searchText,
          replacementText,
        );
        row[col] = text;
        replacements += count;
      }
    }

    this.logger.debug('CSV 解析完成', {
      rows: table.rows.length,
      columns: table.rows[0].length,
      delimiter: table.delimiter,
    });

    return { content: serializeCsv(table), replacements };
  }
}
