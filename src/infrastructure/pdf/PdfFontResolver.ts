import {
  PDFArray,
  PDFDict,
  PDFName,
  PDFNumber,
  PDFObject,
  PDFRawStream,
  decodePDFRawStream,
} from 'pdf-lib';
import { FontNames } from '@pdf-lib/standard-fonts';
import { ToUnicodeCMap } from './ToUnicodeCMap.js';
import {
  BaseEncodingTable,
  DEFAULT_GLYPH_WIDTH,
  baseEncodingFor,
  glyphNameToUnicode,
  loadStandardFont,
  mapToStandardFontName,
} from './standardFonts.js';

/**
 * 解码后的字形
 */
export interface DecodedGlyph {
  code: number;
  bytes: Uint8Array;
  unicode: string;
  /** 字形空间宽度（1/1000 em） */
  width: number;
}

/**
 * 页面字体的度量与解码信息
 */
export interface PdfFontInfo {
  name: string;
  /** 每个编码的字节数 */
  codeLength: number;
  /** 上升高度（1/1000 em） */
  ascent: number;
  /** 下降高度（1/1000 em，负数） */
  descent: number;
  decode(bytes: Uint8Array): DecodedGlyph[];
}

const FALLBACK_ASCENT = 800;
const FALLBACK_DESCENT = -200;
const DEFAULT_CID_WIDTH = 1000;
const REPLACEMENT_CHARACTER = '\uFFFD';

const key = (name: string) => PDFName.of(name);

function numberValue(object: PDFObject | undefined): number | undefined {
  return object instanceof PDFNumber ? object.asNumber() : undefined;
}

function nameValue(object: PDFObject | undefined): string | undefined {
  return object instanceof PDFName ? object.decodeText() : undefined;
}

/**
 * 读取流对象的解码内容
 */
export function readStream(object: PDFObject | undefined): Uint8Array | undefined {
  return object instanceof PDFRawStream ? decodePDFRawStream(object).decode() : undefined;
}

function readToUnicode(fontDict: PDFDict): ToUnicodeCMap | undefined {
  const bytes = readStream(fontDict.lookup(key('ToUnicode')));
  return bytes ? ToUnicodeCMap.parse(Buffer.from(bytes).toString('latin1')) : undefined;
}

function readDescriptorMetrics(
  descriptor: PDFDict | undefined,
  standardName: FontNames,
): { ascent: number; descent: number } {
  const ascent = numberValue(descriptor?.lookup(key('Ascent')));
  const descent = numberValue(descriptor?.lookup(key('Descent')));
  if (ascent !== undefined && descent !== undefined && ascent !== descent) {
    return { ascent, descent };
  }
  const standard = loadStandardFont(standardName);
  return {
    ascent: typeof standard.Ascender === 'number' ? standard.Ascender : FALLBACK_ASCENT,
    descent: typeof standard.Descender === 'number' ? standard.Descender : FALLBACK_DESCENT,
  };
}

/**
 * 合并基础编码与 /Differences，得到编码到字形名的映射
 */
function resolveEncoding(
  fontDict: PDFDict,
  base: BaseEncodingTable,
): { names: Map<number, string>; unicode: Map<number, string> } {
  const names = new Map(base.names);
  const unicode = new Map(base.unicode);

  const encoding = fontDict.lookup(key('Encoding'));
  const differences =
    encoding instanceof PDFDict ? encoding.lookup(key('Differences')) : undefined;
  if (differences instanceof PDFArray) {
    let code = 0;
    for (let i = 0; i < differences.size(); i++) {
      const item = differences.lookup(i);
      const start = numberValue(item);
      if (start !== undefined) {
        code = start;
        continue;
      }
      const glyphName = nameValue(item);
      if (glyphName !== undefined) {
        names.set(code, glyphName);
        const text = glyphNameToUnicode(glyphName);
        if (text !== undefined) {
          unicode.set(code, text);
        } else {
          unicode.delete(code);
        }
        code++;
      }
    }
  }
  return { names, unicode };
}

/**
 * 简单字体（Type1、TrueType、Type3）：单字节编码
 */
function simpleFont(fontDict: PDFDict, baseFont: string): PdfFontInfo {
  const standardName = mapToStandardFontName(baseFont);
  const standard = loadStandardFont(standardName);
  const toUnicode = readToUnicode(fontDict);
  const encoding = resolveEncoding(fontDict, baseEncodingFor(standardName));
  const descriptor = fontDict.lookupMaybe(key('FontDescriptor'), PDFDict);

  const firstChar = numberValue(fontDict.lookup(key('FirstChar'))) ?? 0;
  const widthsArray = fontDict.lookup(key('Widths'));
  const widths =
    widthsArray instanceof PDFArray
      ? widthsArray.asArray().map((_, i) => numberValue(widthsArray.lookup(i)) ?? 0)
      : undefined;
  const missingWidth = numberValue(descriptor?.lookup(key('MissingWidth')));

  // Type3 字宽位于字形空间，需要按 FontMatrix 换算
  let widthScale = 1;
  if (nameValue(fontDict.lookup(key('Subtype'))) === 'Type3') {
    const matrix = fontDict.lookup(key('FontMatrix'));
    const scale = matrix instanceof PDFArray ? numberValue(matrix.lookup(0)) : undefined;
    widthScale = scale !== undefined ? scale * 1000 : 1;
  }

  const widthOf = (code: number): number => {
    const index = code - firstChar;
    if (widths && index >= 0 && index < widths.length) {
      return widths[index] * widthScale;
    }
    if (missingWidth !== undefined) {
      return missingWidth;
    }
    const glyphName = encoding.names.get(code);
    const standardWidth = glyphName ? standard.getWidthOfGlyph(glyphName) : undefined;
    return typeof standardWidth === 'number' ? standardWidth : DEFAULT_GLYPH_WIDTH;
  };

  return {
    name: baseFont,
    codeLength: 1,
    ...readDescriptorMetrics(descriptor, standardName),
    decode(bytes) {
      return Array.from(bytes, (code, i) => ({
        code,
        bytes: bytes.subarray(i, i + 1),
        unicode:
          toUnicode?.lookup(code) ??
          encoding.unicode.get(code) ??
          String.fromCharCode(code),
        width: widthOf(code),
      }));
    },
  };
}

/**
 * 解析 CID 字体的 /W 数组
 */
function readCidWidths(widths: PDFObject | undefined): Map<number, number> {
  const map = new Map<number, number>();
  if (!(widths instanceof PDFArray)) return map;

  let i = 0;
  while (i < widths.size()) {
    const first = numberValue(widths.lookup(i));
    const next = widths.lookup(i + 1);
    if (first === undefined) break;

    if (next instanceof PDFArray) {
      // c [w1 w2 ...]
      for (let j = 0; j < next.size(); j++) {
        const width = numberValue(next.lookup(j));
        if (width !== undefined) map.set(first + j, width);
      }
      i += 2;
    } else {
      // cFirst cLast w
      const last = numberValue(next);
      const width = numberValue(widths.lookup(i + 2));
      if (last === undefined || width === undefined) break;
      for (let cid = first; cid <= last; cid++) map.set(cid, width);
      i += 3;
    }
  }
  return map;
}

/**
 * 组合字体（Type0）：按 ToUnicode 的编码长度分组，默认双字节 Identity 编码
 */
function compositeFont(fontDict: PDFDict, baseFont: string): PdfFontInfo {
  const descendants = fontDict.lookup(key('DescendantFonts'));
  const descendant =
    descendants instanceof PDFArray ? descendants.lookup(0) : undefined;
  const cidFont = descendant instanceof PDFDict ? descendant : undefined;

  const toUnicode = readToUnicode(fontDict);
  const codeLength = toUnicode?.codeLength ?? 2;
  const defaultWidth = numberValue(cidFont?.lookup(key('DW'))) ?? DEFAULT_CID_WIDTH;
  const widths = readCidWidths(cidFont?.lookup(key('W')));
  const descriptor = cidFont?.lookupMaybe(key('FontDescriptor'), PDFDict);

  return {
    name: baseFont,
    codeLength,
    ...readDescriptorMetrics(descriptor, mapToStandardFontName(baseFont)),
    decode(bytes) {
      const glyphs: DecodedGlyph[] = [];
      for (let i = 0; i < bytes.length; i += codeLength) {
        const codeBytes = bytes.subarray(i, i + codeLength);
        const code = codeBytes.reduce((value, byte) => value * 256 + byte, 0);
        glyphs.push({
          code,
          bytes: codeBytes,
          unicode: toUnicode?.lookup(code) ?? REPLACEMENT_CHARACTER,
          width: widths.get(code) ?? defaultWidth,
        });
      }
      return glyphs;
    },
  };
}

/**
 * 字体解析器，按字体字典缓存解析结果
 */
export class PdfFontResolver {
  private readonly cache = new Map<PDFDict, PdfFontInfo>();

  resolve(fontDict: PDFDict): PdfFontInfo {
    const cached = this.cache.get(fontDict);
    if (cached) return cached;

    const baseFont = nameValue(fontDict.lookup(key('BaseFont'))) ?? 'Helvetica';
    const subtype = nameValue(fontDict.lookup(key('Subtype')));
    const info =
      subtype === 'Type0'
        ? compositeFont(fontDict, baseFont)
        : simpleFont(fontDict, baseFont);

    this.cache.set(fontDict, info);
    return info;
  }
}
