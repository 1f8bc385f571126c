import { Encodings, Font, FontNames } from '@pdf-lib/standard-fonts';

type StandardEncoding = (typeof Encodings)[keyof typeof Encodings];

const fontCache = new Map<FontNames, Font>();

/** 标准字体缺少字宽时的默认宽度 */
export const DEFAULT_GLYPH_WIDTH = 500;

export function loadStandardFont(name: FontNames): Font {
  let font = fontCache.get(name);
  if (!font) {
    font = Font.load(name);
    fontCache.set(name, font);
  }
  return font;
}

/**
 * 将任意 PDF 字体名映射到最接近的标准 14 字体
 * 处理子集前缀（ABCDEF+Name）与粗体、斜体后缀
 */
export function mapToStandardFontName(pdfFontName: string): FontNames {
  const name = pdfFontName.replace(/^[A-Z]{6}\+/, '');
  const lower = name.toLowerCase();

  if (lower.includes('symbol')) return FontNames.Symbol;
  if (lower.includes('dingbats')) return FontNames.ZapfDingbats;

  const bold = lower.includes('bold') || lower.endsWith('bd');
  const italic = lower.includes('italic') || lower.includes('oblique');

  if (lower.includes('courier') || lower.includes('mono')) {
    if (bold && italic) return FontNames.CourierBoldOblique;
    if (bold) return FontNames.CourierBold;
    if (italic) return FontNames.CourierOblique;
    return FontNames.Courier;
  }

  if (lower.includes('times') || (lower.includes('serif') && !lower.includes('sans'))) {
    if (bold && italic) return FontNames.TimesRomanBoldItalic;
    if (bold) return FontNames.TimesRomanBold;
    if (italic) return FontNames.TimesRomanItalic;
    return FontNames.TimesRoman;
  }

  // 其余（Arial 等无衬线字体）按 Helvetica 处理
  if (bold && italic) return FontNames.HelveticaBoldOblique;
  if (bold) return FontNames.HelveticaBold;
  if (italic) return FontNames.HelveticaOblique;
  return FontNames.Helvetica;
}

/**
 * 基础编码：编码 -> 字形名
 */
export interface BaseEncodingTable {
  names: Map<number, string>;
  unicode: Map<number, string>;
}

const tableCache = new Map<StandardEncoding, BaseEncodingTable>();

function buildTable(encoding: StandardEncoding): BaseEncodingTable {
  const cached = tableCache.get(encoding);
  if (cached) return cached;

  const table: BaseEncodingTable = { names: new Map(), unicode: new Map() };
  for (const codePoint of encoding.supportedCodePoints) {
    const { code, name } = encoding.encodeUnicodeCodePoint(codePoint);
    // 同一编码可能对应多个码位，保留第一个
    if (!table.names.has(code)) {
      table.names.set(code, name);
      table.unicode.set(code, String.fromCodePoint(codePoint));
    }
  }
  tableCache.set(encoding, table);
  return table;
}

/**
 * 按字体名选择基础编码：Symbol 与 ZapfDingbats 使用内置编码，其余使用 WinAnsi
 */
export function baseEncodingFor(standardName: FontNames): BaseEncodingTable {
  if (standardName === FontNames.Symbol) return buildTable(Encodings.Symbol);
  if (standardName === FontNames.ZapfDingbats) return buildTable(Encodings.ZapfDingbats);
  return buildTable(Encodings.WinAnsi);
}

let glyphNameIndex: Map<string, string> | null = null;

/**
 * 字形名转 Unicode，支持标准字形名与 uniXXXX / uXXXX 形式
 */
export function glyphNameToUnicode(glyphName: string): string | undefined {
  if (!glyphNameIndex) {
    glyphNameIndex = new Map();
    for (const encoding of [Encodings.WinAnsi, Encodings.Symbol, Encodings.ZapfDingbats]) {
      const table = buildTable(encoding);
      for (const [code, name] of table.names) {
        const text = table.unicode.get(code);
        if (text !== undefined && !glyphNameIndex.has(name)) {
          glyphNameIndex.set(name, text);
        }
      }
    }
  }

  const known = glyphNameIndex.get(glyphName);
  if (known !== undefined) return known;

  const uni = /^uni([0-9A-Fa-f]{4})+$/.exec(glyphName);
  if (uni) {
    const units = glyphName.slice(3).match(/.{4}/g) ?? [];
    return String.fromCharCode(...units.map((unit) => parseInt(unit, 16)));
  }
  const u = /^u([0-9A-Fa-f]{4,6})$/.exec(glyphName);
  if (u) {
    return String.fromCodePoint(parseInt(u[1], 16));
  }
  return undefined;
}

/**
 * Times-Roman 可编码检查，返回不可编码的字符
 */
export function unencodableCharacters(text: string): string[] {
  const invalid = new Set<string>();
  for (const char of text) {
    const codePoint = char.codePointAt(0);
    if (codePoint === undefined || !Encodings.WinAnsi.canEncodeUnicodeCodePoint(codePoint)) {
      invalid.add(char);
    }
  }
  return [...invalid];
}
