import { PDFArray, PDFPage, PDFRef } from 'pdf-lib';
import { CorruptInputError } from '../../domain/errors/DocumentErrors.js';
import { findLiteralOccurrences } from '../../domain/services/textReplace.js';
import { FontSizeScope } from '../config/config.js';
import { numberOperand } from './ContentStreamParser.js';
import { ContentEdit, applyContentEdits, formatNumber, hexString } from './ContentStreamWriter.js';
import { PdfFontResolver, readStream } from './PdfFontResolver.js';
import {
  ContentSource,
  TextLayoutInterpreter,
  TextShowOperation,
} from './TextLayoutInterpreter.js';
import { Rect, invert, transformPoint, transformRect, unionRect } from './matrix.js';

/** 无法确定字号时使用的默认字号 */
export const DEFAULT_FONT_SIZE = 12;

/**
 * 一处已涂抹的匹配
 */
export interface RedactedMatch {
  rect: Rect;
  fontSize: number;
}

/**
 * 一个内容流上的编辑
 */
export interface StreamEdits {
  source: ContentSource;
  edits: ContentEdit[];
}

/**
 * 单页涂抹结果
 */
export interface PageRedaction {
  /** 页面内容流的新内容 */
  content: Uint8Array;
  /** 页面引用的表单 XObject 的编辑，同一显示操作只出现一次 */
  forms: Map<PDFRef, StreamEdits>;
  matches: RedactedMatch[];
}

interface GlyphRange {
  first: number;
  last: number;
}

/** 匹配落在某条显示操作中的部分 */
interface MatchPiece extends GlyphRange {
  show: number;
}

/**
 * 同一文本对象中、基线相同且首尾相接的显示操作
 */
interface TextLine {
  shows: TextShowOperation[];
  text: string;
  /** text 中每个码元对应的显示操作与其中的码元下标 */
  chars: { show: number; char: number }[];
}

const NEWLINE = Uint8Array.of(0x0a);
/** 基线偏差上限（字号的比例） */
const BASELINE_TOLERANCE = 0.05;
/** 相邻显示操作之间允许的水平间隙（字号的比例） */
const GAP_TOLERANCE = 0.25;

/**
 * 读取页面全部内容流并按顺序拼接
 *
 * @returns 页面没有内容流时返回 null
 * @throws {CorruptInputError} 内容流不是流对象时抛出
 */
export function readPageContent(page: PDFPage): Uint8Array | null {
  const contents = page.node.Contents();
  if (!contents) return null;

  const streams =
    contents instanceof PDFArray
      ? contents.asArray().map((_, i) => contents.lookup(i))
      : [contents];
  const chunks: Uint8Array[] = [];
  for (const stream of streams) {
    const bytes = readStream(stream);
    if (!bytes) {
      throw new CorruptInputError('Page content is not a readable stream');
    }
    chunks.push(bytes, NEWLINE);
  }
  return Buffer.concat(chunks);
}

/**
 * 解释页面内容（包括其中的表单 XObject），列出所有文本显示操作
 */
export function collectTextShows(
  page: PDFPage,
  resolver: PdfFontResolver,
  content: Uint8Array | null = readPageContent(page),
): TextShowOperation[] {
  if (!content) return [];
  const interpreter = new TextLayoutInterpreter(page.node.Resources(), resolver);
  return interpreter.run({ ref: null, data: content });
}

function effectiveFontSize(size: number): number {
  return Number.isFinite(size) && size > 0 ? size : DEFAULT_FONT_SIZE;
}

/**
 * 判断 next 是否紧接在 previous 之后、位于同一基线上
 */
function continuesLine(previous: TextShowOperation, next: TextShowOperation): boolean {
  if (next.source !== previous.source || next.textObject !== previous.textObject) {
    return false;
  }
  if (next.rise !== previous.rise) return false;

  const inverse = invert(previous.renderMatrix);
  if (!inverse) return false;
  const origin = transformPoint(inverse, next.renderMatrix[4], next.renderMatrix[5]);
  const size = Math.abs(previous.fontSize) || DEFAULT_FONT_SIZE;
  return (
    Math.abs(origin.y) <= BASELINE_TOLERANCE * size &&
    Math.abs(origin.x - previous.advance) <= GAP_TOLERANCE * size
  );
}

/**
 * 把显示操作按行分组
 */
function groupLines(shows: TextShowOperation[]): TextLine[] {
  const lines: TextLine[] = [];
  let current: TextLine | null = null;
  for (const show of shows) {
    const last = current?.shows[current.shows.length - 1];
    if (!current || !last || !continuesLine(last, show)) {
      current = { shows: [], text: '', chars: [] };
      lines.push(current);
    }
    const index = current.shows.length;
    current.shows.push(show);
    current.text += show.text;
    for (let char = 0; char < show.text.length; char++) {
      current.chars.push({ show: index, char });
    }
  }
  return lines;
}

/**
 * 把行文本中的一处出现拆分为各显示操作中的字形区间
 */
function matchPieces(line: TextLine, position: number, length: number): MatchPiece[] {
  const pieces: MatchPiece[] = [];
  for (let i = position; i < position + length; i++) {
    const { show, char } = line.chars[i];
    const glyph = line.shows[show].charToGlyph[char];
    const current = pieces[pieces.length - 1];
    if (current && current.show === show) {
      current.last = glyph;
    } else {
      pieces.push({ show, first: glyph, last: glyph });
    }
  }
  return pieces;
}

/**
 * 查找行内所有出现；落在同一字形上的相邻匹配合并
 */
function findLineMatches(line: TextLine, searchText: string): MatchPiece[][] {
  const matches: MatchPiece[][] = [];
  for (const position of findLiteralOccurrences(line.text, searchText)) {
    const pieces = matchPieces(line, position, searchText.length);
    const previous = matches[matches.length - 1];
    const tail = previous?.[previous.length - 1];
    if (previous && tail && tail.show === pieces[0].show && pieces[0].first <= tail.last) {
      tail.last = Math.max(tail.last, pieces[0].last);
      previous.push(...pieces.slice(1));
    } else {
      matches.push(pieces);
    }
  }
  return matches;
}

/**
 * 匹配字形的位移换算为 TJ 调整量，保证后续字形位置不变
 */
function compensation(show: TextShowOperation, range: GlyphRange): number {
  const scale = show.fontSize * show.horizontalScale;
  if (scale === 0) return 0;
  const displacement = show.glyphs[range.last].next - show.glyphs[range.first].start;
  return (-displacement * 1000) / scale;
}

function matchRect(show: TextShowOperation, range: GlyphRange): Rect {
  const { font, fontSize, rise } = show;
  return transformRect(
    show.renderMatrix,
    show.glyphs[range.first].start,
    (font.descent / 1000) * fontSize + rise,
    show.glyphs[range.last].end,
    (font.ascent / 1000) * fontSize + rise,
  );
}

/**
 * 重写显示操作：删除匹配字形，用等量的 TJ 位移代替
 */
function rewriteShow(show: TextShowOperation, ranges: GlyphRange[]): string {
  const parts: string[] = [];
  let pending: number[] = [];
  const flush = () => {
    if (pending.length > 0) {
      parts.push(hexString(pending));
      pending = [];
    }
  };

  let glyphIndex = 0;
  let rangeIndex = 0;
  for (const segment of show.segments) {
    const range = ranges[rangeIndex];
    if (segment.kind === 'adjust') {
      // 匹配内部的调整已计入补偿量
      if (!range || glyphIndex <= range.first || glyphIndex > range.last) {
        flush();
        parts.push(formatNumber(segment.value));
      }
      continue;
    }

    if (range && glyphIndex >= range.first && glyphIndex <= range.last) {
      if (glyphIndex === range.last) {
        flush();
        parts.push(formatNumber(compensation(show, range)));
        rangeIndex++;
      }
    } else {
      pending.push(...segment.glyph.bytes);
    }
    glyphIndex++;
  }
  flush();

  const { operator, operands } = show.operation;
  let prefix = '';
  if (operator === "'") {
    prefix = 'T* ';
  } else if (operator === '"') {
    const wordSpacing = numberOperand(operands[0]) ?? 0;
    const charSpacing = numberOperand(operands[1]) ?? 0;
    prefix = `${formatNumber(wordSpacing)} Tw ${formatNumber(charSpacing)} Tc T* `;
  }
  return `${prefix}[${parts.join(' ')}] TJ`;
}

/**
 * 在页面内容流及其表单 XObject 中查找并删除查找文本
 *
 * 匹配可以跨越同一行上相邻的多条显示操作；跨行的匹配不会被找到。
 * 表单 XObject 的编辑只返回，不写回，由调用方统一应用。
 *
 * @param page - 页面
 * @param searchText - 查找文本
 * @param resolver - 字体解析器
 * @param fontSizeScope - 字号查找范围
 * @returns 没有匹配时返回 null
 */
export function redactPage(
  page: PDFPage,
  searchText: string,
  resolver: PdfFontResolver,
  fontSizeScope: FontSizeScope,
): PageRedaction | null {
  const content = readPageContent(page);
  if (!content) return null;
  const shows = collectTextShows(page, resolver, content);

  const pageEdits: ContentEdit[] = [];
  const forms = new Map<PDFRef, StreamEdits>();
  const matches: RedactedMatch[] = [];
  let pageFontSize: number | null = null;

  for (const line of groupLines(shows)) {
    const lineMatches = findLineMatches(line, searchText);
    if (lineMatches.length === 0) continue;

    const rangesByShow = new Map<number, GlyphRange[]>();
    for (const pieces of lineMatches) {
      // 匹配的字号取自其第一个字形所在的显示操作
      const matchFontSize = effectiveFontSize(line.shows[pieces[0].show].renderedFontSize);
      pageFontSize ??= matchFontSize;
      const fontSize = fontSizeScope === 'page' ? pageFontSize : matchFontSize;

      let rect: Rect | null = null;
      for (const piece of pieces) {
        const pieceRect = matchRect(line.shows[piece.show], piece);
        rect = rect ? unionRect(rect, pieceRect) : pieceRect;
        const ranges = rangesByShow.get(piece.show) ?? [];
        ranges.push({ first: piece.first, last: piece.last });
        rangesByShow.set(piece.show, ranges);
      }
      if (rect) {
        matches.push({ rect, fontSize });
      }
    }

    for (const [index, ranges] of rangesByShow) {
      const show = line.shows[index];
      const edit: ContentEdit = {
        start: show.operation.start,
        end: show.operation.end,
        replacement: rewriteShow(show, ranges),
      };
      if (show.source.ref === null) {
        pageEdits.push(edit);
      } else {
        addStreamEdit(forms, show.source.ref, show.source, edit);
      }
    }
  }

  if (matches.length === 0) return null;

  return {
    content: Buffer.concat([
      Buffer.from('q\n', 'latin1'),
      applyContentEdits(content, pageEdits),
      Buffer.from('\nQ\n', 'latin1'),
    ]),
    forms,
    matches,
  };
}

/**
 * 记录表单流上的编辑；同一表单绘制多次时，相同显示操作的编辑只保留一份
 */
export function addStreamEdit(
  forms: Map<PDFRef, StreamEdits>,
  ref: PDFRef,
  source: ContentSource,
  edit: ContentEdit,
): void {
  const entry = forms.get(ref) ?? { source, edits: [] };
  if (!entry.edits.some((existing) => existing.start === edit.start)) {
    entry.edits.push(edit);
  }
  forms.set(ref, entry);
}
