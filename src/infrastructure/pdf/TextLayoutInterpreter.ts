import { PDFArray, PDFDict, PDFName, PDFNumber, PDFRawStream, PDFRef } from 'pdf-lib';
import {
  ContentOperand,
  ContentOperation,
  numberOperand,
  parseContentStream,
} from './ContentStreamParser.js';
import { PdfFontInfo, PdfFontResolver, readStream } from './PdfFontResolver.js';
import { IDENTITY, Matrix, multiply, translate } from './matrix.js';

/**
 * 显示操作所在的内容流
 */
export interface ContentSource {
  /** 表单 XObject 的间接引用，页面内容流为 null */
  ref: PDFRef | null;
  /** 解码后的流内容 */
  data: Uint8Array;
}

/**
 * 已排版的字形，坐标为相对显示操作起点的文本空间水平偏移
 */
export interface PlacedGlyph {
  unicode: string;
  bytes: Uint8Array;
  /** 字形起点 */
  start: number;
  /** 字形墨迹终点（不含字符间距） */
  end: number;
  /** 下一字形起点 */
  next: number;
}

/**
 * 显示操作中的片段：字形或 TJ 数组中的位移调整
 */
export type ShowSegment =
  | { kind: 'glyph'; glyph: PlacedGlyph }
  | { kind: 'adjust'; value: number };

/**
 * 一条文本显示操作（Tj、TJ、'、"）的排版结果
 */
export interface TextShowOperation {
  operation: ContentOperation;
  source: ContentSource;
  /** 所在 BT…ET 文本对象的序号 */
  textObject: number;
  text: string;
  glyphs: PlacedGlyph[];
  segments: ShowSegment[];
  /** text 中每个 UTF-16 码元所属的字形下标 */
  charToGlyph: number[];
  font: PdfFontInfo;
  /** Tf 设置的字号 */
  fontSize: number;
  /** 水平缩放比例（Tz / 100） */
  horizontalScale: number;
  rise: number;
  /** 显示开始时的 Tm × CTM */
  renderMatrix: Matrix;
  /** 显示结束后的文本空间水平偏移 */
  advance: number;
  /** 用户空间中的有效字号 */
  renderedFontSize: number;
}

interface GraphicsState {
  ctm: Matrix;
  charSpacing: number;
  wordSpacing: number;
  horizontalScale: number;
  leading: number;
  font: PdfFontInfo | null;
  fontSize: number;
  rise: number;
}

const SPACE_CODE = 32;
/** 表单 XObject 的最大嵌套深度 */
const MAX_FORM_DEPTH = 12;

const FONT = PDFName.of('Font');
const XOBJECT = PDFName.of('XObject');
const SUBTYPE = PDFName.of('Subtype');
const FORM = PDFName.of('Form');
const MATRIX = PDFName.of('Matrix');
const RESOURCES = PDFName.of('Resources');

function numbers(operands: ContentOperand[], count: number): number[] | null {
  if (operands.length < count) return null;
  const values: number[] = [];
  for (const operand of operands.slice(operands.length - count)) {
    const value = numberOperand(operand);
    if (value === null) return null;
    values.push(value);
  }
  return values;
}

function toMatrix(values: number[] | null): Matrix | null {
  if (!values || values.length !== 6) return null;
  const [a, b, c, d, e, f] = values;
  return [a, b, c, d, e, f];
}

/** 表单 XObject 的 /Matrix，缺省为单位矩阵 */
function formMatrix(form: PDFRawStream): Matrix {
  const array = form.dict.lookup(MATRIX);
  if (!(array instanceof PDFArray)) return IDENTITY;
  const values: number[] = [];
  for (let i = 0; i < array.size(); i++) {
    const item = array.lookup(i);
    if (!(item instanceof PDFNumber)) return IDENTITY;
    values.push(item.asNumber());
  }
  return toMatrix(values) ?? IDENTITY;
}

/**
 * 内容流文本排版解释器
 * 跟踪图形状态与文本状态，计算每条显示操作中每个字形的位置；
 * 遇到 `Do` 时进入表单 XObject，使用其 /Resources 与 /Matrix
 */
export class TextLayoutInterpreter {
  private state: GraphicsState = {
    ctm: IDENTITY,
    charSpacing: 0,
    wordSpacing: 0,
    horizontalScale: 1,
    leading: 0,
    font: null,
    fontSize: 0,
    rise: 0,
  };
  private stack: GraphicsState[] = [];
  private textMatrix: Matrix = IDENTITY;
  private lineMatrix: Matrix = IDENTITY;
  private textObject = 0;
  private resources: PDFDict | undefined;
  /** 正在绘制的表单，防止循环引用 */
  private readonly activeForms = new Set<PDFRef>();

  /**
   * @param resources - 页面资源字典
   * @param resolver - 字体解析器
   */
  constructor(
    resources: PDFDict | undefined,
    private readonly resolver: PdfFontResolver,
  ) {
    this.resources = resources;
  }

  /**
   * 解释内容流，返回所有文本显示操作（包括表单 XObject 内的）的排版结果
   */
  run(source: ContentSource): TextShowOperation[] {
    const shows: TextShowOperation[] = [];
    this.interpret(source, shows);
    return shows;
  }

  private interpret(source: ContentSource, shows: TextShowOperation[]): void {
    for (const operation of parseContentStream(source.data)) {
      if (operation.operator === 'Do') {
        this.paintForm(operation.operands, shows);
        continue;
      }
      const show = this.execute(operation, source);
      if (show) shows.push(show);
    }
  }

  private paintForm(operands: ContentOperand[], shows: TextShowOperation[]): void {
    const name = operands[operands.length - 1];
    if (name?.kind !== 'name' || this.activeForms.size >= MAX_FORM_DEPTH) return;

    const xobjects = this.resources?.lookupMaybe(XOBJECT, PDFDict);
    const ref = xobjects?.get(PDFName.of(name.value));
    if (!xobjects || !(ref instanceof PDFRef) || this.activeForms.has(ref)) return;

    const form = xobjects.context.lookup(ref);
    if (!(form instanceof PDFRawStream) || form.dict.lookup(SUBTYPE) !== FORM) return;
    const data = readStream(form);
    if (!data) return;

    const saved = {
      state: this.state,
      stack: this.stack,
      textMatrix: this.textMatrix,
      lineMatrix: this.lineMatrix,
      resources: this.resources,
    };
    this.state = { ...this.state, ctm: multiply(formMatrix(form), this.state.ctm) };
    this.stack = [];
    this.resources = form.dict.lookupMaybe(RESOURCES, PDFDict) ?? this.resources;
    this.activeForms.add(ref);
    try {
      this.interpret({ ref, data }, shows);
    } finally {
      this.activeForms.delete(ref);
      this.state = saved.state;
      this.stack = saved.stack;
      this.textMatrix = saved.textMatrix;
      this.lineMatrix = saved.lineMatrix;
      this.resources = saved.resources;
    }
  }

  private execute(
    operation: ContentOperation,
    source: ContentSource,
  ): TextShowOperation | null {
    const { operator, operands } = operation;
    switch (operator) {
      case 'q':
        this.stack.push({ ...this.state });
        return null;
      case 'Q':
        this.state = this.stack.pop() ?? this.state;
        return null;
      case 'cm': {
        const matrix = toMatrix(numbers(operands, 6));
        if (matrix) this.state.ctm = multiply(matrix, this.state.ctm);
        return null;
      }
      case 'BT':
        this.textObject++;
        this.textMatrix = IDENTITY;
        this.lineMatrix = IDENTITY;
        return null;
      case 'Td': {
        const values = numbers(operands, 2);
        if (values) this.moveLine(values[0], values[1]);
        return null;
      }
      case 'TD': {
        const values = numbers(operands, 2);
        if (values) {
          this.state.leading = -values[1];
          this.moveLine(values[0], values[1]);
        }
        return null;
      }
      case 'Tm': {
        const matrix = toMatrix(numbers(operands, 6));
        if (matrix) {
          this.textMatrix = matrix;
          this.lineMatrix = matrix;
        }
        return null;
      }
      case 'T*':
        this.moveLine(0, -this.state.leading);
        return null;
      case 'Tc':
        this.state.charSpacing = numberOperand(operands[0]) ?? this.state.charSpacing;
        return null;
      case 'Tw':
        this.state.wordSpacing = numberOperand(operands[0]) ?? this.state.wordSpacing;
        return null;
      case 'Tz': {
        const scale = numberOperand(operands[0]);
        if (scale !== null) this.state.horizontalScale = scale / 100;
        return null;
      }
      case 'TL':
        this.state.leading = numberOperand(operands[0]) ?? this.state.leading;
        return null;
      case 'Ts':
        this.state.rise = numberOperand(operands[0]) ?? this.state.rise;
        return null;
      case 'Tf':
        this.setFont(operands);
        return null;
      case 'Tj':
        return this.show(operation, source, operands.slice(-1));
      case 'TJ': {
        const array = operands[operands.length - 1];
        return array?.kind === 'array' ? this.show(operation, source, array.items) : null;
      }
      case "'":
        this.moveLine(0, -this.state.leading);
        return this.show(operation, source, operands.slice(-1));
      case '"': {
        const values = numbers(operands.slice(0, 2), 2);
        if (values) {
          this.state.wordSpacing = values[0];
          this.state.charSpacing = values[1];
        }
        this.moveLine(0, -this.state.leading);
        return this.show(operation, source, operands.slice(-1));
      }
      default:
        return null;
    }
  }

  private moveLine(tx: number, ty: number): void {
    this.lineMatrix = multiply(translate(tx, ty), this.lineMatrix);
    this.textMatrix = this.lineMatrix;
  }

  private setFont(operands: ContentOperand[]): void {
    const [name, size] = operands;
    const fontSize = numberOperand(size);
    if (fontSize !== null) this.state.fontSize = fontSize;
    if (name?.kind !== 'name') return;

    const fonts = this.resources?.lookupMaybe(FONT, PDFDict);
    const fontDict = fonts?.lookupMaybe(PDFName.of(name.value), PDFDict);
    this.state.font = fontDict ? this.resolver.resolve(fontDict) : null;
  }

  private show(
    operation: ContentOperation,
    source: ContentSource,
    items: ContentOperand[],
  ): TextShowOperation | null {
    const { font, fontSize, charSpacing, wordSpacing, horizontalScale, rise } =
      this.state;
    const renderMatrix = multiply(this.textMatrix, this.state.ctm);
    if (!font) {
      return null;
    }

    const glyphs: PlacedGlyph[] = [];
    const segments: ShowSegment[] = [];
    const charToGlyph: number[] = [];
    let text = '';
    let offset = 0;

    for (const item of items) {
      if (item.kind === 'number') {
        offset -= (item.value / 1000) * fontSize * horizontalScale;
        segments.push({ kind: 'adjust', value: item.value });
        continue;
      }
      if (item.kind !== 'string') continue;

      for (const decoded of font.decode(item.bytes)) {
        const isSpace = font.codeLength === 1 && decoded.code === SPACE_CODE;
        const inkWidth = (decoded.width / 1000) * fontSize * horizontalScale;
        const advance =
          ((decoded.width / 1000) * fontSize + charSpacing + (isSpace ? wordSpacing : 0)) *
          horizontalScale;
        const glyph: PlacedGlyph = {
          unicode: decoded.unicode,
          bytes: decoded.bytes,
          start: offset,
          end: offset + inkWidth,
          next: offset + advance,
        };
        for (let i = 0; i < decoded.unicode.length; i++) {
          charToGlyph.push(glyphs.length);
        }
        text += decoded.unicode;
        glyphs.push(glyph);
        segments.push({ kind: 'glyph', glyph });
        offset += advance;
      }
    }

    this.textMatrix = multiply(translate(offset, 0), this.textMatrix);

    return {
      operation,
      source,
      textObject: this.textObject,
      text,
      glyphs,
      segments,
      charToGlyph,
      font,
      fontSize,
      horizontalScale,
      rise,
      renderMatrix,
      advance: offset,
      renderedFontSize: Math.abs(fontSize) * Math.hypot(renderMatrix[2], renderMatrix[3]),
    };
  }
}
