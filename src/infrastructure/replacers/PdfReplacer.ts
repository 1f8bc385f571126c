import {
  PDFArray,
  PDFDocument,
  PDFFont,
  PDFName,
  PDFObject,
  PDFPage,
  PDFRawStream,
  PDFRef,
  StandardFonts,
  rgb,
} from 'pdf-lib';
import { BaseDocumentReplacer, TransformOutcome } from './BaseDocumentReplacer.js';
import { Logger } from '../logging/logger.js';
import { FontSizeScope } from '../config/config.js';
import { PdfFontResolver } from '../pdf/PdfFontResolver.js';
import {
  RedactedMatch,
  StreamEdits,
  addStreamEdit,
  redactPage,
} from '../pdf/PdfTextRedactor.js';
import { applyContentEdits } from '../pdf/ContentStreamWriter.js';
import { unencodableCharacters } from '../pdf/standardFonts.js';
import {
  CorruptInputError,
  ValidationError,
  errorMessage,
} from '../../domain/errors/DocumentErrors.js';

/** 替换文本基线相对匹配框底边的偏移 */
const INSERT_BASELINE_OFFSET = 2.3;
const CONTENTS = PDFName.of('Contents');
/** 重新压缩时由新流对象重新生成的条目 */
const STREAM_ENCODING_KEYS = new Set([
  PDFName.of('Length'),
  PDFName.of('Filter'),
  PDFName.of('DecodeParms'),
]);

/**
 * 页面 /Contents 引用的间接对象
 */
function contentRefs(page: PDFPage): PDFRef[] {
  const entry: PDFObject | undefined = page.node.get(CONTENTS);
  const refs: PDFRef[] = [];
  const array = entry instanceof PDFRef ? page.doc.context.lookup(entry) : entry;
  if (entry instanceof PDFRef) refs.push(entry);
  if (array instanceof PDFArray) {
    for (const item of array.asArray()) {
      if (item instanceof PDFRef) refs.push(item);
    }
  }
  return refs;
}

/**
 * PDF 替换器
 *
 * 删除匹配字形并用白色矩形覆盖匹配区域，再以 Times-Roman 绘制替换文本。
 * 页面绘制的表单 XObject 同样处理。不重排文字；跨行的匹配不会被找到。
 */
export class PdfReplacer extends BaseDocumentReplacer {
  readonly format = 'pdf' as const;

  /**
   * @param logger - 日志记录器
   * @param fontSizeScope - 替换文本字号的查找范围
   */
  constructor(
    logger: Logger,
    private readonly fontSizeScope: FontSizeScope = 'match',
  ) {
    super(logger);
  }

  protected async transform(
    source: Buffer,
    searchText: string,
    replacementText: string,
  ): Promise<TransformOutcome> {
    const document = await this.load(source);
    const resolver = new PdfFontResolver();
    const pages = document.getPages();

    // 被多个页面共用的内容流不能删除
    const refCounts = new Map<PDFRef, number>();
    for (const page of pages) {
      for (const ref of contentRefs(page)) {
        refCounts.set(ref, (refCounts.get(ref) ?? 0) + 1);
      }
    }

    let font: PDFFont | null = null;
    let replacements = 0;
    // 所有页面分析完之后再改写表单，共用同一表单的页面都基于原始内容查找
    const forms = new Map<PDFRef, StreamEdits>();

    for (const [index, page] of pages.entries()) {
      const redaction = redactPage(page, searchText, resolver, this.fontSizeScope);
      if (!redaction) continue;

      if (replacementText && !font) {
        this.assertEncodable(replacementText);
        font = await document.embedFont(StandardFonts.TimesRoman);
      }

      const previous = contentRefs(page);
      const { context } = document;
      const stream = context.register(context.flateStream(redaction.content));
      page.node.set(CONTENTS, context.obj([stream]));
      for (const ref of previous) {
        if (refCounts.get(ref) === 1) context.delete(ref);
      }

      for (const [ref, { source: formSource, edits }] of redaction.forms) {
        for (const edit of edits) addStreamEdit(forms, ref, formSource, edit);
      }

      this.paint(page, redaction.matches, replacementText, font);
      replacements += redaction.matches.length;
      this.logger.debug(`第 ${index + 1} 页替换 ${redaction.matches.length} 处`, {
        fontSizes: redaction.matches.map((match) => match.fontSize),
      });
    }

    if (replacements === 0) {
      return { content: source, replacements };
    }
    this.rewriteForms(document, forms);
    return { content: await document.save(), replacements };
  }

  private async load(source: Buffer): Promise<PDFDocument> {
    let document: PDFDocument;
    try {
      document = await PDFDocument.load(source, {
        ignoreEncryption: true,
        updateMetadata: false,
      });
    } catch (error) {
      throw new CorruptInputError(`Failed to open PDF: ${errorMessage(error)}`);
    }
    if (document.isEncrypted) {
      throw new CorruptInputError('Encrypted PDF files are not supported');
    }
    return document;
  }

  /**
   * 用编辑后的内容替换表单 XObject 流，保留表单字典的其余条目
   */
  private rewriteForms(document: PDFDocument, forms: Map<PDFRef, StreamEdits>): void {
    const { context } = document;
    for (const [ref, { source, edits }] of forms) {
      const original = context.lookup(ref);
      if (!(original instanceof PDFRawStream)) continue;

      const stream = context.flateStream(applyContentEdits(source.data, edits));
      for (const [name, value] of original.dict.entries()) {
        if (!STREAM_ENCODING_KEYS.has(name)) stream.dict.set(name, value);
      }
      context.assign(ref, stream);
      this.logger.debug(`改写表单 XObject ${ref.toString()}`, { edits: edits.length });
    }
  }

  private assertEncodable(replacementText: string): void {
    const invalid = unencodableCharacters(replacementText);
    if (invalid.length > 0) {
      throw new ValidationError(
        `Replacement text contains characters that cannot be drawn with Times-Roman: ${invalid.join('')}`,
        { field: 'replacementText', characters: invalid },
      );
    }
  }

  /**
   * 先绘制全部白色矩形，再绘制替换文本，避免后面的矩形盖住前面的文字
   */
  private paint(
    page: PDFPage,
    matches: RedactedMatch[],
    replacementText: string,
    font: PDFFont | null,
  ): void {
    for (const { rect } of matches) {
      page.drawRectangle({
        x: rect.left,
        y: rect.bottom,
        width: rect.right - rect.left,
        height: rect.top - rect.bottom,
        color: rgb(1, 1, 1),
      });
    }
    if (!replacementText || !font) return;

    for (const { rect, fontSize } of matches) {
      page.drawText(replacementText, {
        x: rect.left,
        y: rect.bottom + INSERT_BASELINE_OFFSET,
        size: fontSize,
        font,
        color: rgb(0, 0, 0),
      });
    }
  }
}
