import fs from 'node:fs/promises';
import path from 'node:path';
import { PDFDict, PDFDocument, PDFName, PDFRef } from 'pdf-lib';
import { PdfReplacer } from '../../../src/infrastructure/replacers/PdfReplacer.js';
import { readPageContent } from '../../../src/infrastructure/pdf/PdfTextRedactor.js';
import { readStream } from '../../../src/infrastructure/pdf/PdfFontResolver.js';
import { FontSizeScope } from '../../../src/infrastructure/config/config.js';
import {
  CorruptInputError,
  ValidationError,
} from '../../../src/domain/errors/DocumentErrors.js';
import { MockFactory, createTempDir, removeTempDir } from '../../utils/test-mocks.js';
import {
  FixtureLine,
  buildPdf,
  buildRawPdf,
  embedHelvetica,
  readTextShows,
  registerForm,
} from '../../utils/pdf-fixtures.js';

const IDENTITY_CMAP = `/CIDInit /ProcSet findresource begin
12 dict begin
begincmap
1 begincodespacerange
<0000> <FFFF>
endcodespacerange
3 beginbfchar
<0001> <0042>
<0004> <0041>
<0005> <0020>
endbfchar
1 beginbfrange
<0002> <0003> [<006F> <0062>]
endbfrange
endcmap
end
end`;

/**
 * 注册 Identity-H 编码的 Type0 字体：A 与空格宽 400，B/o/b 宽 600/500/550
 */
function registerType0Font(document: PDFDocument): PDFRef {
  const { context } = document;
  const toUnicode = context.register(context.stream(IDENTITY_CMAP));
  const descriptor = context.register(
    context.obj({
      Type: 'FontDescriptor',
      FontName: 'TestSans',
      Flags: 32,
      FontBBox: [0, -200, 1000, 800],
      ItalicAngle: 0,
      Ascent: 800,
      Descent: -200,
      CapHeight: 700,
      StemV: 80,
    }),
  );
  const cidFont = context.register(
    context.obj({
      Type: 'Font',
      Subtype: 'CIDFontType2',
      BaseFont: 'TestSans',
      DW: 1000,
      W: [1, [600, 500, 550], 4, 5, 400],
      FontDescriptor: descriptor,
    }),
  );
  return context.register(
    context.obj({
      Type: 'Font',
      Subtype: 'Type0',
      BaseFont: 'TestSans',
      Encoding: 'Identity-H',
      DescendantFonts: [cidFont],
      ToUnicode: toUnicode,
    }),
  );
}

/**
 * 注册用 /Differences 把编码 1-3 映射为 B、o、b 的简单字体
 */
function registerDifferencesFont(document: PDFDocument): PDFRef {
  const { context } = document;
  return context.register(
    context.obj({
      Type: 'Font',
      Subtype: 'Type1',
      BaseFont: 'Helvetica',
      FirstChar: 1,
      LastChar: 3,
      Widths: [500, 600, 700],
      Encoding: {
        Type: 'Encoding',
        BaseEncoding: 'WinAnsiEncoding',
        Differences: [1, 'B', 'o', 'b'],
      },
    }),
  );
}

function contentText(content: Uint8Array | null | undefined): string {
  return Buffer.from(content ?? []).toString('latin1');
}

describe('PdfReplacer', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  async function replacePdf(
    pages: FixtureLine[][],
    search: string,
    replacement: string,
    scope: FontSizeScope = 'match',
  ) {
    return replaceSource(await buildPdf(pages), search, replacement, scope);
  }

  async function replaceSource(
    source: Buffer,
    search: string,
    replacement: string,
    scope: FontSizeScope = 'match',
  ) {
    const sourcePath = path.join(tempDir, 'letter.pdf');
    await fs.writeFile(sourcePath, source);
    const replacer = new PdfReplacer(MockFactory.createLoggerMock(), scope);
    const result = await replacer.replace(sourcePath, search, replacement);
    return { source, result, output: await fs.readFile(result.outputPath) };
  }

  const hello: FixtureLine = { text: 'Hello Bob', x: 50, y: 200, size: 14 };

  test('应该删除匹配文字并在原位置绘制替换文本', async () => {
    const { result, output } = await replacePdf([[hello]], 'Bob', 'Carol');

    expect(result.outputPath).toBe(path.join(tempDir, 'letter_modified.pdf'));
    expect(result.replacements).toBe(1);

    const [shows] = await readTextShows(output);
    expect(shows.map((show) => show.text)).toEqual(['Hello ', 'Carol']);

    const carol = shows[1];
    expect(carol.font.name).toBe('Times-Roman');
    expect(carol.renderedFontSize).toBe(14);
    expect(carol.renderMatrix[4]).toBeCloseTo(85.784, 3);
    expect(carol.renderMatrix[5]).toBeCloseTo(199.402, 3);
  });

  test('应该用等量位移代替被删除的字形', async () => {
    const { output } = await replacePdf([[hello]], 'Bob', 'Carol');

    const document = await PDFDocument.load(output);
    const content = readPageContent(document.getPage(0));
    expect(content).not.toBeNull();
    expect(Buffer.from(content ?? []).toString('latin1')).toContain(
      '[<48656C6C6F20> -1779] TJ',
    );
  });

  test('同一文本片段中的多个匹配都应该被替换', async () => {
    const { result, output } = await replacePdf(
      [[{ text: 'Bob and Bob', x: 20, y: 100, size: 12 }]],
      'Bob',
      'Carol',
    );

    expect(result.replacements).toBe(2);
    const [shows] = await readTextShows(output);
    expect(shows.map((show) => show.text)).toEqual([' and ', 'Carol', 'Carol']);
  });

  test.each<[FontSizeScope, number[]]>([
    ['match', [14, 10]],
    ['page', [14, 14]],
  ])('字号范围为 %s 时替换文本字号应该为 %p', async (scope, sizes) => {
    const { output } = await replacePdf(
      [
        [
          { text: 'Bob big', x: 20, y: 200, size: 14 },
          { text: 'Bob small', x: 20, y: 100, size: 10 },
        ],
      ],
      'Bob',
      'Carol',
      scope,
    );

    const [shows] = await readTextShows(output);
    const inserted = shows.filter((show) => show.text === 'Carol');
    expect(inserted.map((show) => show.renderedFontSize)).toEqual(sizes);
  });

  test('应该处理所有页面', async () => {
    const { result, output } = await replacePdf([[hello], [hello]], 'Bob', 'Carol');

    expect(result.replacements).toBe(2);
    const pages = await readTextShows(output);
    expect(pages.map((shows) => shows.map((show) => show.text))).toEqual([
      ['Hello ', 'Carol'],
      ['Hello ', 'Carol'],
    ]);
  });

  test('替换文本为空时只删除匹配文字', async () => {
    const { result, output } = await replacePdf([[hello]], 'Bob', '');

    expect(result.replacements).toBe(1);
    const [shows] = await readTextShows(output);
    expect(shows.map((show) => show.text)).toEqual(['Hello ']);
  });

  test('没有匹配时应该原样写出源文件', async () => {
    const { source, result, output } = await replacePdf([[hello]], 'Alice', 'Carol');

    expect(result.replacements).toBe(0);
    expect(output.equals(source)).toBe(true);
  });

  test('Times-Roman 无法编码的替换文本应该抛出 ValidationError', async () => {
    await expect(replacePdf([[hello]], 'Bob', '中文')).rejects.toThrow(ValidationError);
    await expect(fs.readdir(tempDir)).resolves.toEqual(['letter.pdf']);
  });

  test('无法解析的文件应该抛出 CorruptInputError', async () => {
    const sourcePath = path.join(tempDir, 'broken.pdf');
    await fs.writeFile(sourcePath, 'this is not a pdf');
    const replacer = new PdfReplacer(MockFactory.createLoggerMock());

    await expect(replacer.replace(sourcePath, 'Bob', 'Carol')).rejects.toThrow(
      CorruptInputError,
    );
    await expect(replacer.replace(sourcePath, 'Bob', 'Carol')).rejects.toThrow(
      /^Failed to open PDF: /,
    );
  });

  describe('跨显示操作的匹配', () => {
    async function helveticaPage(content: string) {
      return buildRawPdf(async (document) => [
        { content, fonts: { F1: await embedHelvetica(document) } },
      ]);
    }

    test('同一行上分成多条显示操作的文本应该被找到', async () => {
      const source = await helveticaPage(
        'BT /F1 12 Tf 50 200 Td (Hello ) Tj (Bob) Tj ET',
      );
      const { result, output } = await replaceSource(source, 'Hello Bob', 'Carol');

      expect(result.replacements).toBe(1);
      const document = await PDFDocument.load(output);
      expect(contentText(readPageContent(document.getPage(0)))).toContain(
        'Td [-2556] TJ [-1779] TJ ET',
      );

      const [shows] = await readTextShows(output);
      expect(shows.map((show) => show.text)).toEqual(['', '', 'Carol']);
      expect(shows[2].renderMatrix[4]).toBeCloseTo(50, 3);
      expect(shows[2].renderMatrix[5]).toBeCloseTo(199.816, 3);
    });

    test('跨操作匹配时每条操作各自补偿位移，后续文字位置不变', async () => {
      const source = await helveticaPage(
        'BT /F1 12 Tf 50 200 Td (Hi B) Tj (ob there) Tj ET',
      );
      const { result, output } = await replaceSource(source, 'Bob', 'Carol');

      expect(result.replacements).toBe(1);
      const document = await PDFDocument.load(output);
      expect(contentText(readPageContent(document.getPage(0)))).toContain(
        'Td [<486920> -667] TJ [-1112 <207468657265>] TJ ET',
      );

      const [shows] = await readTextShows(output);
      expect(shows.map((show) => show.text)).toEqual(['Hi ', ' there', 'Carol']);
      const there = shows[1];
      expect(there.renderMatrix[4] + there.glyphs[0].start).toBeCloseTo(86.012, 3);
      expect(shows[2].renderMatrix[4]).toBeCloseTo(64.664, 3);
    });

    test('换行后的文本不应该与上一行拼接', async () => {
      const source = await helveticaPage(
        'BT /F1 12 Tf 50 200 Td (Hello ) Tj 0 -20 Td (Bob) Tj ET',
      );
      const { result, output } = await replaceSource(source, 'Hello Bob', 'Carol');

      expect(result.replacements).toBe(0);
      expect(output.equals(source)).toBe(true);
    });
  });

  describe('表单 XObject', () => {
    function formContent(document: PDFDocument): string {
      const xobjects = document
        .getPage(0)
        .node.Resources()
        ?.lookupMaybe(PDFName.of('XObject'), PDFDict);
      return contentText(readStream(xobjects?.lookup(PDFName.of('X1'))));
    }

    test('应该替换页面通过 Do 绘制的表单中的文本', async () => {
      const source = await buildRawPdf(async (document) => {
        const fonts = { F1: await embedHelvetica(document) };
        const form = registerForm(
          document,
          'BT /F1 12 Tf 50 200 Td (Hello Bob) Tj ET',
          fonts,
          [1, 0, 0, 1, 10, 20],
        );
        return [{ content: '/X1 Do', xobjects: { X1: form } }];
      });
      const { result, output } = await replaceSource(source, 'Bob', 'Carol');

      expect(result.replacements).toBe(1);
      const document = await PDFDocument.load(output);
      expect(formContent(document)).toBe(
        'BT /F1 12 Tf 50 200 Td [<48656C6C6F20> -1779] TJ ET',
      );

      const [shows] = await readTextShows(output);
      expect(shows.map((show) => show.text)).toEqual(['Hello ', 'Carol']);
      expect(shows[0].renderMatrix[4]).toBeCloseTo(60, 3);
      expect(shows[1].renderMatrix[4]).toBeCloseTo(90.672, 3);
      expect(shows[1].renderMatrix[5]).toBeCloseTo(219.816, 3);
    });

    test('多个页面共用的表单应该在每一页都完成替换', async () => {
      const source = await buildRawPdf(async (document) => {
        const fonts = { F1: await embedHelvetica(document) };
        const form = registerForm(document, 'BT /F1 12 Tf 50 200 Td (Hello Bob) Tj ET', fonts);
        return [
          { content: '/X1 Do', xobjects: { X1: form } },
          { content: '/X1 Do', xobjects: { X1: form } },
        ];
      });
      const { result, output } = await replaceSource(source, 'Bob', 'Carol');

      expect(result.replacements).toBe(2);
      const pages = await readTextShows(output);
      expect(pages.map((shows) => shows.map((show) => show.text))).toEqual([
        ['Hello ', 'Carol'],
        ['Hello ', 'Carol'],
      ]);
    });
  });

  describe('字体编码', () => {
    test('应该通过 ToUnicode 与 /W 字宽处理 Identity-H 组合字体', async () => {
      const source = await buildRawPdf((document) => [
        {
          content: 'BT /F2 10 Tf 20 100 Td <0004000500010002000300050004> Tj ET',
          fonts: { F2: registerType0Font(document) },
        },
      ]);
      const { result, output } = await replaceSource(source, 'Bob', 'Carol');

      expect(result.replacements).toBe(1);
      const document = await PDFDocument.load(output);
      expect(contentText(readPageContent(document.getPage(0)))).toContain(
        'Td [<00040005> -1650 <00050004>] TJ ET',
      );

      const [shows] = await readTextShows(output);
      expect(shows.map((show) => show.text)).toEqual(['A  A', 'Carol']);
      const remaining = shows[0];
      expect(remaining.renderMatrix[4] + remaining.glyphs[2].start).toBeCloseTo(44.5, 3);
      expect(shows[1].renderMatrix[4]).toBeCloseTo(28, 3);
      expect(shows[1].renderMatrix[5]).toBeCloseTo(100.3, 3);
      expect(shows[1].renderedFontSize).toBe(10);
    });

    test('应该按 /Differences 解码简单字体的自定义编码', async () => {
      const source = await buildRawPdf((document) => [
        {
          content: 'BT /F3 10 Tf 30 150 Td <48692001020321> Tj ET',
          fonts: { F3: registerDifferencesFont(document) },
        },
      ]);
      const { result, output } = await replaceSource(source, 'Bob', 'Carol');

      expect(result.replacements).toBe(1);
      const document = await PDFDocument.load(output);
      expect(contentText(readPageContent(document.getPage(0)))).toContain(
        'Td [<486920> -1800 <21>] TJ ET',
      );

      const [shows] = await readTextShows(output);
      expect(shows.map((show) => show.text)).toEqual(['Hi !', 'Carol']);
      const remaining = shows[0];
      expect(remaining.renderMatrix[4] + remaining.glyphs[3].start).toBeCloseTo(60.22, 3);
      expect(shows[1].renderMatrix[4]).toBeCloseTo(42.22, 3);
      expect(shows[1].renderMatrix[5]).toBeCloseTo(150.23, 3);
    });
  });
});
