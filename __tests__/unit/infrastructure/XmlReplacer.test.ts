import fs from 'node:fs/promises';
import path from 'node:path';
import {
  XML_DECLARATION,
  XmlReplacer,
  replaceInXml,
} from '../../../src/infrastructure/replacers/XmlReplacer.js';
import { CorruptInputError } from '../../../src/domain/errors/DocumentErrors.js';
import { MockFactory, createTempDir, removeTempDir } from '../../utils/test-mocks.js';

describe('XmlReplacer', () => {
  describe('replaceInXml', () => {
    test('应该替换文本、CDATA 与属性值，保留注释', () => {
      const { xml, count } = replaceInXml(
        '<root owner="Bob">Hi Bob<!-- Bob --><![CDATA[Bob]]></root>',
        'Bob',
        'Carol',
      );

      expect(count).toBe(3);
      expect(xml).toBe(
        `${XML_DECLARATION}\n<root owner="Carol">Hi Carol<!-- Bob --><![CDATA[Carol]]></root>`,
      );
    });

    test('标签名与属性名不应该被替换', () => {
      const { xml, count } = replaceInXml('<Bob Bob="x">y</Bob>', 'Bob', 'Carol');

      expect(count).toBe(0);
      expect(xml).toBe(`${XML_DECLARATION}\n<Bob Bob="x">y</Bob>`);
    });

    test('应该用 UTF-8 声明替换源文件的声明', () => {
      const { xml } = replaceInXml(
        '<?xml version="1.0" encoding="ISO-8859-1"?>\n<a>Bob</a>',
        'Bob',
        'Carol',
      );

      expect(xml).toBe(`${XML_DECLARATION}\n<a>Carol</a>`);
    });

    test('替换结果中的特殊字符应该被转义', () => {
      const { xml } = replaceInXml('<a>Bob</a>', 'Bob', 'Tom & Jerry <3');

      expect(xml).toBe(`${XML_DECLARATION}\n<a>Tom &amp; Jerry &lt;3</a>`);
    });

    test('替换文本为空时应该删除匹配', () => {
      const { xml, count } = replaceInXml('<a>x-Bob-y</a>', 'Bob', '');

      expect(count).toBe(1);
      expect(xml).toBe(`${XML_DECLARATION}\n<a>x--y</a>`);
    });

    test.each([
      ['<root><a></root>'],
      ['not xml at all'],
      [''],
    ])('格式错误的文档 %p 应该抛出 CorruptInputError', (input) => {
      expect(() => replaceInXml(input, 'Bob', 'Carol')).toThrow(CorruptInputError);
    });
  });

  describe('replace', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await createTempDir();
    });

    afterEach(async () => {
      await removeTempDir(tempDir);
    });

    test('应该在源文件旁边写出 _modified 文件', async () => {
      const sourcePath = path.join(tempDir, 'Feed.XML');
      await fs.writeFile(sourcePath, '<feed><title>Bob</title></feed>');
      const replacer = new XmlReplacer(MockFactory.createLoggerMock());

      const result = await replacer.replace(sourcePath, 'Bob', 'Carol');

      expect(result).toEqual({
        outputPath: path.join(tempDir, 'Feed_modified.XML'),
        format: 'xml',
        replacements: 1,
      });
      expect(await fs.readFile(result.outputPath, 'utf8')).toBe(
        `${XML_DECLARATION}\n<feed><title>Carol</title></feed>`,
      );
    });

    test('解析失败时不应该留下输出文件', async () => {
      const sourcePath = path.join(tempDir, 'broken.xml');
      await fs.writeFile(sourcePath, '<feed>');
      const replacer = new XmlReplacer(MockFactory.createLoggerMock());

      await expect(replacer.replace(sourcePath, 'Bob', 'Carol')).rejects.toThrow(
        CorruptInputError,
      );
      await expect(fs.readdir(tempDir)).resolves.toEqual(['broken.xml']);
    });
  });
});
