import fs from 'node:fs/promises';
import path from 'node:path';
import {
  CsvReplacer,
  parseCsv,
  serializeCsv,
} from '../../../src/infrastructure/replacers/CsvReplacer.js';
import { CorruptInputError } from '../../../src/domain/errors/DocumentErrors.js';
import { MockFactory, createTempDir, removeTempDir } from '../../utils/test-mocks.js';

describe('CsvReplacer', () => {
  let tempDir: string;
  let replacer: CsvReplacer;

  beforeEach(async () => {
    tempDir = await createTempDir();
    replacer = new CsvReplacer(MockFactory.createLoggerMock());
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  async function replaceCsv(content: string, search: string, replacement: string) {
    const sourcePath = path.join(tempDir, 'data.csv');
    await fs.writeFile(sourcePath, content);
    const result = await replacer.replace(sourcePath, search, replacement);
    return { result, output: await fs.readFile(result.outputPath, 'utf8') };
  }

  test('应该替换数据单元格并保留原有引号', async () => {
    const { result, output } = await replaceCsv(
      'name,note\nAlice,"call Bob"\n',
      'Bob',
      'Carol',
    );

    expect(result.outputPath).toBe(path.join(tempDir, 'data_modified.csv'));
    expect(result.format).toBe('csv');
    expect(result.replacements).toBe(1);
    expect(output).toBe('name,note\nAlice,"call Carol"\n');
  });

  test('表头不应该参与替换', async () => {
    const { result, output } = await replaceCsv('Bob,x\nBob,Bob\n', 'Bob', 'Carol');

    expect(result.replacements).toBe(2);
    expect(output).toBe('Bob,x\nCarol,Carol\n');
  });

  test('空单元格应该保持为空', async () => {
    const { output } = await replaceCsv('a,b\n,Bob\n', 'Bob', 'Carol');

    expect(output).toBe('a,b\n,Carol\n');
  });

  test('应该保留分号分隔符与 CRLF 换行', async () => {
    const { output } = await replaceCsv('a;b\r\nBob;1\r\n', 'Bob', 'Carol');

    expect(output).toBe('a;b\r\nCarol;1\r\n');
  });

  test('替换后包含分隔符的值应该加引号', async () => {
    const { output } = await replaceCsv('a,b\nBob,1\n', 'Bob', 'x,y');

    expect(output).toBe('a,b\n"x,y",1\n');
  });

  test('首尾带空格的无引号单元格应该原样写出', async () => {
    const { result, output } = await replaceCsv('name, note\nAlice, call Bob\n', 'Zed', 'Carol');

    expect(result.replacements).toBe(0);
    expect(output).toBe('name, note\nAlice, call Bob\n');
  });

  test('替换后仍应保留单元格开头的空格且不加引号', async () => {
    const { output } = await replaceCsv('name, note\nAlice, call Bob\n', 'Bob', 'Carol');

    expect(output).toBe('name, note\nAlice, call Carol\n');
  });

  test('原本带引号的单元格即使不需要也应该保留引号', async () => {
    const { output } = await replaceCsv('a,b\n"Bob",1\n', 'Bob', 'Carol');

    expect(output).toBe('a,b\n"Carol",1\n');
  });

  test('没有匹配时仍然应该写出输出文件', async () => {
    const { result, output } = await replaceCsv('a,b\n1,2\n', 'Bob', 'Carol');

    expect(result.replacements).toBe(0);
    expect(output).toBe('a,b\n1,2\n');
  });

  test('空文件应该抛出 CorruptInputError', async () => {
    await expect(replaceCsv('', 'Bob', 'Carol')).rejects.toThrow(CorruptInputError);
  });

  test('引号未闭合应该抛出 CorruptInputError', async () => {
    await expect(replaceCsv('a,b\n"x,1\n', 'Bob', 'Carol')).rejects.toThrow(
      CorruptInputError,
    );
  });

  test('数据行列数多于表头应该抛出 CorruptInputError', async () => {
    await expect(replaceCsv('a,b\n1,2,3\n', 'Bob', 'Carol')).rejects.toThrow(
      'Error tokenizing data: expected 2 fields in row 2, saw 3',
    );
  });

  describe('parseCsv / serializeCsv', () => {
    test('应该移除空行并补齐短行', () => {
      const table = parseCsv('a,b,c\n\n1,2\n');

      expect(table.rows).toEqual([
        ['a', 'b', 'c'],
        ['1', '2', ''],
      ]);
      expect(serializeCsv(table)).toBe('a,b,c\n1,2,\n');
    });

    test('应该保留 BOM 与没有结尾换行的写法', () => {
      const table = parseCsv('\uFEFFa,b\n1,2');

      expect(table.hasBom).toBe(true);
      expect(table.trailingLinebreak).toBe(false);
      expect(serializeCsv(table)).toBe('\uFEFFa,b\n1,2');
    });
  });
});
