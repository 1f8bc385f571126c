/**
 * 文档替换API测试
 * 覆盖 POST /api/replace、旧版 POST /upload 与系统端点
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import express from 'express';
import request from 'supertest';
import { createApp } from '../../../src/app.js';
import { DocumentReplaceService } from '../../../src/application/services/DocumentReplaceService.js';
import { TempWorkspaceManager } from '../../../src/infrastructure/storage/TempWorkspaceManager.js';
import { createReplacerRegistry } from '../../../src/infrastructure/replacers/index.js';
import {
  ErrorCode,
  ErrorResponseSchema,
  FormatsResponseSchema,
  HealthResponseSchema,
} from '../../../src/api/contracts/index.js';
import { MockFactory, createTempDir, removeTempDir } from '../../utils/test-mocks.js';
import { buildPdf, readTextShows } from '../../utils/pdf-fixtures.js';

describe('Document Replace API', () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await createTempDir('replacer-api-');
  });

  afterEach(async () => {
    await removeTempDir(rootDir);
  });

  function createTestApp(maxBytes = 1024 * 1024): express.Application {
    const logger = MockFactory.createLoggerMock();
    const workspaces = new TempWorkspaceManager(rootDir, logger);
    const documentReplaceService = new DocumentReplaceService(
      createReplacerRegistry(logger, {
        replace: { pdfFontSizeScope: 'match', xptEncoding: 'utf8' },
      }),
      workspaces,
      logger,
    );
    return createApp(
      { documentReplaceService, workspaces, logger },
      { upload: { maxBytes } },
      logger,
    );
  }

  const csv = Buffer.from('name,note\nAlice,"call Bob"\n');

  describe('POST /api/replace', () => {
    test('应该返回替换后的附件与替换次数', async () => {
      const res = await request(createTestApp())
        .post('/api/replace')
        .field('search', 'Bob')
        .field('replacement', 'Carol')
        .attach('file', csv, 'data.csv')
        .responseType('blob');

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('application/octet-stream');
      expect(res.headers['content-disposition']).toBe(
        'attachment; filename="modified_data.csv"',
      );
      expect(res.headers['x-replacement-count']).toBe('1');
      expect(Buffer.from(res.body).toString('utf8')).toBe(
        'name,note\nAlice,"call Carol"\n',
      );
      await expect(fs.readdir(rootDir)).resolves.toEqual([]);
    });

    test('应该去掉查找文本与替换文本两端的空白', async () => {
      const res = await request(createTestApp())
        .post('/api/replace')
        .field('search', '  Bob ')
        .field('replacement', ' Carol  ')
        .attach('file', Buffer.from('<a>Bob</a>'), 'feed.xml')
        .responseType('blob');

      expect(res.status).toBe(200);
      expect(Buffer.from(res.body).toString('utf8')).toBe(
        '<?xml version="1.0" encoding="UTF-8"?>\n<a>Carol</a>',
      );
    });

    test('应该替换 PDF 中的文字', async () => {
      const pdf = await buildPdf([[{ text: 'Hello Bob', x: 50, y: 200, size: 14 }]]);

      const res = await request(createTestApp())
        .post('/api/replace')
        .field('search', 'Bob')
        .field('replacement', 'Carol')
        .attach('file', pdf, 'letter.pdf')
        .responseType('blob');

      expect(res.status).toBe(200);
      expect(res.headers['x-replacement-count']).toBe('1');
      const [shows] = await readTextShows(Buffer.from(res.body));
      expect(shows.map((show) => show.text)).toEqual(['Hello ', 'Carol']);
    });

    test('缺少文件时应该返回 400', async () => {
      const res = await request(createTestApp())
        .post('/api/replace')
        .field('search', 'Bob');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: {
          code: ErrorCode.VALIDATION_ERROR,
          message: 'No file uploaded',
          details: { field: 'file' },
        },
      });
    });

    test('缺少查找文本时应该返回 400', async () => {
      const res = await request(createTestApp())
        .post('/api/replace')
        .attach('file', csv, 'data.csv');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: {
          code: ErrorCode.VALIDATION_ERROR,
          message: 'Text to find is required',
          details: { field: 'searchText' },
        },
      });
    });

    test('不支持的文件类型应该返回 400 且不写入任何文件', async () => {
      const res = await request(createTestApp())
        .post('/api/replace')
        .field('search', 'Bob')
        .attach('file', Buffer.from('PK'), 'report.docx');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: {
          code: ErrorCode.UNSUPPORTED_FILE_TYPE,
          message: 'Unsupported file type: .docx',
          details: { extension: '.docx' },
        },
      });
      await expect(fs.readdir(rootDir)).resolves.toEqual([]);
    });

    test('损坏的文件应该返回 422', async () => {
      const res = await request(createTestApp())
        .post('/api/replace')
        .field('search', 'Bob')
        .attach('file', Buffer.from('<feed>'), 'feed.xml');

      expect(res.status).toBe(422);
      const body = ErrorResponseSchema.parse(res.body);
      expect(body.error.code).toBe(ErrorCode.CORRUPT_INPUT);
      await expect(fs.readdir(rootDir)).resolves.toEqual([]);
    });

    test('超过大小限制的文件应该返回 413', async () => {
      const res = await request(createTestApp(64))
        .post('/api/replace')
        .field('search', 'Bob')
        .attach('file', Buffer.alloc(256, 0x61), 'big.csv');

      expect(res.status).toBe(413);
      expect(res.body).toEqual({
        error: {
          code: ErrorCode.FILE_TOO_LARGE,
          message: 'File size exceeds the maximum limit.',
          details: { maxBytes: 64 },
        },
      });
    });

    test('应该回显请求中的 X-Request-ID', async () => {
      const res = await request(createTestApp())
        .post('/api/replace')
        .set('X-Request-ID', 'trace-42')
        .field('search', 'Bob');

      expect(res.headers['x-request-id']).toBe('trace-42');
    });
  });

  describe('POST /upload', () => {
    test('应该接受旧版字段名', async () => {
      const res = await request(createTestApp())
        .post('/upload')
        .field('old_text', 'Bob')
        .field('new_text', 'Carol')
        .attach('pdf_file', csv, 'data.csv')
        .responseType('blob');

      expect(res.status).toBe(200);
      expect(res.headers['content-disposition']).toBe(
        'attachment; filename="modified_data.csv"',
      );
      expect(Buffer.from(res.body).toString('utf8')).toBe(
        'name,note\nAlice,"call Carol"\n',
      );
    });
  });

  describe('系统端点', () => {
    test('GET /api/health 应该返回运行状态', async () => {
      const res = await request(createTestApp()).get('/api/health');

      expect(res.status).toBe(200);
      const body = HealthResponseSchema.parse(res.body);
      expect(body.status).toBe('ok');
      expect(body.activeWorkspaces).toBe(0);
    });

    test('GET /api/formats 应该列出支持的格式', async () => {
      const res = await request(createTestApp()).get('/api/formats');

      expect(res.status).toBe(200);
      const body = FormatsResponseSchema.parse(res.body);
      expect(body.formats.map((entry) => entry.format)).toEqual([
        'pdf',
        'csv',
        'xml',
        'xpt',
      ]);
    });

    test('OPTIONS 预检请求应该返回 200 与 CORS 头', async () => {
      const res = await request(createTestApp())
        .options('/api/replace')
        .set('Origin', 'http://localhost:3000');

      expect(res.status).toBe(200);
      expect(res.headers['access-control-allow-origin']).toBe('http://localhost:3000');
      expect(res.headers['access-control-expose-headers']).toBe(
        'Content-Disposition, X-Replacement-Count, X-Request-ID',
      );
    });

    test('未知路由应该返回 404', async () => {
      const res = await request(createTestApp()).get('/api/unknown');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({
        error: { code: ErrorCode.NOT_FOUND, message: 'Route not found: GET /api/unknown' },
      });
    });
  });
});
