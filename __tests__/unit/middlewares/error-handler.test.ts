import express from 'express';
import multer from 'multer';
import request from 'supertest';
import { z } from 'zod';
import { createErrorHandler, notFoundHandler } from '../../../src/api/middleware/index.js';
import { AppError, ErrorCode } from '../../../src/api/contracts/index.js';
import { validate, ValidatedRequest } from '../../../src/middlewares/validate.js';
import { loggingMiddleware } from '../../../src/middlewares/logging.js';
import {
  CorruptInputError,
  OutputWriteError,
  UnsupportedFormatError,
  ValidationError,
} from '../../../src/domain/errors/DocumentErrors.js';
import { Logger } from '../../../src/infrastructure/logging/logger.js';
import { MockFactory } from '../../utils/test-mocks.js';

describe('Error Handler Middleware', () => {
  let logger: jest.Mocked<Logger>;

  beforeEach(() => {
    logger = MockFactory.createLoggerMock();
  });

  function appThrowing(error: unknown): express.Application {
    const app = express();
    app.get('/boom', async () => {
      throw error;
    });
    app.use(notFoundHandler);
    app.use(createErrorHandler({ logger, maxUploadBytes: 1024 }));
    return app;
  }

  test.each([
    [
      new ValidationError('Text to find is required', { field: 'searchText' }),
      400,
      {
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Text to find is required',
        details: { field: 'searchText' },
      },
    ],
    [
      new UnsupportedFormatError('.docx'),
      400,
      {
        code: ErrorCode.UNSUPPORTED_FILE_TYPE,
        message: 'Unsupported file type: .docx',
        details: { extension: '.docx' },
      },
    ],
    [
      new CorruptInputError('Invalid XML: unclosed tag'),
      422,
      { code: ErrorCode.CORRUPT_INPUT, message: 'Invalid XML: unclosed tag' },
    ],
    [
      new OutputWriteError('Failed to write output file: EACCES'),
      500,
      { code: ErrorCode.OUTPUT_WRITE_FAILED, message: 'Failed to write output file: EACCES' },
    ],
  ])('应该把领域错误 %p 映射为对应状态码', async (error, status, body) => {
    const res = await request(appThrowing(error)).get('/boom');

    expect(res.status).toBe(status);
    expect(res.body).toEqual({ error: body });
  });

  test('未知错误应该返回 500 INTERNAL_ERROR 并记录 error 日志', async () => {
    const res = await request(appThrowing(new TypeError('kaput'))).get('/boom');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: 'kaput',
        details: { name: 'TypeError' },
      },
    });
    expect(logger.error).toHaveBeenCalledWith(
      'Server error: INTERNAL_ERROR - kaput',
      expect.objectContaining({ statusCode: 500, path: '/boom', method: 'GET' }),
    );
  });

  test('客户端错误应该记录 warn 日志', async () => {
    await request(appThrowing(AppError.createValidationError({ field: 'x' }))).get('/boom');

    expect(logger.warn).toHaveBeenCalledWith(
      'Client error: VALIDATION_ERROR - Validation failed.',
      expect.objectContaining({ statusCode: 400 }),
    );
    expect(logger.error).not.toHaveBeenCalled();
  });

  test('文件过大的上传错误应该返回 413', async () => {
    const res = await request(appThrowing(new multer.MulterError('LIMIT_FILE_SIZE', 'file'))).get(
      '/boom',
    );

    expect(res.status).toBe(413);
    expect(res.body).toEqual({
      error: {
        code: ErrorCode.FILE_TOO_LARGE,
        message: 'File size exceeds the maximum limit.',
        details: { maxBytes: 1024 },
      },
    });
  });

  test('其他上传错误应该返回 400', async () => {
    const res = await request(
      appThrowing(new multer.MulterError('LIMIT_UNEXPECTED_FILE', 'attachment')),
    ).get('/boom');

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe(ErrorCode.VALIDATION_ERROR);
    expect(res.body.error.details).toEqual({
      multerCode: 'LIMIT_UNEXPECTED_FILE',
      field: 'attachment',
    });
  });

  test('未匹配的路由应该返回 404', async () => {
    const res = await request(appThrowing(new Error('unused'))).post('/missing');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      error: { code: ErrorCode.NOT_FOUND, message: 'Route not found: POST /missing' },
    });
  });

  test('应该优先使用请求级日志器', async () => {
    const app = express();
    app.use(loggingMiddleware(logger));
    app.get('/boom', async () => {
      throw new CorruptInputError('bad');
    });
    app.use(createErrorHandler());

    await request(app).get('/boom').set('X-Request-ID', 'trace-1');

    expect(logger.warn).toHaveBeenCalledWith(
      'Client error: CORRUPT_INPUT - bad',
      expect.objectContaining({ traceId: 'trace-1', statusCode: 422 }),
    );
  });
});

describe('validate middleware', () => {
  test('校验失败时应该返回 VALIDATION_ERROR 并列出字段', async () => {
    const app = express();
    app.use(express.json());
    app.post(
      '/items',
      validate({ body: z.object({ name: z.string().min(1), count: z.number() }) }),
      (_req, res) => {
        res.json({ ok: true });
      },
    );
    app.use(createErrorHandler({ logger: MockFactory.createLoggerMock() }));

    const res = await request(app).post('/items').send({ name: '' });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe(ErrorCode.VALIDATION_ERROR);
    expect(res.body.error.message).toBe('Validation failed for fields: name, count');
  });

  test('校验通过时应该把结果写入 req.validated', async () => {
    const app = express();
    app.use(express.json());
    const schema = z.object({ name: z.string().transform((value) => value.trim()) });
    app.post(
      '/items',
      validate({ body: schema }),
      (req: ValidatedRequest<{ name: string }>, res: express.Response) => {
        res.json(req.validated?.body ?? null);
      },
    );

    const res = await request(app).post('/items').send({ name: '  Bob  ' });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ name: 'Bob' });
  });
});
