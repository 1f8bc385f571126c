import express from 'express';
import multer from 'multer';
import { IDocumentReplaceService } from '../../application/services/DocumentReplaceService.js';
import { validate, ValidatedRequest } from '../../middlewares/validate.js';
import { LoggedRequest } from '../../middlewares/logging.js';
import { AppError, ReplaceForm, ReplaceFormSchema } from '../contracts/index.js';

/** 替换次数响应头 */
export const REPLACEMENT_COUNT_HEADER = 'X-Replacement-Count';

/** 文件字段名，`pdf_file` 为旧版页面使用的字段 */
const FILE_FIELDS = ['file', 'pdf_file'] as const;

type UploadedFiles = Express.Multer.File[] | Record<string, Express.Multer.File[]>;

function pickUploadedFile(files: UploadedFiles | undefined): Express.Multer.File | undefined {
  if (!files) return undefined;
  if (Array.isArray(files)) return files[0];
  for (const field of FILE_FIELDS) {
    const file = files[field]?.[0];
    if (file) return file;
  }
  return undefined;
}

/**
 * 替换接口的中间件链：上传、表单校验、调用服务并返回附件
 *
 * @param documentReplaceService - 文档替换服务
 * @param options - 上传配置
 * @param options.maxUploadBytes - 单个文件的大小限制
 */
function createReplaceHandlers(
  documentReplaceService: IDocumentReplaceService,
  options: { maxUploadBytes: number },
): express.RequestHandler[] {
  // 文件只保存在内存中，落盘由服务在临时工作目录中完成
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: options.maxUploadBytes,
      files: 1,
    },
  });

  const handler = async (
    req: ValidatedRequest<ReplaceForm> & LoggedRequest,
    res: express.Response,
  ): Promise<void> => {
    const file = pickUploadedFile(req.files);
    if (!file) {
      throw AppError.createValidationError({ field: 'file' }, 'No file uploaded');
    }
    const form = req.validated?.body ?? { searchText: '', replacementText: '' };

    const result = await documentReplaceService.replaceUpload(
      { originalName: file.originalname, buffer: file.buffer },
      form.searchText,
      form.replacementText,
      req.logger,
    );

    res.setHeader(REPLACEMENT_COUNT_HEADER, String(result.replacements));
    res.attachment(result.fileName);
    res.type('application/octet-stream');
    res.send(result.content);
  };

  return [
    upload.fields(FILE_FIELDS.map((name) => ({ name, maxCount: 1 }))),
    validate({ body: ReplaceFormSchema }),
    handler,
  ];
}

/**
 * 创建替换相关的API路由
 *
 * @param documentReplaceService - 文档替换服务
 * @param options - 上传配置
 * @param options.maxUploadBytes - 单个文件的大小限制
 * @returns 配置好的 Express 路由实例
 */
export function createReplaceRoutes(
  documentReplaceService: IDocumentReplaceService,
  options: { maxUploadBytes: number },
): express.Router {
  const router = express.Router();

  /**
   * @api {post} /replace 替换文档中的文本
   * @apiGroup Replace
   * @apiDescription 上传文档（multipart/form-data），返回替换后的文件附件
   * @apiParam (FormData) {File} file - 文档文件（pdf、csv、xml、xpt），旧字段名 pdf_file
   * @apiParam (FormData) {string} search - 要查找的文本，旧字段名 old_text
   * @apiParam (FormData) {string} [replacement] - 替换文本，旧字段名 new_text
   * @apiSuccess {File} - 名为 modified_<原文件名> 的附件，X-Replacement-Count 为替换次数
   */
  router.post('/replace', ...createReplaceHandlers(documentReplaceService, options));

  return router;
}

/**
 * 创建旧版上传路由 `POST /upload`，行为与 `/api/replace` 相同
 */
export function createLegacyUploadRoutes(
  documentReplaceService: IDocumentReplaceService,
  options: { maxUploadBytes: number },
): express.Router {
  const router = express.Router();
  router.post('/upload', ...createReplaceHandlers(documentReplaceService, options));
  return router;
}
