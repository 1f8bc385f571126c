import express from 'express';
import { IDocumentReplaceService } from './application/services/DocumentReplaceService.js';
import { Logger } from './infrastructure/logging/logger.js';
import {
  HealthProbe,
  createReplaceRoutes,
  createSystemRoutes,
} from './api/routes/index.js';

/**
 * @interface ApiServices
 * @description API 层所需的服务集合
 */
export interface ApiServices {
  documentReplaceService: IDocumentReplaceService;
  workspaces: HealthProbe;
  logger: Logger;
}

/**
 * @function createApiRouter
 * @description 创建并配置Express API路由器
 *   路由内不做 try...catch，错误交给全局错误处理中间件
 * @param services - 包含所有必要服务实例的对象
 * @param options - 路由配置
 * @param options.maxUploadBytes - 上传大小限制
 * @returns 配置好的 Express 路由实例
 */
export function createApiRouter(
  services: ApiServices,
  options: { maxUploadBytes: number },
): express.Router {
  const router = express.Router();

  router.use(createSystemRoutes(services.workspaces));
  router.use(createReplaceRoutes(services.documentReplaceService, options));

  return router;
}
