import express from 'express';
import { DOCUMENT_FORMATS } from '../../domain/formats.js';
import { FormatsResponse, HealthResponse } from '../contracts/index.js';

/**
 * 健康检查所需的运行状态
 */
export interface HealthProbe {
  /** 当前存活的临时工作目录数量 */
  readonly activeCount: number;
}

/**
 * 创建系统路由：健康检查与支持格式列表
 *
 * @param probe - 运行状态
 * @returns 配置好的 Express 路由实例
 */
export function createSystemRoutes(probe: HealthProbe): express.Router {
  const router = express.Router();

  /**
   * @api {get} /health 健康检查
   * @apiGroup System
   * @apiSuccessExample {json} Success-Response:
   *     HTTP/1.1 200 OK
   *     { "status": "ok", "uptime": 12.5, "activeWorkspaces": 0 }
   */
  router.get('/health', (_req, res) => {
    const body: HealthResponse = {
      status: 'ok',
      uptime: process.uptime(),
      activeWorkspaces: probe.activeCount,
    };
    res.json(body);
  });

  /**
   * @api {get} /formats 支持的文档格式
   * @apiGroup System
   */
  router.get('/formats', (_req, res) => {
    const body: FormatsResponse = { formats: [...DOCUMENT_FORMATS] };
    res.json(body);
  });

  return router;
}
