import express from 'express';
import { Server } from 'node:http';
import { Logger } from './infrastructure/logging/logger.js';
import { AppConfig } from './infrastructure/config/config.js';
import { createApiRouter, ApiServices } from './api.js';
import { createLegacyUploadRoutes } from './api/routes/index.js';
import { createErrorHandler, notFoundHandler } from './api/middleware/index.js';
import { loggingMiddleware } from './middlewares/logging.js';

/**
 * 应用程序服务
 */
export type AppServices = ApiServices;

/**
 * 创建和配置Express应用程序
 *
 * @param services - 应用程序服务实例
 * @param config - 应用程序配置
 * @param logger - 日志器实例
 * @returns 配置好的Express应用程序实例
 */
export function createApp(
  services: AppServices,
  config: Pick<AppConfig, 'upload'>,
  logger: Logger,
): express.Application {
  const app = express();
  const routeOptions = { maxUploadBytes: config.upload.maxBytes };

  app.use(loggingMiddleware(logger));

  // 配置 CORS 中间件
  app.use(
    (
      req: express.Request,
      res: express.Response,
      next: express.NextFunction,
    ) => {
      const origin = req.headers.origin;
      res.header('Access-Control-Allow-Origin', origin || '*');
      res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.header(
        'Access-Control-Allow-Headers',
        'Content-Type, Accept, Origin, X-Requested-With, X-Request-ID',
      );
      res.header(
        'Access-Control-Expose-Headers',
        'Content-Disposition, X-Replacement-Count, X-Request-ID',
      );
      res.header('Access-Control-Max-Age', '86400');

      // 处理 OPTIONS 预检请求
      if (req.method === 'OPTIONS') {
        res.sendStatus(200);
        return;
      }

      next();
    },
  );

  app.use('/api', createApiRouter(services, routeOptions));
  // 旧版页面使用的上传地址
  app.use(createLegacyUploadRoutes(services.documentReplaceService, routeOptions));

  app.use(notFoundHandler);
  app.use(createErrorHandler({ logger, maxUploadBytes: config.upload.maxBytes }));

  logger.info('Express 应用程序已配置路由和错误处理');
  return app;
}

/**
 * 启动HTTP服务器
 *
 * @param app - Express应用程序实例
 * @param config - 监听地址配置
 * @param logger - 日志器实例
 * @returns HTTP 服务器
 */
export function startServer(
  app: express.Application,
  config: Pick<AppConfig, 'api'>,
  logger: Logger,
): Server {
  const { port, host } = config.api;
  return app.listen(port, host, () => {
    logger.info(`API 服务器正在运行于 http://${host}:${port}`);
  });
}
