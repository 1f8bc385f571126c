import { createLogger, Logger } from './infrastructure/logging/logger.js';
import { validateConfig, AppConfig } from './infrastructure/config/config.js';
import { createApp, startServer } from './app.js';
import { createReplacerRegistry } from './infrastructure/replacers/index.js';
import { TempWorkspaceManager } from './infrastructure/storage/TempWorkspaceManager.js';
import { DocumentReplaceService } from './application/services/DocumentReplaceService.js';
import { setupGracefulShutdown } from './infrastructure/lifecycle/shutdown.js';
import { errorMessage } from './domain/errors/DocumentErrors.js';

/**
 * 应用程序主入口点
 *
 * @description 负责加载配置、创建日志器与服务、启动 Express 应用程序并设置优雅关闭
 */
async function main(): Promise<void> {
  try {
    // 1. 加载并校验应用程序配置
    const config: AppConfig = validateConfig();

    // 2. 创建日志器实例
    const logger: Logger = createLogger(config);
    logger.info('应用程序启动', {
      nodeVersion: process.version,
      platform: process.platform,
      production: config.env.production,
    });

    // 3. 初始化服务
    const workspaces = new TempWorkspaceManager(config.storage.tempDir, logger);
    const replacers = createReplacerRegistry(logger, config);
    const documentReplaceService = new DocumentReplaceService(
      replacers,
      workspaces,
      logger,
    );

    // 4. 创建并启动 Express 应用程序
    const app = createApp(
      { documentReplaceService, workspaces, logger },
      config,
      logger,
    );
    const server = startServer(app, config, logger);

    // 5. 设置优雅关闭处理
    setupGracefulShutdown(server, workspaces, logger);
  } catch (error) {
    // 在应用启动时发生致命错误，使用默认配置的 logger 记录
    const fallbackLogger = createLogger({ log: { level: 'error' } });
    fallbackLogger.error(`应用启动期间发生致命错误: ${errorMessage(error)}`, error);
    process.exit(1);
  }
}

// 启动应用程序
void main();
