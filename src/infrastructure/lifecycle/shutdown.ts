import { Server } from 'node:http';
import { Logger } from '../logging/logger.js';
import { errorMessage } from '../../domain/errors/DocumentErrors.js';

/**
 * 可关闭的服务器
 */
export interface ClosableServer {
  close(callback: (error?: Error) => void): unknown;
}

/**
 * 关闭时需要清理的临时目录
 */
export interface DisposableWorkspaces {
  disposeAll(): Promise<void>;
}

/**
 * 创建关闭处理函数：停止接收请求、清理临时工作目录后退出
 *
 * @param server - HTTP 服务器
 * @param workspaces - 临时工作目录管理器
 * @param logger - 日志器实例
 * @param exit - 退出函数
 * @returns 关闭处理函数
 */
export function createShutdownHandler(
  server: ClosableServer,
  workspaces: DisposableWorkspaces,
  logger: Logger,
  exit: (code: number) => void = (code) => process.exit(code),
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  return async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`收到 ${signal}，正在优雅关闭应用...`);

    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });

    try {
      await workspaces.disposeAll();
    } catch (error) {
      logger.error('关闭时清理临时工作目录失败', { error: errorMessage(error) });
      exit(1);
      return;
    }

    logger.info('应用已优雅关闭');
    exit(0);
  };
}

/**
 * 设置优雅关闭处理
 *
 * @param server - HTTP 服务器
 * @param workspaces - 临时工作目录管理器
 * @param logger - 日志器实例
 * @returns 关闭处理函数
 */
export function setupGracefulShutdown(
  server: Server,
  workspaces: DisposableWorkspaces,
  logger: Logger,
): (signal: string) => Promise<void> {
  const gracefulShutdown = createShutdownHandler(server, workspaces, logger);
  const onSignal = (signal: NodeJS.Signals) => {
    gracefulShutdown(signal).catch((error: unknown) => {
      logger.error('优雅关闭失败', { error: errorMessage(error) });
      process.exit(1);
    });
  };

  // 监听关闭信号
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  return gracefulShutdown;
}
