import fs from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../logging/logger.js';
import { WORKSPACE_PREFIX } from '../../domain/constants/FileConstants.js';

/**
 * 单个请求独占的临时工作目录
 */
export interface TempWorkspace {
  /** 工作目录绝对路径 */
  readonly dir: string;
  /**
   * 在工作目录内生成不冲突的文件路径 `<uuid><ext>`
   * @param extension - 保留的扩展名（含点）
   */
  allocatePath(extension: string): string;
}

/**
 * 临时工作目录管理器
 * @description 每个请求通过 run() 获得独立目录，成功或失败都会删除；
 * 进程关闭时 disposeAll() 清理仍然存活的目录
 */
export class TempWorkspaceManager {
  private readonly active = new Set<string>();

  /**
   * @param rootDir - 工作目录的父目录
   * @param logger - 日志器
   */
  constructor(
    private readonly rootDir: string,
    private readonly logger: Logger,
  ) {}

  /**
   * 当前存活的工作目录数量
   */
  get activeCount(): number {
    return this.active.size;
  }

  /**
   * 在独立工作目录中执行回调，结束后删除目录
   *
   * @param fn - 使用工作目录的回调
   * @returns 回调的返回值
   */
  async run<T>(fn: (workspace: TempWorkspace) => Promise<T>): Promise<T> {
    await fs.mkdir(this.rootDir, { recursive: true });
    const dir = await fs.mkdtemp(path.join(this.rootDir, WORKSPACE_PREFIX));
    this.active.add(dir);
    this.logger.debug('已创建临时工作目录', { dir });

    const workspace: TempWorkspace = {
      dir,
      allocatePath: (extension: string) =>
        path.join(dir, `${uuidv4()}${extension}`),
    };

    try {
      return await fn(workspace);
    } finally {
      await this.dispose(dir);
    }
  }

  /**
   * 删除所有存活的工作目录，用于进程关闭
   */
  async disposeAll(): Promise<void> {
    const dirs = [...this.active];
    await Promise.all(dirs.map((dir) => this.dispose(dir)));
    if (dirs.length > 0) {
      this.logger.info('已清理剩余临时工作目录', { count: dirs.length });
    }
  }

  /**
   * 删除单个工作目录，失败只记录 warn，不向调用方抛出
   */
  private async dispose(dir: string): Promise<void> {
    this.active.delete(dir);
    try {
      await fs.rm(dir, { recursive: true, force: true });
      this.logger.debug('已删除临时工作目录', { dir });
    } catch (error) {
      this.logger.warn('删除临时工作目录失败', {
        dir,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
