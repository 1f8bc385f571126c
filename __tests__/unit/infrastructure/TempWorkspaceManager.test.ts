import fs from 'node:fs/promises';
import path from 'node:path';
import { TempWorkspaceManager } from '../../../src/infrastructure/storage/TempWorkspaceManager.js';
import { MockFactory, createTempDir, removeTempDir } from '../../utils/test-mocks.js';

describe('TempWorkspaceManager', () => {
  let rootDir: string;
  let manager: TempWorkspaceManager;

  beforeEach(async () => {
    rootDir = await createTempDir();
    manager = new TempWorkspaceManager(rootDir, MockFactory.createLoggerMock());
  });

  afterEach(async () => {
    await removeTempDir(rootDir);
  });

  test('应该在回调期间提供独立目录并在结束后删除', async () => {
    let seenDir = '';
    let allocated = '';

    const value = await manager.run(async (workspace) => {
      seenDir = workspace.dir;
      allocated = workspace.allocatePath('.csv');
      expect(manager.activeCount).toBe(1);
      await expect(fs.stat(workspace.dir)).resolves.toBeDefined();
      return 42;
    });

    expect(value).toBe(42);
    expect(path.dirname(seenDir)).toBe(rootDir);
    expect(path.basename(seenDir).startsWith('docreplace-')).toBe(true);
    expect(path.dirname(allocated)).toBe(seenDir);
    expect(path.extname(allocated)).toBe('.csv');
    expect(manager.activeCount).toBe(0);
    await expect(fs.readdir(rootDir)).resolves.toEqual([]);
  });

  test('回调失败时也应该删除目录并抛出原错误', async () => {
    await expect(
      manager.run(async (workspace) => {
        await fs.writeFile(workspace.allocatePath('.txt'), 'partial');
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(manager.activeCount).toBe(0);
    await expect(fs.readdir(rootDir)).resolves.toEqual([]);
  });

  test('同时运行的请求应该获得不同目录', async () => {
    const dirs = await Promise.all([
      manager.run(async (workspace) => workspace.dir),
      manager.run(async (workspace) => workspace.dir),
    ]);

    expect(new Set(dirs).size).toBe(2);
  });

  test('disposeAll 应该清理仍在使用的目录', async () => {
    let release: () => void = () => undefined;
    const blocked = new Promise<void>((resolve) => {
      release = resolve;
    });
    let started: () => void = () => undefined;
    const running = new Promise<void>((resolve) => {
      started = resolve;
    });

    const pending = manager.run(async () => {
      started();
      await blocked;
    });
    await running;
    expect(manager.activeCount).toBe(1);

    await manager.disposeAll();

    expect(manager.activeCount).toBe(0);
    await expect(fs.readdir(rootDir)).resolves.toEqual([]);
    release();
    await pending;
  });

  test('根目录不存在时应该自动创建', async () => {
    const nested = new TempWorkspaceManager(
      path.join(rootDir, 'nested', 'tmp'),
      MockFactory.createLoggerMock(),
    );

    await nested.run(async (workspace) => {
      expect(path.dirname(workspace.dir)).toBe(path.join(rootDir, 'nested', 'tmp'));
    });
  });
});
