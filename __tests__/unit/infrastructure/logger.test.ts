import { withContext } from '../../../src/infrastructure/logging/logger.js';
import { MockFactory } from '../../utils/test-mocks.js';

describe('withContext', () => {
  test('应该把上下文合并到第一个元数据对象中', () => {
    const base = MockFactory.createLoggerMock();
    const logger = withContext(base, { traceId: 'trace-1' });

    logger.info('处理中', { format: 'csv' });

    expect(base.info).toHaveBeenCalledWith('处理中', { traceId: 'trace-1', format: 'csv' });
  });

  test('没有元数据时应该单独追加上下文', () => {
    const base = MockFactory.createLoggerMock();
    const logger = withContext(base, { traceId: 'trace-2' });

    logger.error('失败', 'extra');

    expect(base.error).toHaveBeenCalledWith('失败', { traceId: 'trace-2' }, 'extra');
  });

  test('调用方字段应该覆盖同名上下文字段', () => {
    const base = MockFactory.createLoggerMock();
    const logger = withContext(base, { traceId: 'outer' });

    logger.warn('覆盖', { traceId: 'inner' });

    expect(base.warn).toHaveBeenCalledWith('覆盖', { traceId: 'inner' });
  });
});
