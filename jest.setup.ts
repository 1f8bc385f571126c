// jest.setup.ts
beforeEach(() => {
  process.env = {
    ...process.env, // 保持其他值
    NODE_ENV: 'test',
    LOG_LEVEL: 'error',
    LOG_TO_FILE: 'false',
  };
});
