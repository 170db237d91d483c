import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    env: {
      // 测试中不读取本机的环境变量配置
      PLAGISCORE_INPUT_DIR: '',
      PLAGISCORE_BLOCK_SIZE: '',
      PLAGISCORE_LOG_LEVEL: '',
    },
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    testTimeout: 30000,
    coverage: {
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/cli/index.ts'],
    },
  },
})
