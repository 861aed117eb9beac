import { defineConfig, mergeConfig } from 'vitest/config';
import baseConfig from './vitest.base.js';

export default mergeConfig(baseConfig, defineConfig({
  test: {
    include: ['Shared/tests/**/*.test.ts', 'DocTester/tests/**/*.test.ts'],
    // Subprocess tests spawn real children and measure wall time
    fileParallelism: false,
  },
}));
