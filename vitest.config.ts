import { defineConfig as defineBaseConfig } from './tools/vitest-config/src/index';
import { defineConfig } from 'vitest/config';

const baseConfig = defineBaseConfig();

export default defineConfig({
  ...baseConfig,
  test: {
    ...baseConfig.test,
    include: [
      'tools/*/src/**/*.test.ts',
      'packages/*/src/**/*.test.ts',
      'apps/*/src/**/*.test.ts',
    ],
  },
});
