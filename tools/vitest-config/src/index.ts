import type { ViteUserConfig } from 'vitest/config';

/**
 * Shared Vitest defaults for every workspace.
 * Callers may override any `test` field; coverage paths are workspace-relative.
 */
export const defineConfig = (options: ViteUserConfig = {}): ViteUserConfig => {
  return {
    ...options,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: ['**/src/**/*.ts'],
        exclude: ['**/index.ts', '**/*.test.ts', 'packages/model/**'],
      },
      ...options.test,
    },
  };
};
