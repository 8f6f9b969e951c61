import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'geoconvert-core',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['src/__tests__/setup.ts'],
    environment: 'node',
    testTimeout: 15_000,
    pool: 'forks',
    globals: true,
  },
});
