import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    hookTimeout: 10000,
    include: ['tests/**/*.test.ts'],
    // Each test file opens its own database file; keep them off the default data dir
    env: {
      NODE_ENV: 'test',
      CARDFORGE_DATA_DIR: './data/test',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        // Entry points are thin wrappers over tested modules
        'src/cli.ts',
        'src/index.ts',
        '**/types.ts',
      ],
    },
    setupFiles: ['tests/fixtures/setup.ts'],
  },
});
