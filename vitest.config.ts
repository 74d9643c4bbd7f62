import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // Config is parsed at import time; keep the suite independent of a local .env
    env: {
      LOG_LEVEL: 'silent',
      DATABASE_PATH: ':memory:',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts', // Entry point
        'src/db/migrations/**',
      ],
    },
    testTimeout: 10000,
  },
});
