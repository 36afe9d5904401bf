import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/*.spec.ts'],
    // Each test file gets its own module graph, and with it its own in-memory database
    env: {
      NODE_ENV: 'test',
      DATABASE_PATH: ':memory:',
      REMINDERS_ENABLED: 'false',
      SENTRY_DSN: '',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.test.ts',
        'src/**/*.spec.ts',
        'src/test/**',
        'src/db/seed.ts',
        'src/index.ts',
      ],
    },
    // ESM support
    alias: {
      '@progress-portal/shared': fileURLToPath(new URL('../shared/src/index.ts', import.meta.url)),
    },
  },
});
