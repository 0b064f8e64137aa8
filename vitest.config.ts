import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/types/**', 'src/test/**', 'src/server.ts', 'src/db/migrate.ts'],
    },
    testTimeout: 30000,
    // fast-check property tests may need more time
    hookTimeout: 30000,
  },
});
