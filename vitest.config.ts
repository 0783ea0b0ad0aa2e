import { defineConfig } from 'vitest/config';

// Tests never need a database; keep modules that read env deterministic.
process.env.NODE_ENV = 'test';
process.env.JWT_SECRET = process.env.JWT_SECRET || 'test-secret';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 20_000,
    isolate: true,
    pool: 'threads',
    poolOptions: {
      threads: { singleThread: true },
    },
  },
});
