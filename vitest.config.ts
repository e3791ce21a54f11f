import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    setupFiles: ['./tests/vitest-setup.ts'],
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 10000,
    // Controller tests drive shared fake timers, keep them in one fork
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true
      }
    },
    // ALWAYS run once and exit, never watch
    watch: false,
    hookTimeout: 10000,
    isolate: true
  },
});
