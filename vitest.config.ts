import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'threads',
    projects: ['packages/*'],
    testTimeout: 2000,
    restoreMocks: true,
  },
});
