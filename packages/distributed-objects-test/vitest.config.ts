import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'distributed-objects-test',
    environment: 'node',
    restoreMocks: true,
    testTimeout: 10_000,
  },
});
