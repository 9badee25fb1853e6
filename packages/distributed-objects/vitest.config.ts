import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'distributed-objects',
    environment: 'node',
    restoreMocks: true,
  },
});
