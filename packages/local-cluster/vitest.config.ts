import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'local-cluster',
    environment: 'node',
    restoreMocks: true,
  },
});
