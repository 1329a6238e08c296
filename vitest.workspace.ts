import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  {
    test: {
      name: 'server',
      include: ['src/**/*.test.ts'],
      environment: 'node',
    },
  },
  'frontend/vitest.config.ts',
]);
