import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['disc-rip/src/**/*.test.ts'],
    environment: 'node',
  },
});
