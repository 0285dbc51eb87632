import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['integration-harness/src/**/*.test.ts'],
    environment: 'node'
  }
});
