import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['engine/test/**/*.test.ts', 'server/test/**/*.test.ts'],
    environment: 'node'
  }
});
