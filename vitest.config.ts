import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./node/src', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['node/tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
    },
  },
});
