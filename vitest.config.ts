import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(__dirname, 'src'),
    },
  },
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      MEDIASTACK_API_KEY: 'test-mediastack-key',
      GEMINI_API_KEY: 'test-gemini-key',
    },
  },
});
