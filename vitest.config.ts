import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(__dirname, './apps/backend/src'),
    },
  },
  test: {
    environment: 'node',
    include: ['apps/backend/__tests__/**/*.test.ts'],
  },
});
