import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const root = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  test: {
    name: 'checkin-service',
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    hookTimeout: 30000,
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@moodlens/platform-core': path.resolve(root, '../../platform-core/src'),
      '@moodlens/shared-contracts': path.resolve(root, '../../shared/contracts/src'),
      '@moodlens/test-utils': path.resolve(root, '../../shared/test-utils/src'),
    },
  },
});
