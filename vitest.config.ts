import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@live-relay/shared': path.resolve(__dirname, 'packages/shared/src'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/shared/src/**/*.test.ts', 'packages/relay-server/src/**/*.test.ts'],
  },
});
