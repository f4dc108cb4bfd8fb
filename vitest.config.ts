import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

// https://vitest.dev/config
export default defineConfig({
  resolve: {
    alias: {
      '@main': fileURLToPath(new URL('./src/main', import.meta.url)),
      '@shared': fileURLToPath(new URL('./src/shared', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    env: {
      RUNNER_LOG_LEVEL: 'silent',
    },
  },
});
