import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const fromRoot = (dir: string) => fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@config': fromRoot('./src/config'),
      '@core': fromRoot('./src/core'),
      '@services': fromRoot('./src/services'),
      '@utils': fromRoot('./src/utils'),
      '@middleware': fromRoot('./src/middleware'),
      '@api': fromRoot('./src/api'),
      '@test': fromRoot('./src/test'),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['src/test/setupEnv.ts'],
  },
});
