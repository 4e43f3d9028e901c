import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const r = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@config': r('./src/config'),
      '@core': r('./src/core'),
      '@infra': r('./src/infrastructure'),
      '@services': r('./src/services'),
      '@utils': r('./src/utils'),
      '@middleware': r('./src/middleware'),
      '@api': r('./src/api'),
      '@test': r('./src/test'),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['src/test/setupEnv.ts'],
  },
});
