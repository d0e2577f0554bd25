import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

function packageEntry(name: string): string {
  return fileURLToPath(new URL(`./sdk/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@stackreport/types': packageEntry('types'),
      '@stackreport/utils': packageEntry('utils'),
      '@stackreport/core': packageEntry('core'),
      '@stackreport/node': packageEntry('node'),
    },
  },
  define: {
    __DEBUG_BUILD__: true,
  },
  test: {
    include: ['sdk/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
