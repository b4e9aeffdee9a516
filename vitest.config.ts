import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@edocta/types': fromRoot('./packages/types/src/index.ts'),
      '@edocta/pdf-extract': fromRoot('./packages/pdf-extract/src/index.ts'),
      '@edocta/statement-parser': fromRoot('./packages/statement-parser/src/index.ts'),
      '@edocta/output': fromRoot('./packages/output/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
