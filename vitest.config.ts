import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const workspace = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@ledgerline/types': workspace('./packages/types/src/index.ts'),
      '@ledgerline/pdf-extract': workspace('./packages/pdf-extract/src/index.ts'),
      '@ledgerline/ingest': workspace('./packages/ingest/src/index.ts'),
      '@ledgerline/output': workspace('./packages/output/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
