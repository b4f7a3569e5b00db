import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@bidsignal/agents': root('./agents/src/index.ts'),
      '@bidsignal/llm': root('./packages/llm/src/index.ts'),
      '@bidsignal/schemas': root('./packages/schemas/src/index.ts'),
    },
  },
});
