import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (path: string): string => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    extensions: ['.ts', '.js', '.mts', '.mjs'],
    alias: [
      { find: /^@taskloom\/coordinator-sdk\/testing$/, replacement: pkg('coordinator-sdk/src/testing.ts') },
      { find: /^@taskloom\/coordinator-contracts$/, replacement: pkg('coordinator-contracts/src/index.ts') },
      { find: /^@taskloom\/coordinator-sdk$/, replacement: pkg('coordinator-sdk/src/index.ts') },
      { find: /^@taskloom\/coordinator-tools$/, replacement: pkg('coordinator-tools/src/index.ts') },
      { find: /^@taskloom\/coordinator-core$/, replacement: pkg('coordinator-core/src/index.ts') },
      { find: /^@taskloom\/coordinator-history$/, replacement: pkg('coordinator-history/src/index.ts') },
    ],
  },
});
