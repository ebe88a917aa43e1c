import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const local = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@pipewright/shared': local('./packages/shared/index.ts'),
      '@pipewright/core': local('./packages/core/src/index.ts'),
      '@pipewright/cli': local('./packages/cli/src/index.ts'),
    },
  },
  test: {
    include: ['tests/**/*.test.ts'],
  },
});
