import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@extrato/types': path.resolve(rootDir, 'packages/types/src/index.ts'),
      '@extrato/ofx-normalizer': path.resolve(rootDir, 'packages/ofx-normalizer/src/index.ts'),
      '@extrato/ofx-parser': path.resolve(rootDir, 'packages/ofx-parser/src/index.ts'),
      '@extrato/banks': path.resolve(rootDir, 'packages/banks/src/index.ts'),
      '@extrato/extractor': path.resolve(rootDir, 'packages/extractor/src/index.ts'),
      '@extrato/output': path.resolve(rootDir, 'packages/output/src/index.ts'),
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
