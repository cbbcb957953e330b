import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@cubesheet/core': path.resolve(root, 'packages/core/src/index.ts'),
      '@cubesheet/parser-pdf': path.resolve(root, 'packages/parser/pdf/src/index.ts'),
      '@cubesheet/parser-text': path.resolve(root, 'packages/parser/text/src/index.ts'),
      '@cubesheet/generator-xlsx': path.resolve(root, 'packages/generator/xlsx/src/index.ts'),
      '@cubesheet/generator-csv': path.resolve(root, 'packages/generator/csv/src/index.ts'),
      '@cubesheet/watcher-chokidar': path.resolve(
        root,
        'packages/watcher/chokidar/src/index.ts',
      ),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['**/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
