import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

export default defineConfig(() => {
  const packageDir = path.dirname(fileURLToPath(import.meta.url));
  return {
    test: {
      include: [path.join(packageDir, 'tests', '**', '*.{test,e2e-spec}.ts')],
      exclude: [
        path.join(packageDir, '**', 'node_modules', '**'),
        path.join(packageDir, '**', 'dist', '**'),
        path.join(packageDir, '**', 'coverage', '**'),
      ],
      silent: false,
      testTimeout: 15000,
    },
    resolve: {
      alias: {
        '@': path.join(packageDir, 'src'),
      },
    },
  };
});
