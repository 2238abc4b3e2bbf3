import * as path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['changelog-shared/src/**/*.test.ts', 'changelog-cli/src/**/*.test.ts'],
  },
  resolve: {
    alias: [
      { find: /^changelog-shared$/, replacement: path.resolve(__dirname, 'changelog-shared/src/index.ts') },
      { find: /^changelog-shared\/(.*)$/, replacement: path.resolve(__dirname, 'changelog-shared') + '/$1' },
    ],
  },
});
