import * as path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      'livetally-shared': path.resolve(__dirname, 'livetally-shared/src/index.ts'),
    },
  },
  test: {
    include: ['livetally-shared/src/**/*.test.ts', 'livetally-cli/src/**/*.test.ts'],
    environment: 'node',
  },
});
