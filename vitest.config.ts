import * as path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      'ocmeter-shared': path.resolve(__dirname, 'ocmeter-shared/src/index.ts'),
    },
  },
  test: {
    include: ['ocmeter-shared/src/**/*.test.ts', 'ocmeter-cli/src/**/*.test.ts'],
    environment: 'node',
  },
});
