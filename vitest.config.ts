import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['kubegrid-shared/src/**/*.test.ts', 'kubegrid-cli/src/**/*.test.{ts,tsx}'],
    environment: 'node',
    env: { NODE_ENV: 'test' },
  },
});
