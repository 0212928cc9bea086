import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['codebook/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
