import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Starting an embedded PGlite cluster takes a few seconds
    hookTimeout: 30000,
  },
});
