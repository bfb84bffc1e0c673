import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // Config tests change the working directory, which worker threads cannot do.
    pool: 'forks',
  },
});
