import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    environment: 'node',
    // Tests change the working directory, which worker threads do not allow.
    pool: 'forks',
  },
});
