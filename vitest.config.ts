import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      CATCHWIRE_ENV: 'test',
      CATCHWIRE_EXIT_ON_UNCAUGHT: 'false',
    },
  },
});
