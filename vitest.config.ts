import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['backend/tests/**/*.test.ts'],
    environment: 'node',
    // Routes and the DataStore log every call; keep test output readable
    silent: true,
  },
});
