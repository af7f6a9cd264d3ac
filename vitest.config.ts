import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['scorer/tests/**/*.test.ts'],
    setupFiles: ['./scorer/tests/setup.ts'],
  },
});
