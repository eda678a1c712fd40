import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    // Timestamps render in local time; pin it so expectations hold anywhere.
    env: { TZ: 'UTC' },
  },
});
