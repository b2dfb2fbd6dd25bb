import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    // bcryptjs hashing while seeding dealers is slow
    testTimeout: 20000,
  },
});
