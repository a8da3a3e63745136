import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Sealing runs OpenPGP S2K on every commit; give the store tests room.
    testTimeout: 20000,
  },
});
