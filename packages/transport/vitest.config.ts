/**
 * Vitest configuration for transport package
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'transport',
    environment: 'node',
    include: ['src/**/*.test.ts'],
    pool: 'forks'
  }
});
