import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.spec.ts'],
    // Grammar loading compiles a WASM module on first use
    testTimeout: 30_000,
  },
});
