/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    reporters: 'default',
    include: ['src/tests/**/*.spec.ts'],
  },
  esbuild: { target: 'es2022' },
});
