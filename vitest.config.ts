import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['parser/tests/**/*.test.ts', 'render/tests/**/*.test.ts', 'config/tests/**/*.test.ts'],
    environment: 'node'
  }
});
