import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'sdk',
    globals: true,
    environment: 'node',
    silent: true,
    include: ['src/**/*.test.ts'],
    setupFiles: ['./src/test-setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/index.ts', 'src/core/test-utils.ts'],
    },
  },
})
