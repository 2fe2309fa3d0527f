import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const sdk = (path: string) => fileURLToPath(new URL(`../../packages/nyuki-sdk/src/${path}`, import.meta.url))

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@nyuki\/sdk$/, replacement: sdk('index.ts') },
      { find: /^@nyuki\/sdk\/testing$/, replacement: sdk('core/test-utils.ts') },
    ],
  },
  test: {
    name: 'agent',
    globals: true,
    environment: 'node',
    silent: true,
    setupFiles: ['./src/test-setup.ts'],
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/main.ts'],
    },
  },
})
