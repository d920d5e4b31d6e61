import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url))

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.spec.ts'],
    setupFiles: ['src/test-setup.ts'],
    restoreMocks: true,
    mockReset: true,
    isolate: true,
    coverage: {
      provider: 'istanbul',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/backend/**/*.ts'],
      exclude: ['src/backend/cli/main.ts', '**/*.d.ts', '**/*.spec.ts'],
    },
    testTimeout: 10_000,
    server: {
      deps: {
        inline: ['zod'],
      },
    },
  },
  resolve: {
    alias: {
      '@backend': fromRoot('./src/backend'),
      '@': fromRoot('./src'),
    },
  },
})
