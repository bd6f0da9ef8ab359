import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Route and behavioral tests start real HTTP servers on ephemeral ports.
    fileParallelism: false,
    exclude: ['dist/**', 'node_modules/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json'],
      exclude: [
        'node_modules/**',
        'dist/**',
        'src/**/*.test.ts',
      ],
      thresholds: {
        lines: 50,
      },
    },
  },
})
