import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Command and server tests each start a graph server from port 9100 upward.
    fileParallelism: false,
    exclude: ['dist/**', 'node_modules/**'],
  },
});
