import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Channels are named FIFOs made with mkfifo; the suite runs on POSIX hosts only.
    include: ['tests/**/*.test.ts'],
    testTimeout: 20000,
  },
});
