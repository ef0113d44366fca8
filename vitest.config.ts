import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // Brill tagger lexicon loads on first use
    testTimeout: 10000,
    env: {
      LOG_LEVEL: 'silent'
    }
  }
});
