import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    // better-sqlite3 and sharp load native add-ons.
    pool: 'forks',
    env: {
      MEDIA_INDEX_LOG_LEVEL: 'silent',
    },
  },
});
