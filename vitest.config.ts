import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      TMDB_API_KEY: 'test-key',
      TELEGRAM_BOT_TOKEN: 'test-token',
      TELEGRAM_CHANNEL_ID: '@test_channel',
      JWT_SECRET: 'test-secret-test-secret-test-secret',
      ADMIN_PASSWORD: 'test-password',
      DATABASE_PATH: ':memory:',
      LOG_LEVEL: 'silent',
    },
  },
});
