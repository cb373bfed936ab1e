import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      DOSSIER_LOG_FORMAT: 'json',
      DOSSIER_LOG_LEVEL: 'error',
    },
  },
});
