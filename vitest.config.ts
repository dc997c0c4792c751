import { defineConfig } from 'vitest/config';

// Fixed zone with daylight-saving transitions, so clock-change cases are reproducible
process.env.TZ = 'Europe/Berlin';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      CRONSTAMP_LOG_LEVEL: 'silent',
      TZ: 'Europe/Berlin',
    },
  },
});
