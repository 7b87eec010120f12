import { defineConfig } from 'vitest/config';
import dotenv from 'dotenv';

dotenv.config({ path: '.env.test' });

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      BILLABLE_CONFIG_PATH: process.env.BILLABLE_CONFIG_PATH ?? '',
      BILLABLE_DATA_PATH: process.env.BILLABLE_DATA_PATH ?? '',
    },
  },
});
