import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Route/failure logging stays quiet unless a test turns it on
    env: {
      LOG_ROUTES: 'false',
      DEBUG: 'false',
      FAILURE_LOG_PATH: path.join(os.tmpdir(), 'router-test-failures.log'),
    },
  },
});
