import { defineConfig } from 'vitest/config';
import { tmpdir } from 'os';
import { join } from 'path';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    env: {
      // Keep the debug log out of the real data directory
      BINSWAP_LOG_PATH: join(tmpdir(), 'binswap-test-debug.log'),
    },
  },
});
