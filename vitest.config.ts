import * as os from 'os';
import * as path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.spec.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      ODM_CLIENT_ID_PATH: path.join(os.tmpdir(), 'odm-fetch-test.clientid'),
    },
  },
});
