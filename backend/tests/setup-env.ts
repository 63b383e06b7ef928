import { config } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const here = dirname(fileURLToPath(import.meta.url));

config({ path: resolve(here, '../../.env') });
config({ path: resolve(here, '../.env') });

if (!process.env.JWT_SECRET) {
  process.env.JWT_SECRET = 'test-jwt-secret-for-vitest-only';
}

process.env.LOG_LEVEL = 'silent';
