import 'dotenv/config';
import { mkdir } from 'node:fs/promises';
import { createApp } from './app.js';
import { loadConfig } from './config/env.js';
import { validateJwtSecretAtStartup } from './config/security.js';
import logger from './logger.js';

async function startServer() {
  validateJwtSecretAtStartup();
  const config = loadConfig();
  await mkdir(config.dataDir, { recursive: true });

  const app = createApp(config);
  app.listen(config.port, () => {
    logger.info({ port: config.port, mode: config.mode, dataDir: config.dataDir }, 'Budget ledger API running');
  });
}

startServer().catch((err) => {
  logger.error({ err }, 'Failed to start server');
  process.exit(1);
});
