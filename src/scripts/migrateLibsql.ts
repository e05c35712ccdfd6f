import { createClient } from '@libsql/client';
import dotenv from 'dotenv';

import { applyMigrations } from '../adapters/migrations';
import { loadConfig } from '../config/appConfig';
import { logger } from '../utils/logger';

dotenv.config();

async function run(): Promise<void> {
  const config = loadConfig();
  const client = createClient(config.media.libsql);

  try {
    await client.execute('PRAGMA foreign_keys = ON');
    const applied = await applyMigrations(client, config.media.migrationsPath);
    if (!applied.length) {
      logger.info('No SQL migrations found');
      return;
    }
    logger.info({ count: applied.length }, 'Migrations applied successfully');
  } finally {
    client.close();
  }
}

run().catch((error) => {
  logger.error({ error }, 'Failed to apply migrations');
  process.exitCode = 1;
});
