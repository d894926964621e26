/**
 * Database Initialization Script
 * Creates the SQLite database and runs migrations
 *
 * Usage: npx tsx scripts/init_db.ts
 */

import './load_env';
import { loadEnvConfig } from '../src/core/env';
import { closeDatabase, openDatabase } from '../src/data/db';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('init_db');

try {
  const env = loadEnvConfig();
  const db = openDatabase({ path: env.databasePath });
  logger.info({ location: db.name }, 'Database initialized successfully');
  closeDatabase(db);
} catch (error) {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Database initialization failed');
  process.exit(1);
}
