import { loadConfig } from '../config';
import { closePool, getPool } from '../db/client';
import { HIRING_SCHEMA_SQL } from '../db/schema';
import { logger } from '../utils/logger';

/**
 * Creates the hiring_checks table and its indexes
 */
async function migrate(): Promise<void> {
  try {
    logger.info('Starting database migration...');

    const config = loadConfig();
    await getPool(config.databaseUrl).query(HIRING_SCHEMA_SQL);

    logger.info('Database migration completed successfully');
    process.exitCode = 0;
  } catch (error) {
    logger.error('Database migration failed', error);
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

void migrate();
