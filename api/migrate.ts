import type { VercelRequest, VercelResponse } from '@vercel/node';
import { loadConfig } from '../src/config';
import { getPool } from '../src/db/client';
import { HIRING_SCHEMA_SQL } from '../src/db/schema';
import { describeError } from '../src/utils/errors';
import { logger } from '../src/utils/logger';

/**
 * Database migration API endpoint
 * Secured with API_SECRET when it is set
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  const config = loadConfig();
  const authHeader = req.headers.authorization;

  if (config.apiSecret && authHeader !== `Bearer ${config.apiSecret}`) {
    logger.warn('Unauthorized migration request', { authHeader: authHeader ? 'present' : 'missing' });
    res.status(401).json({ error: 'Unauthorized' });
    return;
  }

  try {
    logger.info('Starting database migration...');
    await getPool(config.databaseUrl).query(HIRING_SCHEMA_SQL);
    logger.info('Database migration completed successfully');

    res.status(200).json({
      success: true,
      message: 'Database migration completed successfully',
    });
  } catch (error) {
    logger.error('Database migration failed', error);
    res.status(500).json({ success: false, error: describeError(error) });
  }
}
