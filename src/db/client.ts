import { Pool } from 'pg';
import { logger } from '../utils/logger';

/**
 * The part of a pg Pool the repositories use
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

const SSL_QUERY_PARAMS = ['sslmode', 'ssl', 'sslcert', 'sslkey', 'sslrootcert', 'sslcrl'];

let pool: Pool | null = null;

function isProductionEnvironment(): boolean {
  return (
    process.env.NODE_ENV === 'production' ||
    process.env.VERCEL === '1' ||
    process.env.VERCEL_ENV === 'production' ||
    !!process.env.VERCEL_URL ||
    !!process.env.AWS_LAMBDA_FUNCTION_NAME
  );
}

/**
 * SSL query params are dropped so the explicit ssl option below wins
 * (managed databases often append sslmode=require)
 */
function stripSslParams(databaseUrl: string): string {
  try {
    const url = new URL(databaseUrl);
    SSL_QUERY_PARAMS.forEach(param => url.searchParams.delete(param));
    return url.toString();
  } catch (error) {
    logger.warn('DATABASE_URL is not a parseable URL, using it unchanged', {
      error: String(error),
    });
    return databaseUrl;
  }
}

export function getPool(databaseUrl: string | null = process.env.DATABASE_URL || null): Pool {
  if (!pool) {
    if (!databaseUrl) {
      throw new Error('DATABASE_URL environment variable is not set');
    }

    // Production always uses SSL; development allows DATABASE_SSL=false
    const sslDisabled = !isProductionEnvironment() && process.env.DATABASE_SSL === 'false';

    pool = new Pool({
      connectionString: stripSslParams(databaseUrl),
      ssl: sslDisabled ? false : { rejectUnauthorized: false },
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    pool.on('error', err => {
      logger.error('Unexpected error on idle database client', err);
    });
  }

  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
