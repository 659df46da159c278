import { Pool, PoolClient } from 'pg';
import { dbConfig } from '../config/database.config';
import { logger } from '../../utils/logging';

export const pool = new Pool(dbConfig);

pool.on('error', (err: Error) => {
  logger.error('Unexpected error on idle client', { error: err.message, stack: err.stack });
  process.exit(-1);
});

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Connect to database and verify connection with retry logic
 */
export const connectDatabase = async (maxRetries: number = 10, retryDelay: number = 2000): Promise<void> => {
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await pool.query('SELECT NOW()');
      logger.info('Database connected successfully');
      return;
    } catch (err) {
      lastError = err;
      if (attempt < maxRetries) {
        logger.warn(`Database connection attempt ${attempt}/${maxRetries} failed, retrying in ${retryDelay}ms...`, {
          error: errorMessage(err),
        });
        await new Promise(resolve => setTimeout(resolve, retryDelay));
      } else {
        logger.error(`Database connection error after ${maxRetries} attempts`, { error: errorMessage(err) });
      }
    }
  }

  throw lastError;
};

/**
 * Run `handler` inside BEGIN/COMMIT on a dedicated client; any error rolls back
 */
export const withTransaction = async <T>(
  source: Pool,
  handler: (client: PoolClient) => Promise<T>
): Promise<T> => {
  const client = await source.connect();
  try {
    await client.query('BEGIN');
    const result = await handler(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
};
