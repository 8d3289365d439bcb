import { Pool, PoolClient, PoolConfig, types } from 'pg';
import { logger } from '../utils/logger';
import { ConcurrentModificationError } from '../utils/errors';
import { getPgErrorCode, isTransientPgError } from './pg-errors';

// DATE columns (expiry_date) round-trip as "YYYY-MM-DD" instead of local-midnight Dates
types.setTypeParser(1082, (value: string) => value);

const config: PoolConfig = {
     connectionString: process.env.DATABASE_URL,
     // In test mode, use minimal connections and short timeouts
     min: process.env.NODE_ENV === 'test' ? 0 : parseInt(process.env.DB_POOL_MIN || '2', 10),
     max: process.env.NODE_ENV === 'test' ? 2 : parseInt(process.env.DB_POOL_MAX || '10', 10),
     idleTimeoutMillis:
          process.env.NODE_ENV === 'test'
               ? 100
               : parseInt(process.env.DB_IDLE_TIMEOUT_MS || '10000', 10),
     connectionTimeoutMillis: parseInt(process.env.DB_CONNECTION_TIMEOUT_MS || '5000', 10),
};
export const pool = new Pool(config);

const TX_MAX_ATTEMPTS = parseInt(process.env.TX_MAX_ATTEMPTS || '3', 10);
const TX_RETRY_BASE_DELAY_MS = parseInt(process.env.TX_RETRY_BASE_DELAY_MS || '25', 10);

// Log pool errors
pool.on('error', (err) => {
     logger.error({ err }, 'Unexpected PostgreSQL pool error');
});

// Connection health check
export async function checkConnection(): Promise<boolean> {
     try {
          const client = await pool.connect();
          await client.query('SELECT 1');
          client.release();
          return true;
     } catch (error) {
          logger.error({ error }, 'Database connection check failed');
          return false;
     }
}

// Transaction helper
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     try {
          await client.query('BEGIN');
          const result = await fn(client);
          await client.query('COMMIT');
          return result;
     } catch (err) {
          await client.query('ROLLBACK');
          throw err;
     } finally {
          client.release();
     }
}

/**
 * Runs `fn` in a transaction, re-running the whole unit when it loses a race:
 * a conditional update that matched no row, or a serialization failure,
 * deadlock or lock timeout reported by PostgreSQL. Once attempts are exhausted
 * the failure surfaces as ConcurrentModificationError.
 */
export async function withRetryingTransaction<T>(
     fn: (client: PoolClient) => Promise<T>,
     maxAttempts: number = TX_MAX_ATTEMPTS
): Promise<T> {
     for (let attempt = 1; ; attempt++) {
          try {
               return await withTransaction(fn);
          } catch (err) {
               const retryable = err instanceof ConcurrentModificationError || isTransientPgError(err);
               if (!retryable) {
                    throw err;
               }

               if (attempt >= maxAttempts) {
                    logger.warn({ err, attempt }, 'Transaction retries exhausted');
                    if (err instanceof ConcurrentModificationError) {
                         throw err;
                    }
                    throw new ConcurrentModificationError(
                         'transaction',
                         getPgErrorCode(err) ?? 'unknown',
                         'Transaction aborted by a concurrent update, retry the request'
                    );
               }

               logger.warn(
                    { attempt, maxAttempts, code: getPgErrorCode(err) },
                    'Retrying transaction after concurrent modification'
               );
               await sleep(TX_RETRY_BASE_DELAY_MS * attempt);
          }
     }
}

// Connection helper for non-transactional queries
export async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     try {
          return await fn(client);
     } finally {
          client.release();
     }
}

// Graceful shutdown
export async function closePool(): Promise<void> {
     await pool.end();
     logger.info('Database pool closed');
}

function sleep(ms: number): Promise<void> {
     return new Promise((resolve) => setTimeout(resolve, ms));
}

// Handle shutdown signals (disabled in test mode)
if (process.env.NODE_ENV !== 'test') {
     process.on('SIGINT', async () => {
          await closePool();
          process.exit(0);
     });

     process.on('SIGTERM', async () => {
          await closePool();
          process.exit(0);
     });
}
