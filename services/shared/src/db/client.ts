import { Pool, PoolClient, PoolConfig } from 'pg';
import { logger } from '../utils/logger';

const isTest = process.env.NODE_ENV === 'test';

const config: PoolConfig = {
     connectionString: process.env.DATABASE_URL,
     min: isTest ? 0 : parseInt(process.env.DB_POOL_MIN || '2', 10),
     max: isTest ? 2 : parseInt(process.env.DB_POOL_MAX || '10', 10),
     idleTimeoutMillis: isTest ? 100 : parseInt(process.env.DB_IDLE_TIMEOUT_MS || '10000', 10),
     connectionTimeoutMillis: parseInt(process.env.DB_CONNECTION_TIMEOUT_MS || '5000', 10),
     // Stock row locks are held for one reserve transaction at most
     lock_timeout: parseInt(process.env.DB_LOCK_TIMEOUT_MS || '5000', 10),
     idle_in_transaction_session_timeout: parseInt(
          process.env.DB_IDLE_IN_TRANSACTION_TIMEOUT_MS || '30000',
          10
     ),
};
export const pool = new Pool(config);

pool.on('error', (err) => {
     logger.error({ err }, 'Unexpected PostgreSQL pool error');
});

export async function checkConnection(): Promise<boolean> {
     try {
          const client = await pool.connect();
          await client.query('SELECT 1');
          client.release();
          return true;
     } catch (error) {
          logger.error({ err: error }, 'Database connection check failed');
          return false;
     }
}

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

// Display reads run outside a transaction and take no locks
export async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     try {
          return await fn(client);
     } finally {
          client.release();
     }
}

export async function closePool(): Promise<void> {
     await pool.end();
     logger.info('Database pool closed');
}
