import { promises as fs } from 'fs';
import { join } from 'path';
import { pool } from './client';
import { logger } from '../utils/logger';

async function runMigrations() {
     const migrationsDir = join(__dirname, 'migrations');

     try {
          await pool.query(`
      CREATE TABLE IF NOT EXISTS schema_migration (
        name TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

          const { rows } = await pool.query<{ name: string }>('SELECT name FROM schema_migration');
          const applied = new Set(rows.map((r) => r.name));

          const files = await fs.readdir(migrationsDir);
          const pending = files
               .filter((f) => f.endsWith('.sql') && !applied.has(f))
               .sort();

          logger.info({ pending: pending.length, applied: applied.size }, 'Running database migrations');

          for (const file of pending) {
               const sql = await fs.readFile(join(migrationsDir, file), 'utf-8');

               logger.info({ file }, 'Executing migration');
               const client = await pool.connect();
               try {
                    await client.query('BEGIN');
                    await client.query(sql);
                    await client.query('INSERT INTO schema_migration (name) VALUES ($1)', [file]);
                    await client.query('COMMIT');
               } catch (error) {
                    await client.query('ROLLBACK');
                    throw error;
               } finally {
                    client.release();
               }
               logger.info({ file }, 'Migration completed');
          }

          logger.info('All migrations completed successfully');
     } catch (error) {
          logger.error({ err: error }, 'Migration failed');
          throw error;
     } finally {
          await pool.end();
     }
}

// Run if executed directly
if (require.main === module) {
     runMigrations().catch((err) => {
          logger.fatal({ err }, 'Migration error');
          process.exit(1);
     });
}

export { runMigrations };
