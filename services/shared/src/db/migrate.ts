import { promises as fs } from 'fs';
import { join } from 'path';
import { pool, withTransaction } from './client';
import { logger } from '../utils/logger';

const MIGRATIONS_DIR = join(__dirname, 'migrations');

/**
 * Applies every `.sql` file under migrations/ that has not been recorded in
 * `schema_migration`, in file name order, each in its own transaction.
 */
async function runMigrations(): Promise<string[]> {
     const applied: string[] = [];

     try {
          await pool.query(`
      CREATE TABLE IF NOT EXISTS schema_migration (
        name TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

          const files = await fs.readdir(MIGRATIONS_DIR);
          const sqlFiles = files.filter((f) => f.endsWith('.sql')).sort();

          const { rows } = await pool.query<{ name: string }>('SELECT name FROM schema_migration');
          const done = new Set(rows.map((r) => r.name));
          const pending = sqlFiles.filter((f) => !done.has(f));

          logger.info({ total: sqlFiles.length, pending: pending.length }, 'Running database migrations');

          for (const file of pending) {
               const sql = await fs.readFile(join(MIGRATIONS_DIR, file), 'utf-8');

               logger.info({ file }, 'Executing migration');
               await withTransaction(async (client) => {
                    await client.query(sql);
                    await client.query('INSERT INTO schema_migration (name) VALUES ($1)', [file]);
               });
               applied.push(file);
               logger.info({ file }, 'Migration completed');
          }

          logger.info({ applied: applied.length }, 'All migrations completed successfully');
          return applied;
     } catch (error) {
          logger.error({ error }, 'Migration failed');
          throw error;
     } finally {
          await pool.end();
     }
}

// Run if executed directly
if (require.main === module) {
     runMigrations().catch((err) => {
          console.error('Migration error:', err);
          process.exit(1);
     });
}

export { runMigrations };
