import { promises as fs } from 'fs';
import { join } from 'path';
import { pool, withTransaction } from './client';
import { StockLedger } from '../services/stock-ledger';
import { Actor, BatchStatus } from '../types/fulfillment.types';
import { logger } from '../utils/logger';

interface SeedData {
     items: Array<{ sku: string; name: string; reorderThreshold: number }>;
     batches: Array<{
          sku: string;
          lotNo: string;
          quantity: number;
          expiresInDays: number | null;
          status?: BatchStatus;
     }>;
}

const SEED_ACTOR: Actor = { id: 'system:seed', privileged: true };

function daysFromToday(days: number): string {
     const date = new Date();
     date.setUTCDate(date.getUTCDate() + days);
     return date.toISOString().slice(0, 10);
}

async function seedDatabase() {
     const ledger = new StockLedger();

     try {
          logger.info('Seeding database with sample items and batches');

          const raw = await fs.readFile(join(__dirname, 'seed-data.json'), 'utf-8');
          const data: SeedData = JSON.parse(raw);

          await withTransaction(async (client) => {
               for (const item of data.items) {
                    await client.query(
                         `
          INSERT INTO item (sku, name, reorder_threshold)
          VALUES ($1, $2, $3)
          ON CONFLICT (sku) DO NOTHING
        `,
                         [item.sku, item.name, item.reorderThreshold]
                    );
               }

               logger.info({ count: data.items.length }, 'Inserted items');

               let received = 0;
               for (const batch of data.batches) {
                    const { rowCount } = await client.query('SELECT 1 FROM batch WHERE lot_no = $1', [
                         batch.lotNo,
                    ]);
                    if (rowCount) {
                         continue;
                    }

                    // Goes through the ledger so each batch gets its RECEIVE entry
                    await ledger.receiveBatch(
                         client,
                         {
                              sku: batch.sku,
                              lotNo: batch.lotNo,
                              quantity: batch.quantity,
                              expiryDate:
                                   batch.expiresInDays === null ? undefined : daysFromToday(batch.expiresInDays),
                              status: batch.status,
                         },
                         SEED_ACTOR
                    );
                    received += 1;
               }

               logger.info({ count: received }, 'Received sample batches');
          });

          logger.info('Database seeding completed successfully');
     } catch (error) {
          logger.error({ error }, 'Seeding failed');
          throw error;
     } finally {
          await pool.end();
     }
}

// Run if executed directly
if (require.main === module) {
     seedDatabase().catch((err) => {
          console.error('Seed error:', err);
          process.exit(1);
     });
}

export { seedDatabase };
