import { PoolClient } from 'pg';
import { Actor, Batch, ExpiryScanResult } from '../types/fulfillment.types';
import { InvalidQuantityError } from '../utils/errors';
import { logger } from '../utils/logger';
import { recordDomainEvent } from './outbox';
import { BatchRow, StockLedger, toBatch } from './stock-ledger';

export const EXPIRY_SCAN_ACTOR: Actor = { id: 'system:expiry-scan', privileged: false };

const DEFAULT_WARNING_DAYS = parseInt(process.env.EXPIRY_WARNING_DAYS || '7', 10);

export interface ExpiryScanOptions {
     warningDays?: number;
     dryRun?: boolean;
}

/**
 * Moves AVAILABLE batches past their expiry date to EXPIRED and reports the
 * ones about to expire. A dry run reports without changing anything.
 */
export class ExpiryScanService {
     constructor(private readonly ledger: StockLedger = new StockLedger()) {}

     async scan(
          client: PoolClient,
          options: ExpiryScanOptions = {},
          actor: Actor = EXPIRY_SCAN_ACTOR
     ): Promise<ExpiryScanResult> {
          const warningDays = options.warningDays ?? DEFAULT_WARNING_DAYS;
          const dryRun = options.dryRun ?? false;

          if (!Number.isInteger(warningDays) || warningDays < 0) {
               throw new InvalidQuantityError(`Warning window must be a non-negative number of days, got ${warningDays}`);
          }

          const { rows: expiredRows } = await client.query<BatchRow>(
               `
      SELECT b.id, b.item_id, i.sku, b.lot_no, b.quantity, b.available_qty, b.expiry_date, b.status
      FROM batch b
      JOIN item i ON i.id = b.item_id
      WHERE b.status = 'AVAILABLE'
        AND b.available_qty > 0
        AND b.expiry_date < CURRENT_DATE
      ORDER BY b.expiry_date ASC, b.id ASC
      ${dryRun ? '' : 'FOR UPDATE OF b'}
    `
          );

          const expired: Batch[] = [];
          for (const row of expiredRows) {
               const batch = toBatch(row);
               expired.push(
                    dryRun
                         ? batch
                         : await this.ledger.setBatchStatus(client, batch.id, 'EXPIRED', actor, 'expiry_scan')
               );
          }

          const { rows: nearRows } = await client.query<BatchRow>(
               `
      SELECT b.id, b.item_id, i.sku, b.lot_no, b.quantity, b.available_qty, b.expiry_date, b.status
      FROM batch b
      JOIN item i ON i.id = b.item_id
      WHERE b.status = 'AVAILABLE'
        AND b.available_qty > 0
        AND b.expiry_date >= CURRENT_DATE
        AND b.expiry_date <= CURRENT_DATE + $1::int
      ORDER BY b.expiry_date ASC, b.id ASC
    `,
               [warningDays]
          );
          const nearExpiry = nearRows.map(toBatch);

          if (!dryRun) {
               if (expired.length > 0) {
                    await recordDomainEvent(client, 'BatchesExpired', {
                         count: expired.length,
                         batches: expired.map(summarize),
                    });
               }
               if (nearExpiry.length > 0) {
                    await recordDomainEvent(client, 'NearExpiryWarning', {
                         warningDays,
                         count: nearExpiry.length,
                         batches: nearExpiry.map(summarize),
                    });
               }
          }

          logger.info(
               { dryRun, warningDays, expired: expired.length, nearExpiry: nearExpiry.length },
               'Expiry scan complete'
          );

          return { dryRun, expired, nearExpiry };
     }
}

function summarize(batch: Batch): Record<string, unknown> {
     return {
          batchId: batch.id,
          sku: batch.sku,
          lotNo: batch.lotNo,
          expiryDate: batch.expiryDate,
          availableQty: batch.availableQty,
     };
}
