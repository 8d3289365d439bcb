import { PoolClient } from 'pg';
import {
     Actor,
     AdjustBatchRequest,
     Batch,
     BatchStatus,
     EligibleBatch,
     InventoryBatch,
     InventorySummary,
     LedgerContext,
     LowStockSignal,
     ReceiveBatchRequest,
} from '../types/fulfillment.types';
import {
     BatchNotFoundError,
     ConcurrentModificationError,
     DuplicateLotError,
     InvalidQuantityError,
     ItemNotFoundError,
     LedgerInvariantError,
} from '../utils/errors';
import { isUniqueViolation } from '../db/pg-errors';
import { logger } from '../utils/logger';
import { TransactionLogService } from './transaction-log';

export interface BatchRow {
     id: number;
     item_id: number;
     sku: string;
     lot_no: string;
     quantity: number;
     available_qty: number;
     expiry_date: string | null;
     status: BatchStatus;
}

const BATCH_STATUSES: readonly BatchStatus[] = ['AVAILABLE', 'QUARANTINE', 'EXPIRED'];

/**
 * Owns quantity accounting per batch. Every change to `batch.available_qty`
 * goes through this class, and every change is a conditional update that the
 * database re-validates against the row it locks, so `0 <= available_qty <=
 * quantity` holds regardless of what a concurrent transaction did.
 */
export class StockLedger {
     constructor(private readonly transactionLog: TransactionLogService = new TransactionLogService()) {}

     /**
      * Batches of an item that can be drawn from right now, in FEFO order
      * (earliest expiry first, undated last, id as tiebreak). Rows are locked
      * until the enclosing transaction ends.
      */
     async findEligibleBatches(client: PoolClient, itemId: number): Promise<EligibleBatch[]> {
          const { rows } = await client.query<{
               id: number;
               lot_no: string;
               available_qty: number;
               expiry_date: string | null;
          }>(
               `
      SELECT id, lot_no, available_qty, expiry_date
      FROM batch
      WHERE item_id = $1
        AND status = 'AVAILABLE'
        AND available_qty > 0
        AND (expiry_date IS NULL OR expiry_date > CURRENT_DATE)
      ORDER BY expiry_date ASC NULLS LAST, id ASC
      FOR UPDATE
    `,
               [itemId]
          );

          return rows.map((row) => ({
               id: row.id,
               lotNo: row.lot_no,
               availableQty: row.available_qty,
               expiryDate: row.expiry_date,
          }));
     }

     /**
      * Takes `qty` units out of a batch's available stock. Returns the new
      * available quantity; throws ConcurrentModificationError when the batch no
      * longer has the stock (or is no longer AVAILABLE) by the time the update
      * runs.
      */
     async reserve(client: PoolClient, batchId: number, qty: number): Promise<number> {
          assertPositiveInteger(qty, `Reserve quantity for batch ${batchId}`);

          const { rows } = await client.query<{ available_qty: number }>(
               `
      UPDATE batch
      SET available_qty = available_qty - $1,
          updated_at = NOW()
      WHERE id = $2
        AND status = 'AVAILABLE'
        AND available_qty >= $1
      RETURNING available_qty
    `,
               [qty, batchId]
          );

          if (rows.length === 0) {
               throw new ConcurrentModificationError(
                    'batch',
                    batchId,
                    `Batch ${batchId} no longer has ${qty} units available`
               );
          }

          return rows[0].available_qty;
     }

     /** Returns previously reserved units to a batch. */
     async release(client: PoolClient, batchId: number, qty: number): Promise<number> {
          assertPositiveInteger(qty, `Release quantity for batch ${batchId}`);

          const { rows } = await client.query<{ available_qty: number }>(
               `
      UPDATE batch
      SET available_qty = available_qty + $1,
          updated_at = NOW()
      WHERE id = $2
        AND available_qty + $1 <= quantity
      RETURNING available_qty
    `,
               [qty, batchId]
          );

          if (rows.length === 0) {
               throw new LedgerInvariantError(
                    `Releasing ${qty} units would push batch ${batchId} above its received quantity`,
                    batchId
               );
          }

          return rows[0].available_qty;
     }

     async receiveBatch(
          client: PoolClient,
          request: ReceiveBatchRequest,
          actor: Actor,
          context: LedgerContext = {}
     ): Promise<Batch> {
          assertPositiveInteger(request.quantity, `Received quantity for lot ${request.lotNo}`);

          const status = request.status ?? 'AVAILABLE';
          if (!BATCH_STATUSES.includes(status)) {
               throw new InvalidQuantityError(`Unknown batch status ${status}`);
          }

          const { rows: items } = await client.query<{ id: number; sku: string }>(
               `SELECT id, sku FROM item WHERE sku = $1`,
               [request.sku]
          );
          if (items.length === 0) {
               throw new ItemNotFoundError(request.sku);
          }
          const item = items[0];

          let inserted: BatchRow;
          try {
               const { rows } = await client.query<Omit<BatchRow, 'sku'>>(
                    `
        INSERT INTO batch (
          item_id,
          lot_no,
          quantity,
          available_qty,
          expiry_date,
          status
        ) VALUES ($1, $2, $3, $3, $4, $5)
        RETURNING id, item_id, lot_no, quantity, available_qty, expiry_date, status
      `,
                    [item.id, request.lotNo, request.quantity, request.expiryDate ?? null, status]
               );
               inserted = { ...rows[0], sku: item.sku };
          } catch (err) {
               if (isUniqueViolation(err, 'batch_lot_no_key')) {
                    throw new DuplicateLotError(request.lotNo);
               }
               throw err;
          }

          await this.transactionLog.append(client, {
               type: 'RECEIVE',
               qty: request.quantity,
               itemId: item.id,
               batchId: inserted.id,
               orderId: context.orderId,
               actor: actor.id,
               metadata: { lotNo: request.lotNo, expiryDate: request.expiryDate ?? null, status, ...context.metadata },
          });

          logger.info(
               { batchId: inserted.id, sku: item.sku, lotNo: request.lotNo, quantity: request.quantity },
               'Batch received'
          );

          return toBatch(inserted);
     }

     /**
      * Moves `available_qty` by `quantityDelta`. The ceiling is the received
      * quantity less whatever live allocations still hold, so a later release
      * always fits back into the batch.
      */
     async adjustBatch(
          client: PoolClient,
          request: AdjustBatchRequest,
          actor: Actor,
          context: LedgerContext = {}
     ): Promise<Batch> {
          const { batchId, quantityDelta, reason } = request;

          if (!Number.isInteger(quantityDelta) || quantityDelta === 0) {
               throw new InvalidQuantityError('Adjustment must be a non-zero whole number of units');
          }
          if (!reason || reason.trim().length === 0) {
               throw new InvalidQuantityError('Adjustment reason is required');
          }

          const { rows } = await client.query<BatchRow>(
               `
      WITH updated AS (
        UPDATE batch
        SET available_qty = available_qty + $1,
            updated_at = NOW()
        WHERE id = $2
          AND available_qty + $1 >= 0
          AND available_qty + $1 <= quantity - (
            SELECT COALESCE(SUM(a.qty_allocated), 0)
            FROM allocation a
            WHERE a.batch_id = $2
          )
        RETURNING id, item_id, lot_no, quantity, available_qty, expiry_date, status
      )
      SELECT u.id, u.item_id, i.sku, u.lot_no, u.quantity, u.available_qty, u.expiry_date, u.status
      FROM updated u
      JOIN item i ON i.id = u.item_id
    `,
               [quantityDelta, batchId]
          );

          if (rows.length === 0) {
               const current = await this.findBatch(client, batchId);
               const held = await this.heldQuantity(client, batchId);
               throw new InvalidQuantityError(
                    `Adjustment of ${quantityDelta} would take batch ${batchId} to ${
                         current.availableQty + quantityDelta
                    } units (allowed 0..${current.quantity - held})`
               );
          }

          const batch = toBatch(rows[0]);

          await this.transactionLog.append(client, {
               type: 'ADJUST',
               qty: quantityDelta,
               itemId: batch.itemId,
               batchId: batch.id,
               orderId: context.orderId,
               actor: actor.id,
               metadata: { reason, source: 'manual_adjustment', ...context.metadata },
          });

          logger.info(
               { batchId, quantityDelta, newAvailable: batch.availableQty, reason },
               'Manual adjustment applied'
          );

          return batch;
     }

     async setBatchStatus(
          client: PoolClient,
          batchId: number,
          status: BatchStatus,
          actor: Actor,
          reason: string = 'status_change'
     ): Promise<Batch> {
          if (!BATCH_STATUSES.includes(status)) {
               throw new InvalidQuantityError(`Unknown batch status ${status}`);
          }

          const current = await this.findBatch(client, batchId, true);
          if (current.status === status) {
               return current;
          }

          await client.query(
               `
      UPDATE batch
      SET status = $1,
          updated_at = NOW()
      WHERE id = $2
    `,
               [status, batchId]
          );

          await this.transactionLog.append(client, {
               type: 'ADJUST',
               qty: 0,
               itemId: current.itemId,
               batchId,
               actor: actor.id,
               metadata: { reason, from: current.status, to: status },
          });

          logger.info({ batchId, from: current.status, to: status }, 'Batch status changed');

          return { ...current, status };
     }

     /** Units of a batch currently held by allocations. */
     async heldQuantity(client: PoolClient, batchId: number): Promise<number> {
          const { rows } = await client.query<{ held: number }>(
               `SELECT COALESCE(SUM(qty_allocated), 0)::int AS held FROM allocation WHERE batch_id = $1`,
               [batchId]
          );
          return rows.length > 0 ? Number(rows[0].held) : 0;
     }

     async findBatch(client: PoolClient, batchId: number, lock: boolean = false): Promise<Batch> {
          const { rows } = await client.query<BatchRow>(
               `
      SELECT b.id, b.item_id, i.sku, b.lot_no, b.quantity, b.available_qty, b.expiry_date, b.status
      FROM batch b
      JOIN item i ON i.id = b.item_id
      WHERE b.id = $1
      ${lock ? 'FOR UPDATE OF b' : ''}
    `,
               [batchId]
          );

          if (rows.length === 0) {
               throw new BatchNotFoundError(batchId);
          }

          return toBatch(rows[0]);
     }

     /**
      * Get all batches of a SKU in FEFO order, with the total that could be
      * allocated right now.
      */
     async getAvailableInventory(client: PoolClient, sku: string): Promise<InventorySummary> {
          const { rows } = await client.query<BatchRow & { eligible: boolean }>(
               `
      SELECT
        b.id,
        b.item_id,
        i.sku,
        b.lot_no,
        b.quantity,
        b.available_qty,
        b.expiry_date,
        b.status,
        (b.status = 'AVAILABLE' AND (b.expiry_date IS NULL OR b.expiry_date > CURRENT_DATE)) AS eligible
      FROM batch b
      JOIN item i ON i.id = b.item_id
      WHERE i.sku = $1
      ORDER BY b.expiry_date ASC NULLS LAST, b.id ASC
    `,
               [sku]
          );

          const batches: InventoryBatch[] = rows.map((row) => ({
               ...toBatch(row),
               eligible: row.eligible,
          }));

          return {
               sku,
               totalAvailable: batches
                    .filter((b) => b.eligible)
                    .reduce((sum, b) => sum + b.availableQty, 0),
               batches,
          };
     }

     /**
      * Items whose allocatable stock is at or below their reorder threshold.
      * Items with a zero threshold never signal.
      */
     async checkReorderThresholds(client: PoolClient, itemIds: number[]): Promise<LowStockSignal[]> {
          const ids = [...new Set(itemIds)];
          if (ids.length === 0) {
               return [];
          }

          const { rows } = await client.query<{
               id: number;
               sku: string;
               reorder_threshold: number;
               total_available: number;
          }>(
               `
      SELECT
        i.id,
        i.sku,
        i.reorder_threshold,
        COALESCE(SUM(b.available_qty) FILTER (
          WHERE b.status = 'AVAILABLE'
            AND (b.expiry_date IS NULL OR b.expiry_date > CURRENT_DATE)
        ), 0)::int AS total_available
      FROM item i
      LEFT JOIN batch b ON b.item_id = i.id
      WHERE i.id = ANY($1::int[])
      GROUP BY i.id, i.sku, i.reorder_threshold
      ORDER BY i.id
    `,
               [ids]
          );

          return rows
               .filter((row) => row.reorder_threshold > 0 && row.total_available <= row.reorder_threshold)
               .map((row) => ({
                    itemId: row.id,
                    sku: row.sku,
                    totalAvailable: row.total_available,
                    reorderThreshold: row.reorder_threshold,
               }));
     }
}

export function toBatch(row: BatchRow): Batch {
     return {
          id: row.id,
          itemId: row.item_id,
          sku: row.sku,
          lotNo: row.lot_no,
          quantity: row.quantity,
          availableQty: row.available_qty,
          expiryDate: row.expiry_date,
          status: row.status,
     };
}

function assertPositiveInteger(value: number, label: string): void {
     if (!Number.isInteger(value) || value <= 0) {
          throw new InvalidQuantityError(`${label} must be a positive whole number, got ${value}`);
     }
}
