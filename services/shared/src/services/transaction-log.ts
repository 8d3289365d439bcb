import { PoolClient } from 'pg';
import {
     NewTransactionLogEntry,
     TransactionLogEntry,
     TransactionType,
} from '../types/fulfillment.types';

interface TransactionLogRow {
     id: string;
     type: TransactionType;
     qty: number;
     item_id: number | null;
     batch_id: number | null;
     order_id: number | null;
     shipment_id: number | null;
     actor: string;
     metadata: Record<string, unknown> | null;
     created_at: Date;
}

const SELECT_COLUMNS = `
       id, type, qty, item_id, batch_id, order_id, shipment_id, actor, metadata, created_at
     FROM transaction_log`;

/**
 * Append-only audit trail of every stock-affecting operation. Rows are never
 * updated or deleted (the schema rejects both); reporting collaborators read
 * them through the list methods.
 */
export class TransactionLogService {
     async append(client: PoolClient, entry: NewTransactionLogEntry): Promise<void> {
          await client.query(
               `
      INSERT INTO transaction_log (
        type,
        qty,
        item_id,
        batch_id,
        order_id,
        shipment_id,
        actor,
        metadata
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb)
    `,
               [
                    entry.type,
                    entry.qty,
                    entry.itemId ?? null,
                    entry.batchId ?? null,
                    entry.orderId ?? null,
                    entry.shipmentId ?? null,
                    entry.actor,
                    JSON.stringify(entry.metadata ?? {}),
               ]
          );
     }

     async listForOrder(client: PoolClient, orderId: number): Promise<TransactionLogEntry[]> {
          const { rows } = await client.query<TransactionLogRow>(
               `SELECT ${SELECT_COLUMNS} WHERE order_id = $1 ORDER BY id`,
               [orderId]
          );
          return rows.map(toEntry);
     }

     async listForBatch(client: PoolClient, batchId: number): Promise<TransactionLogEntry[]> {
          const { rows } = await client.query<TransactionLogRow>(
               `SELECT ${SELECT_COLUMNS} WHERE batch_id = $1 ORDER BY id`,
               [batchId]
          );
          return rows.map(toEntry);
     }
}

function toEntry(row: TransactionLogRow): TransactionLogEntry {
     return {
          // BIGSERIAL comes back from pg as a string
          id: parseInt(String(row.id), 10),
          type: row.type,
          qty: row.qty,
          itemId: row.item_id,
          batchId: row.batch_id,
          orderId: row.order_id,
          shipmentId: row.shipment_id,
          actor: row.actor,
          metadata: row.metadata ?? {},
          createdAt: row.created_at,
     };
}
