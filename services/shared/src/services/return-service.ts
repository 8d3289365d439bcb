import { PoolClient } from 'pg';
import {
     Actor,
     Batch,
     CreateReturnRequest,
     ProcessedReturn,
     ProcessReturnRequest,
     ReturnDisposition,
     ReturnReason,
     ReturnRecord,
     ReturnStatus,
} from '../types/fulfillment.types';
import {
     ConcurrentModificationError,
     DomainError,
     InvalidQuantityError,
     InvalidTransitionError,
     OrderItemNotFoundError,
     PrivilegeRequiredError,
     ReturnAlreadyProcessedError,
     ReturnNotFoundError,
} from '../utils/errors';
import { isUniqueViolation } from '../db/pg-errors';
import { shortReference } from '../utils/identifiers';
import { createChildLogger } from '../utils/logger';
import { OrderService } from './order-service';
import { recordDomainEvent } from './outbox';
import { StockLedger } from './stock-ledger';
import { TransactionLogService } from './transaction-log';

interface ReturnRow {
     id: number;
     return_no: string;
     order_id: number;
     order_item_id: number;
     item_id: number;
     sku: string;
     qty_returned: number;
     reason: ReturnReason;
     status: ReturnStatus;
     disposition: ReturnDisposition | null;
     qty_accepted: number | null;
     batch_id: number | null;
     notes: string;
     created_by: string;
     processed_by: string | null;
     created_at: Date;
     processed_at: Date | null;
}

const SELECT_RETURN = `
      SELECT
        r.id,
        r.return_no,
        oi.order_id,
        r.order_item_id,
        oi.item_id,
        i.sku,
        r.qty_returned,
        r.reason,
        r.status,
        r.disposition,
        r.qty_accepted,
        r.batch_id,
        r.notes,
        r.created_by,
        r.processed_by,
        r.created_at,
        r.processed_at
      FROM return_request r
      JOIN order_item oi ON oi.id = r.order_item_id
      JOIN item i ON i.id = oi.item_id`;

export const RETURN_REASONS: readonly ReturnReason[] = [
     'damaged',
     'wrong_item',
     'defective',
     'customer_change',
     'other',
];

export const RETURN_DISPOSITIONS: readonly ReturnDisposition[] = [
     'restock_original',
     'restock_new',
     'quarantine',
     'scrap',
];

const RETURNABLE_STATUSES = ['shipped', 'delivered'];

const STATUS_BY_DISPOSITION: Record<ReturnDisposition, ReturnStatus> = {
     restock_original: 'restocked',
     restock_new: 'restocked',
     quarantine: 'quarantined',
     scrap: 'scrapped',
};

/**
 * Customer returns against shipped order lines. A return is opened in
 * `pending` and processed once by a privileged actor, who decides where the
 * accepted units go. Every stock movement goes through the StockLedger.
 */
export class ReturnService {
     constructor(
          private readonly orders: OrderService = new OrderService(),
          private readonly ledger: StockLedger = new StockLedger(),
          private readonly transactionLog: TransactionLogService = new TransactionLogService()
     ) {}

     async createReturn(
          client: PoolClient,
          request: CreateReturnRequest,
          actor: Actor
     ): Promise<ReturnRecord> {
          const { orderId, orderItemId, quantity, reason } = request;

          if (!Number.isInteger(quantity) || quantity <= 0) {
               throw new InvalidQuantityError(`Returned quantity must be a positive whole number, got ${quantity}`);
          }
          if (!RETURN_REASONS.includes(reason)) {
               throw new InvalidQuantityError(`Unknown return reason ${reason}`);
          }

          const order = await this.orders.lockOrder(client, orderId);
          if (!RETURNABLE_STATUSES.includes(order.status)) {
               throw new InvalidTransitionError(
                    order.id,
                    order.status,
                    'return',
                    'only shipped or delivered orders accept returns'
               );
          }

          const items = await this.orders.listOrderItems(client, order.id);
          const item = items.find((candidate) => candidate.id === orderItemId);
          if (!item) {
               throw new OrderItemNotFoundError(order.id, orderItemId);
          }

          const { rows: returned } = await client.query<{ returned: number }>(
               `SELECT COALESCE(SUM(qty_returned), 0)::int AS returned FROM return_request WHERE order_item_id = $1`,
               [item.id]
          );
          const eligible = item.qtyAllocated - Number(returned[0]?.returned ?? 0);
          if (quantity > eligible) {
               throw new InvalidQuantityError(
                    `Return of ${quantity} exceeds the ${eligible} units of order item ${item.id} still open for return`
               );
          }

          const returnNo = shortReference('RMA');
          let returnId: number;
          try {
               const { rows } = await client.query<{ id: number }>(
                    `
        INSERT INTO return_request (return_no, order_item_id, qty_returned, reason, notes, created_by)
        VALUES ($1, $2, $3, $4, $5, $6)
        RETURNING id
      `,
                    [returnNo, item.id, quantity, reason, request.notes ?? '', actor.id]
               );
               returnId = rows[0].id;
          } catch (err) {
               if (isUniqueViolation(err, 'return_request_return_no_key')) {
                    throw new ConcurrentModificationError('return_no', returnNo);
               }
               throw err;
          }

          await recordDomainEvent(client, 'ReturnRequested', {
               returnNo,
               orderId: order.id,
               orderNo: order.orderNo,
               orderItemId: item.id,
               sku: item.sku,
               quantity,
               reason,
          });

          createChildLogger({ orderId: order.id, actor: actor.id }).info(
               { returnNo, orderItemId: item.id, quantity, reason },
               'Return requested'
          );

          return this.getReturn(client, returnId);
     }

     async processReturn(
          client: PoolClient,
          returnId: number,
          request: ProcessReturnRequest,
          actor: Actor
     ): Promise<ProcessedReturn> {
          if (!actor.privileged) {
               throw new PrivilegeRequiredError('Processing a return');
          }
          if (!RETURN_DISPOSITIONS.includes(request.disposition)) {
               throw new InvalidQuantityError(`Unknown return disposition ${request.disposition}`);
          }

          const current = await this.selectReturn(client, returnId, true);
          if (current.status !== 'pending') {
               throw new ReturnAlreadyProcessedError(current.returnNo, current.status);
          }

          const accepted = request.quantityAccepted ?? current.qtyReturned;
          if (!Number.isInteger(accepted) || accepted <= 0 || accepted > current.qtyReturned) {
               throw new InvalidQuantityError(
                    `Accepted quantity must be between 1 and ${current.qtyReturned}, got ${accepted}`
               );
          }

          const metadata = {
               returnNo: current.returnNo,
               orderItemId: current.orderItemId,
               ...(request.notes ? { notes: request.notes } : {}),
          };
          const context = { orderId: current.orderId, metadata };

          let batches: Batch[] = [];
          switch (request.disposition) {
               case 'restock_original':
                    batches = await this.restockShippedBatches(client, current, accepted, actor, metadata);
                    break;
               case 'restock_new':
                    batches = [
                         await this.ledger.receiveBatch(
                              client,
                              {
                                   sku: current.sku,
                                   lotNo: shortReference('RETURN'),
                                   quantity: accepted,
                                   expiryDate: request.expiryDate,
                              },
                              actor,
                              { ...context, metadata: { ...metadata, reason: 'return_new_batch' } }
                         ),
                    ];
                    break;
               case 'quarantine':
                    batches = [
                         await this.ledger.receiveBatch(
                              client,
                              {
                                   sku: current.sku,
                                   lotNo: shortReference('QUARANTINE'),
                                   quantity: accepted,
                                   expiryDate: request.expiryDate,
                                   status: 'QUARANTINE',
                              },
                              actor,
                              { ...context, metadata: { ...metadata, reason: 'return_quarantine' } }
                         ),
                    ];
                    break;
               case 'scrap':
                    // Scrapped units never re-enter a batch
                    await this.transactionLog.append(client, {
                         type: 'ADJUST',
                         qty: -accepted,
                         itemId: current.itemId,
                         orderId: current.orderId,
                         actor: actor.id,
                         metadata: { ...metadata, reason: 'return_scrap' },
                    });
                    break;
          }

          const status = STATUS_BY_DISPOSITION[request.disposition];
          const notes = request.notes
               ? [current.notes, `[Processed] ${request.notes}`].filter((part) => part.length > 0).join('\n')
               : current.notes;

          await client.query(
               `
      UPDATE return_request
      SET status = $1,
          disposition = $2,
          qty_accepted = $3,
          batch_id = $4,
          notes = $5,
          processed_by = $6,
          processed_at = NOW()
      WHERE id = $7
    `,
               [
                    status,
                    request.disposition,
                    accepted,
                    batches.length > 0 ? batches[0].id : null,
                    notes,
                    actor.id,
                    current.id,
               ]
          );

          await recordDomainEvent(client, 'ReturnProcessed', {
               returnNo: current.returnNo,
               orderId: current.orderId,
               sku: current.sku,
               disposition: request.disposition,
               qtyReturned: current.qtyReturned,
               qtyAccepted: accepted,
               batchIds: batches.map((batch) => batch.id),
          });

          createChildLogger({ orderId: current.orderId, actor: actor.id }).info(
               { returnNo: current.returnNo, disposition: request.disposition, qtyAccepted: accepted },
               'Return processed'
          );

          const processed = await this.getReturn(client, current.id);
          return { ...processed, batches };
     }

     async getReturn(client: PoolClient, returnId: number): Promise<ReturnRecord> {
          return this.selectReturn(client, returnId, false);
     }

     async listReturns(
          client: PoolClient,
          status?: ReturnStatus,
          limit: number = 100
     ): Promise<ReturnRecord[]> {
          const { rows } = await client.query<ReturnRow>(
               `${SELECT_RETURN}
      WHERE ($1::text IS NULL OR r.status = $1)
      ORDER BY r.id DESC
      LIMIT $2`,
               [status ?? null, limit]
          );
          return rows.map(toReturn);
     }

     /**
      * Puts accepted units back into the batches the line shipped from, in the
      * order they shipped. A batch takes back at most what it shipped for this
      * line less what earlier returns already restocked into it.
      */
     private async restockShippedBatches(
          client: PoolClient,
          current: ReturnRecord,
          accepted: number,
          actor: Actor,
          metadata: Record<string, unknown>
     ): Promise<Batch[]> {
          const { rows: sources } = await client.query<{ batch_id: number; restockable: number }>(
               `
      SELECT batch_id, SUM(-qty)::int AS restockable
      FROM transaction_log
      WHERE order_id = $1
        AND batch_id IS NOT NULL
        AND (metadata->>'orderItemId')::int = $2
        AND (type = 'SHIP' OR (type = 'ADJUST' AND metadata->>'reason' = 'return_restock'))
      GROUP BY batch_id
      ORDER BY MIN(id)
    `,
               [current.orderId, current.orderItemId]
          );

          const restockable = sources.reduce((sum, source) => sum + Math.max(0, Number(source.restockable)), 0);
          if (restockable < accepted) {
               throw new DomainError(
                    `Only ${restockable} units of order item ${current.orderItemId} can go back to their original batches`,
                    'RESTOCK_EXCEEDS_SHIPPED',
                    409
               );
          }

          const batches: Batch[] = [];
          let remaining = accepted;
          for (const source of sources) {
               const take = Math.min(remaining, Math.max(0, Number(source.restockable)));
               if (take === 0) {
                    continue;
               }
               batches.push(
                    await this.ledger.adjustBatch(
                         client,
                         { batchId: source.batch_id, quantityDelta: take, reason: 'return_restock' },
                         actor,
                         { orderId: current.orderId, metadata: { ...metadata, source: 'return' } }
                    )
               );
               remaining -= take;
               if (remaining === 0) {
                    break;
               }
          }

          return batches;
     }

     private async selectReturn(client: PoolClient, returnId: number, lock: boolean): Promise<ReturnRecord> {
          const { rows } = await client.query<ReturnRow>(
               `${SELECT_RETURN}
      WHERE r.id = $1
      ${lock ? 'FOR UPDATE OF r' : ''}`,
               [returnId]
          );

          if (rows.length === 0) {
               throw new ReturnNotFoundError(returnId);
          }

          return toReturn(rows[0]);
     }
}

function toReturn(row: ReturnRow): ReturnRecord {
     return {
          id: row.id,
          returnNo: row.return_no,
          orderId: row.order_id,
          orderItemId: row.order_item_id,
          itemId: row.item_id,
          sku: row.sku,
          qtyReturned: row.qty_returned,
          reason: row.reason,
          status: row.status,
          disposition: row.disposition,
          qtyAccepted: row.qty_accepted,
          batchId: row.batch_id,
          notes: row.notes,
          createdBy: row.created_by,
          processedBy: row.processed_by,
          createdAt: row.created_at,
          processedAt: row.processed_at,
     };
}
