import { PoolClient } from 'pg';
import {
     Actor,
     AllocationLineResult,
     AllocationResult,
     BatchDraw,
     DeallocationResult,
     EligibleBatch,
     Order,
     OrderItem,
} from '../types/fulfillment.types';
import { WorkQueue } from '../structures/work-queue';
import { SelectionStack } from '../structures/selection-stack';
import { createChildLogger } from '../utils/logger';
import { nextStatus } from './order-state-machine';
import { OrderService } from './order-service';
import { StockLedger } from './stock-ledger';
import { TransactionLogService } from './transaction-log';

/**
 * Reserves stock against an order's lines, earliest-expiring batch first,
 * and reverses those reservations. Runs inside the caller's transaction and
 * never changes the order's status itself; the result says what it should be.
 */
export class FefoAllocator {
     constructor(
          private readonly ledger: StockLedger = new StockLedger(),
          private readonly orders: OrderService = new OrderService(),
          private readonly transactionLog: TransactionLogService = new TransactionLogService()
     ) {}

     async allocateOrder(client: PoolClient, order: Order, actor: Actor): Promise<AllocationResult> {
          const log = createChildLogger({ orderId: order.id, orderNo: order.orderNo });
          const items = await this.orders.listOrderItems(client, order.id);

          // Lines are served in their stored sequence
          const queue = new WorkQueue<OrderItem>(Math.max(items.length, 1));
          for (const item of items) {
               queue.enqueue(item);
          }

          const perItem: AllocationLineResult[] = [];
          while (!queue.isEmpty()) {
               perItem.push(await this.allocateLine(client, order, queue.dequeue(), actor));
          }

          const totalRequested = perItem.reduce((sum, line) => sum + line.requested, 0);
          const totalFulfilled = perItem.reduce((sum, line) => sum + line.fulfilled, 0);
          const status = nextStatus(order.status, 'allocate', { allocatedUnits: totalFulfilled });

          log.info({ totalRequested, totalFulfilled, status }, 'Order allocation computed');

          return {
               orderId: order.id,
               orderNo: order.orderNo,
               status,
               perItem,
               totalRequested,
               totalFulfilled,
               fullyAllocated: perItem.every((line) => line.unfulfilled === 0),
               nothingAvailable: totalFulfilled === 0,
          };
     }

     /**
      * Returns every live allocation of the order to its batch and clears the
      * lines' allocated and picked quantities. An order with no allocations is
      * left untouched.
      */
     async deallocateOrder(
          client: PoolClient,
          order: Order,
          actor: Actor,
          action: 'deallocate' | 'cancel' = 'deallocate'
     ): Promise<DeallocationResult> {
          const allocations = await this.orders.listAllocations(client, order.id, true);
          const status = nextStatus(order.status, action);

          if (allocations.length === 0) {
               return { orderId: order.id, status, releasedQty: 0, allocationCount: 0 };
          }

          let releasedQty = 0;
          for (const allocation of allocations) {
               await this.ledger.release(client, allocation.batchId, allocation.qtyAllocated);
               await this.transactionLog.append(client, {
                    type: 'RETURN',
                    qty: allocation.qtyAllocated,
                    itemId: allocation.itemId,
                    batchId: allocation.batchId,
                    orderId: order.id,
                    actor: actor.id,
                    metadata: {
                         orderItemId: allocation.orderItemId,
                         lotNo: allocation.lotNo,
                         reason: action,
                    },
               });
               releasedQty += allocation.qtyAllocated;
          }

          await this.orders.deleteAllocations(
               client,
               allocations.map((a) => a.id)
          );

          await client.query(
               `
      UPDATE order_item
      SET qty_allocated = 0,
          qty_picked = NULL
      WHERE order_id = $1
    `,
               [order.id]
          );

          createChildLogger({ orderId: order.id, orderNo: order.orderNo }).info(
               { releasedQty, allocationCount: allocations.length, action },
               'Order allocations released'
          );

          return { orderId: order.id, status, releasedQty, allocationCount: allocations.length };
     }

     private async allocateLine(
          client: PoolClient,
          order: Order,
          line: OrderItem,
          actor: Actor
     ): Promise<AllocationLineResult> {
          let remaining = line.qtyRequested - line.qtyAllocated;
          const draws: BatchDraw[] = [];

          if (remaining > 0) {
               const candidates = await this.ledger.findEligibleBatches(client, line.itemId);

               // Pushed in reverse so the earliest expiry pops first
               const stack = new SelectionStack<EligibleBatch>(Math.max(candidates.length, 1));
               for (let i = candidates.length - 1; i >= 0; i--) {
                    stack.push(candidates[i]);
               }

               while (remaining > 0 && !stack.isEmpty()) {
                    const batch = stack.pop();
                    const take = Math.min(remaining, batch.availableQty);
                    if (take <= 0) {
                         continue;
                    }

                    await this.ledger.reserve(client, batch.id, take);
                    await client.query(
                         `
          INSERT INTO allocation (order_item_id, batch_id, qty_allocated)
          VALUES ($1, $2, $3)
        `,
                         [line.id, batch.id, take]
                    );
                    await this.transactionLog.append(client, {
                         type: 'RESERVE',
                         qty: take,
                         itemId: line.itemId,
                         batchId: batch.id,
                         orderId: order.id,
                         actor: actor.id,
                         metadata: { orderItemId: line.id, lotNo: batch.lotNo },
                    });

                    draws.push({
                         batchId: batch.id,
                         lotNo: batch.lotNo,
                         expiryDate: batch.expiryDate,
                         qty: take,
                    });
                    remaining -= take;
               }
          }

          const fulfilled = draws.reduce((sum, draw) => sum + draw.qty, 0);
          if (fulfilled > 0) {
               await client.query(
                    `
        UPDATE order_item
        SET qty_allocated = qty_allocated + $1
        WHERE id = $2
      `,
                    [fulfilled, line.id]
               );
          }

          return {
               orderItemId: line.id,
               itemId: line.itemId,
               sku: line.sku,
               requested: line.qtyRequested,
               fulfilled,
               unfulfilled: Math.max(remaining, 0),
               draws,
          };
     }
}
