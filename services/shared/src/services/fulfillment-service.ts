import { PoolClient } from 'pg';
import {
     Actor,
     AdjustmentLine,
     AdjustmentReport,
     Allocation,
     AllocationResult,
     DeallocationResult,
     Order,
     OrderItem,
     PendingAllocationRun,
     PendingOrderOutcome,
     Shipment,
     ShipOrderRequest,
} from '../types/fulfillment.types';
import { InvalidQuantityError, OrderItemNotFoundError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { WorkQueue } from '../structures/work-queue';
import { FefoAllocator } from './allocation-service';
import { assertTransition } from './order-state-machine';
import { OrderService } from './order-service';
import { recordDomainEvent } from './outbox';
import { ShipmentService } from './shipment-service';
import { TransactionLogService } from './transaction-log';

/**
 * Order lifecycle. Every operation locks the order row, checks the requested
 * transition against the order's current status and the actor, performs the
 * side effects and records the new status with an outbox event, all on the
 * caller's transaction.
 */
export class FulfillmentService {
     constructor(
          private readonly orders: OrderService = new OrderService(),
          private readonly allocator: FefoAllocator = new FefoAllocator(),
          private readonly shipments: ShipmentService = new ShipmentService(),
          private readonly transactionLog: TransactionLogService = new TransactionLogService()
     ) {}

     async allocate(client: PoolClient, orderId: number, actor: Actor): Promise<AllocationResult> {
          const order = await this.orders.lockOrder(client, orderId);
          assertTransition(order.id, order.status, 'allocate', actor);

          const result = await this.allocator.allocateOrder(client, order, actor);

          if (result.status !== order.status) {
               await this.orders.updateStatus(client, order.id, result.status);
          }
          if (result.totalFulfilled > 0) {
               await recordDomainEvent(client, 'OrderAllocated', {
                    orderId: order.id,
                    orderNo: order.orderNo,
                    totalRequested: result.totalRequested,
                    totalFulfilled: result.totalFulfilled,
                    fullyAllocated: result.fullyAllocated,
               });
          }

          return result;
     }

     /**
      * Allocates every `new` order, oldest first, up to `limit` orders. Each
      * order goes through the same path as a single allocation; the run
      * reports how each one came out.
      */
     async allocatePending(
          client: PoolClient,
          actor: Actor,
          limit: number = 100
     ): Promise<PendingAllocationRun> {
          if (!Number.isInteger(limit) || limit <= 0) {
               throw new InvalidQuantityError(`Limit must be a positive whole number, got ${limit}`);
          }

          const pending = await this.orders.listPendingOrders(client, limit);
          const run: PendingAllocationRun = {
               ordersProcessed: 0,
               fullyAllocated: 0,
               partiallyAllocated: 0,
               unallocated: 0,
               results: [],
          };
          if (pending.length === 0) {
               return run;
          }

          const queue = new WorkQueue<Order>(Math.max(16, pending.length));
          for (const order of pending) {
               queue.enqueue(order);
          }

          while (!queue.isEmpty()) {
               const order = queue.dequeue();
               const result = await this.allocate(client, order.id, actor);
               const outcome = outcomeOf(result);

               run.ordersProcessed++;
               if (outcome === 'fully_allocated') {
                    run.fullyAllocated++;
               } else if (outcome === 'partially_allocated') {
                    run.partiallyAllocated++;
               } else {
                    run.unallocated++;
               }

               run.results.push({
                    orderId: order.id,
                    orderNo: order.orderNo,
                    outcome,
                    totalRequested: result.totalRequested,
                    totalFulfilled: result.totalFulfilled,
               });
          }

          createChildLogger({ actor: actor.id }).info(
               {
                    ordersProcessed: run.ordersProcessed,
                    fullyAllocated: run.fullyAllocated,
                    partiallyAllocated: run.partiallyAllocated,
                    unallocated: run.unallocated,
               },
               'Pending orders allocated'
          );

          return run;
     }

     async deallocate(client: PoolClient, orderId: number, actor: Actor): Promise<DeallocationResult> {
          const order = await this.orders.lockOrder(client, orderId);
          assertTransition(order.id, order.status, 'deallocate', actor);

          const result = await this.allocator.deallocateOrder(client, order, actor, 'deallocate');

          if (result.status !== order.status) {
               await this.orders.updateStatus(client, order.id, result.status);
          }
          if (result.allocationCount > 0) {
               await recordDomainEvent(client, 'OrderDeallocated', {
                    orderId: order.id,
                    orderNo: order.orderNo,
                    releasedQty: result.releasedQty,
               });
          }

          return result;
     }

     async cancel(client: PoolClient, orderId: number, actor: Actor): Promise<DeallocationResult> {
          const order = await this.orders.lockOrder(client, orderId);
          assertTransition(order.id, order.status, 'cancel', actor);

          const result = await this.allocator.deallocateOrder(client, order, actor, 'cancel');
          await this.orders.updateStatus(client, order.id, result.status);
          await recordDomainEvent(client, 'OrderCancelled', {
               orderId: order.id,
               orderNo: order.orderNo,
               previousStatus: order.status,
               releasedQty: result.releasedQty,
          });

          createChildLogger({ orderId: order.id, actor: actor.id }).info(
               { previousStatus: order.status, releasedQty: result.releasedQty },
               'Order cancelled'
          );

          return result;
     }

     /**
      * Records picked quantities. Lines missing from `pickedQuantities` are
      * taken as picked in full; a shortfall against the allocation is logged
      * as ADJUST entries on the batches that came up short.
      */
     async pick(
          client: PoolClient,
          orderId: number,
          actor: Actor,
          pickedQuantities: Map<number, number> = new Map()
     ): Promise<AdjustmentReport> {
          const order = await this.orders.lockOrder(client, orderId);
          assertTransition(order.id, order.status, 'pick', actor);

          const items = await this.orders.listOrderItems(client, order.id);
          assertItemsBelongToOrder(order.id, items, pickedQuantities.keys());

          const lines = items.map((item) =>
               planLine(item, item.qtyAllocated, pickedQuantities.get(item.id), 'Picked')
          );
          const allocations = await this.orders.listAllocations(client, order.id);

          for (const [index, line] of lines.entries()) {
               await client.query(`UPDATE order_item SET qty_picked = $1 WHERE id = $2`, [
                    line.recorded,
                    line.orderItemId,
               ]);
               await this.logDiscrepancy(client, order.id, items[index], line, allocations, 'pick', actor);
          }

          await this.orders.updateStatus(client, order.id, 'picked');

          return report(order.id, 'picked', lines);
     }

     /**
      * Records packed quantities and notes. Lines missing from
      * `packedQuantities` keep their picked quantity. Like picking, packing is
      * measured against the allocation, so a short pick that is packed as
      * picked is logged again at this stage.
      */
     async pack(
          client: PoolClient,
          orderId: number,
          actor: Actor,
          packedQuantities: Map<number, number> = new Map(),
          notes: Map<number, string> = new Map()
     ): Promise<AdjustmentReport> {
          const order = await this.orders.lockOrder(client, orderId);
          assertTransition(order.id, order.status, 'pack', actor);

          const items = await this.orders.listOrderItems(client, order.id);
          assertItemsBelongToOrder(order.id, items, packedQuantities.keys());
          assertItemsBelongToOrder(order.id, items, notes.keys());

          const lines = items.map((item) =>
               planLine(item, item.qtyPicked ?? item.qtyAllocated, packedQuantities.get(item.id), 'Packed')
          );
          const allocations = await this.orders.listAllocations(client, order.id);

          for (const [index, line] of lines.entries()) {
               await client.query(
                    `
        UPDATE order_item
        SET qty_picked = $1,
            pack_notes = COALESCE($2, pack_notes)
        WHERE id = $3
      `,
                    [line.recorded, notes.get(line.orderItemId) ?? null, line.orderItemId]
               );
               await this.logDiscrepancy(client, order.id, items[index], line, allocations, 'pack', actor, {
                    notes: notes.get(line.orderItemId),
               });
          }

          await this.orders.updateStatus(client, order.id, 'packed');

          return report(order.id, 'packed', lines);
     }

     async ship(
          client: PoolClient,
          orderId: number,
          actor: Actor,
          request: ShipOrderRequest
     ): Promise<Shipment> {
          const order = await this.orders.lockOrder(client, orderId);
          assertTransition(order.id, order.status, 'ship', actor);

          const { shipment, lowStock } = await this.shipments.shipOrder(client, order, request, actor);
          await this.orders.updateStatus(client, order.id, 'shipped');
          await recordDomainEvent(client, 'OrderShipped', {
               orderId: order.id,
               orderNo: order.orderNo,
               shipmentNo: shipment.shipmentNo,
               trackingNo: shipment.trackingNo,
               carrier: shipment.carrier,
               skippedPacking: order.status !== 'packed',
               lowStockSkus: lowStock.map((signal) => signal.sku),
          });

          return shipment;
     }

     async deliver(client: PoolClient, orderId: number, actor: Actor): Promise<Shipment> {
          const order = await this.orders.lockOrder(client, orderId);
          assertTransition(order.id, order.status, 'deliver', actor);

          const shipment = await this.shipments.markDelivered(client, order.id);
          await this.orders.updateStatus(client, order.id, 'delivered');
          await recordDomainEvent(client, 'OrderDelivered', {
               orderId: order.id,
               orderNo: order.orderNo,
               shipmentNo: shipment.shipmentNo,
               deliveredBy: actor.id,
          });

          return shipment;
     }

     /**
      * Splits a line's recorded quantity over its allocations in draw order
      * (earliest expiry first) and writes one ADJUST entry per allocation that
      * came up short.
      */
     private async logDiscrepancy(
          client: PoolClient,
          orderId: number,
          item: OrderItem,
          line: AdjustmentLine,
          allocations: Allocation[],
          stage: 'pick' | 'pack',
          actor: Actor,
          extra: { notes?: string } = {}
     ): Promise<void> {
          if (line.delta === 0) {
               return;
          }

          let unassigned = line.recorded;
          for (const allocation of allocations) {
               if (allocation.orderItemId !== item.id) {
                    continue;
               }
               const recorded = Math.min(unassigned, allocation.qtyAllocated);
               unassigned -= recorded;
               if (recorded === allocation.qtyAllocated) {
                    continue;
               }

               await this.transactionLog.append(client, {
                    type: 'ADJUST',
                    qty: recorded - allocation.qtyAllocated,
                    itemId: item.itemId,
                    batchId: allocation.batchId,
                    orderId,
                    actor: actor.id,
                    metadata: {
                         reason: `${stage}_adjust`,
                         orderItemId: item.id,
                         lotNo: allocation.lotNo,
                         allocated: allocation.qtyAllocated,
                         recorded,
                         ...(extra.notes !== undefined ? { notes: extra.notes } : {}),
                    },
               });
          }

          createChildLogger({ orderId, orderItemId: item.id }).warn(
               { stage, delta: line.delta, sku: item.sku },
               'Quantity discrepancy recorded'
          );
     }
}

function assertItemsBelongToOrder(
     orderId: number,
     items: OrderItem[],
     orderItemIds: Iterable<number>
): void {
     const known = new Set(items.map((item) => item.id));
     for (const id of orderItemIds) {
          if (!known.has(id)) {
               throw new OrderItemNotFoundError(orderId, id);
          }
     }
}

// `previous` is what the prior stage recorded; the delta is always against the allocation
function planLine(
     item: OrderItem,
     previous: number,
     requested: number | undefined,
     label: string
): AdjustmentLine {
     const recorded = requested ?? previous;
     if (!Number.isInteger(recorded) || recorded < 0 || recorded > item.qtyAllocated) {
          throw new InvalidQuantityError(
               `${label} quantity ${recorded} for order item ${item.id} must be between 0 and ${item.qtyAllocated}`
          );
     }

     return {
          orderItemId: item.id,
          sku: item.sku,
          allocated: item.qtyAllocated,
          previous,
          recorded,
          delta: recorded - item.qtyAllocated,
     };
}

function outcomeOf(result: AllocationResult): PendingOrderOutcome {
     if (result.fullyAllocated) {
          return 'fully_allocated';
     }
     return result.totalFulfilled > 0 ? 'partially_allocated' : 'unallocated';
}

function report(
     orderId: number,
     status: AdjustmentReport['status'],
     lines: AdjustmentLine[]
): AdjustmentReport {
     return {
          orderId,
          status,
          lines,
          discrepancies: lines.filter((line) => line.delta !== 0).length,
     };
}
