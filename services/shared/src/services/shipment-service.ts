import { PoolClient } from 'pg';
import {
     Actor,
     LowStockSignal,
     Order,
     Shipment,
     ShipOrderRequest,
} from '../types/fulfillment.types';
import { ConcurrentModificationError, ShipmentNotFoundError } from '../utils/errors';
import { isUniqueViolation } from '../db/pg-errors';
import { generateTrackingNumber, shipmentNumber } from '../utils/identifiers';
import { logger } from '../utils/logger';
import { OrderService, ShipmentRow, toShipment } from './order-service';
import { recordDomainEvent } from './outbox';
import { StockLedger } from './stock-ledger';
import { TransactionLogService } from './transaction-log';

const SHIPMENT_COLUMNS =
     'id, order_id, shipment_no, tracking_no, carrier, shipping_address, notes, status, shipped_at, delivered_at';

export interface ShipmentOutcome {
     shipment: Shipment;
     lowStock: LowStockSignal[];
}

/**
 * Turns an order's live allocations into permanent SHIP ledger entries.
 * Reserved units already left `available_qty` at allocation time, so shipping
 * only records the consumption and drops the allocation rows.
 */
export class ShipmentService {
     constructor(
          private readonly orders: OrderService = new OrderService(),
          private readonly ledger: StockLedger = new StockLedger(),
          private readonly transactionLog: TransactionLogService = new TransactionLogService()
     ) {}

     async shipOrder(
          client: PoolClient,
          order: Order,
          request: ShipOrderRequest,
          actor: Actor
     ): Promise<ShipmentOutcome> {
          const allocations = await this.orders.listAllocations(client, order.id, true);
          const shippedAt = new Date();
          const shipmentNo = shipmentNumber(order.orderNo, shippedAt);

          let shipment: Shipment;
          try {
               const { rows } = await client.query<ShipmentRow>(
                    `
        INSERT INTO shipment (
          order_id,
          shipment_no,
          tracking_no,
          carrier,
          shipping_address,
          notes,
          status,
          shipped_at
        ) VALUES ($1, $2, $3, $4, $5, $6, 'SHIPPED', $7)
        RETURNING ${SHIPMENT_COLUMNS}
      `,
                    [
                         order.id,
                         shipmentNo,
                         generateTrackingNumber(),
                         request.carrier,
                         request.address,
                         request.notes ?? null,
                         shippedAt,
                    ]
               );
               shipment = toShipment(rows[0]);
          } catch (err) {
               if (
                    isUniqueViolation(err, 'shipment_shipment_no_key') ||
                    isUniqueViolation(err, 'shipment_tracking_no_key')
               ) {
                    throw new ConcurrentModificationError('shipment', shipmentNo);
               }
               throw err;
          }

          for (const allocation of allocations) {
               await this.transactionLog.append(client, {
                    type: 'SHIP',
                    qty: -allocation.qtyAllocated,
                    itemId: allocation.itemId,
                    batchId: allocation.batchId,
                    orderId: order.id,
                    shipmentId: shipment.id,
                    actor: actor.id,
                    metadata: {
                         orderItemId: allocation.orderItemId,
                         lotNo: allocation.lotNo,
                         shipmentNo,
                    },
               });
          }

          await this.orders.deleteAllocations(
               client,
               allocations.map((a) => a.id)
          );

          const lowStock = await this.ledger.checkReorderThresholds(
               client,
               allocations.map((a) => a.itemId)
          );
          for (const signal of lowStock) {
               await recordDomainEvent(client, 'LowStockDetected', { ...signal, orderId: order.id });
               logger.warn(
                    { sku: signal.sku, totalAvailable: signal.totalAvailable, threshold: signal.reorderThreshold },
                    'Stock at or below reorder threshold'
               );
          }

          logger.info(
               { orderId: order.id, shipmentNo, allocationCount: allocations.length },
               'Order shipped'
          );

          return { shipment, lowStock };
     }

     async markDelivered(client: PoolClient, orderId: number): Promise<Shipment> {
          const { rows } = await client.query<ShipmentRow>(
               `
      UPDATE shipment
      SET status = 'DELIVERED',
          delivered_at = NOW()
      WHERE order_id = $1
      RETURNING ${SHIPMENT_COLUMNS}
    `,
               [orderId]
          );

          if (rows.length === 0) {
               throw new ShipmentNotFoundError(orderId);
          }

          return toShipment(rows[0]);
     }
}
