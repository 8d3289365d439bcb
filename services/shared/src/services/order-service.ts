import { PoolClient } from 'pg';
import {
     Allocation,
     CreateOrderRequest,
     Order,
     OrderDetail,
     OrderItem,
     OrderStatus,
     Shipment,
     ShipmentStatus,
} from '../types/fulfillment.types';
import {
     ConcurrentModificationError,
     DomainError,
     InvalidQuantityError,
     ItemNotFoundError,
     OrderNotFoundError,
} from '../utils/errors';
import { isUniqueViolation } from '../db/pg-errors';
import { nextOrderNumber, orderNumberPrefix } from '../utils/identifiers';
import { logger } from '../utils/logger';

interface OrderRow {
     id: number;
     order_no: string;
     customer_name: string;
     status: OrderStatus;
     created_at: Date;
}

interface OrderItemRow {
     id: number;
     order_id: number;
     item_id: number;
     sku: string;
     line_no: number;
     qty_requested: number;
     qty_allocated: number;
     qty_picked: number | null;
     pack_notes: string | null;
}

interface AllocationRow {
     id: number;
     order_item_id: number;
     item_id: number;
     batch_id: number;
     lot_no: string;
     qty_allocated: number;
}

export interface ShipmentRow {
     id: number;
     order_id: number;
     shipment_no: string;
     tracking_no: string;
     carrier: string;
     shipping_address: string;
     notes: string | null;
     status: ShipmentStatus;
     shipped_at: Date;
     delivered_at: Date | null;
}

/**
 * Reads and writes order rows. Locking reads are used by the state machine
 * so transitions on the same order run one at a time.
 */
export class OrderService {
     async createOrder(client: PoolClient, request: CreateOrderRequest): Promise<OrderDetail> {
          const { lines } = request;

          if (!lines || lines.length === 0) {
               throw new InvalidQuantityError('Order must have at least one line');
          }

          const seen = new Set<string>();
          for (const line of lines) {
               if (!Number.isInteger(line.quantity) || line.quantity <= 0) {
                    throw new InvalidQuantityError(`Quantity must be positive for item ${line.sku}`);
               }
               if (seen.has(line.sku)) {
                    throw new InvalidQuantityError(`Item ${line.sku} appears more than once in the order`);
               }
               seen.add(line.sku);
          }

          const { rows: items } = await client.query<{ id: number; sku: string }>(
               `SELECT id, sku FROM item WHERE sku = ANY($1::text[])`,
               [[...seen]]
          );
          const itemIds = new Map(items.map((i) => [i.sku, i.id]));
          for (const line of lines) {
               if (!itemIds.has(line.sku)) {
                    throw new ItemNotFoundError(line.sku);
               }
          }

          const generated = request.orderNo === undefined;
          const orderNo = request.orderNo ?? (await this.generateOrderNo(client));

          let order: Order;
          try {
               const { rows } = await client.query<OrderRow>(
                    `
        INSERT INTO customer_order (order_no, customer_name, status)
        VALUES ($1, $2, 'new')
        RETURNING id, order_no, customer_name, status, created_at
      `,
                    [orderNo, request.customerName]
               );
               order = toOrder(rows[0]);
          } catch (err) {
               if (isUniqueViolation(err, 'customer_order_order_no_key')) {
                    if (generated) {
                         throw new ConcurrentModificationError('order_no', orderNo);
                    }
                    throw new DomainError(`Order number ${orderNo} already exists`, 'DUPLICATE_ORDER_NO', 409);
               }
               throw err;
          }

          const orderItems: OrderItem[] = [];
          for (const [index, line] of lines.entries()) {
               const itemId = itemIds.get(line.sku) ?? 0;
               const { rows } = await client.query<{ id: number }>(
                    `
        INSERT INTO order_item (order_id, item_id, line_no, qty_requested)
        VALUES ($1, $2, $3, $4)
        RETURNING id
      `,
                    [order.id, itemId, index + 1, line.quantity]
               );
               orderItems.push({
                    id: rows[0].id,
                    orderId: order.id,
                    itemId,
                    sku: line.sku,
                    lineNo: index + 1,
                    qtyRequested: line.quantity,
                    qtyAllocated: 0,
                    qtyPicked: null,
                    packNotes: null,
               });
          }

          logger.info({ orderId: order.id, orderNo, lineCount: lines.length }, 'Order created');

          return { ...order, items: orderItems, allocations: [], shipment: null };
     }

     async getOrder(client: PoolClient, orderId: number): Promise<OrderDetail> {
          const order = await this.findOrder(client, orderId);
          const items = await this.listOrderItems(client, orderId);
          const allocations = await this.listAllocations(client, orderId);
          const shipment = await this.findShipment(client, orderId);
          return { ...order, items, allocations, shipment };
     }

     async findOrder(client: PoolClient, orderId: number): Promise<Order> {
          return this.selectOrder(client, orderId, false);
     }

     /** Loads the order and holds its row lock until the transaction ends. */
     async lockOrder(client: PoolClient, orderId: number): Promise<Order> {
          return this.selectOrder(client, orderId, true);
     }

     /**
      * Oldest `new` orders first. Rows another transaction already holds are
      * skipped rather than waited on.
      */
     async listPendingOrders(client: PoolClient, limit: number): Promise<Order[]> {
          const { rows } = await client.query<OrderRow>(
               `
      SELECT id, order_no, customer_name, status, created_at
      FROM customer_order
      WHERE status = 'new'
      ORDER BY created_at, id
      LIMIT $1
      FOR UPDATE SKIP LOCKED
    `,
               [limit]
          );
          return rows.map(toOrder);
     }

     async listOrderItems(client: PoolClient, orderId: number): Promise<OrderItem[]> {
          const { rows } = await client.query<OrderItemRow>(
               `
      SELECT
        oi.id,
        oi.order_id,
        oi.item_id,
        i.sku,
        oi.line_no,
        oi.qty_requested,
        oi.qty_allocated,
        oi.qty_picked,
        oi.pack_notes
      FROM order_item oi
      JOIN item i ON i.id = oi.item_id
      WHERE oi.order_id = $1
      ORDER BY oi.line_no, oi.id
    `,
               [orderId]
          );

          return rows.map((row) => ({
               id: row.id,
               orderId: row.order_id,
               itemId: row.item_id,
               sku: row.sku,
               lineNo: row.line_no,
               qtyRequested: row.qty_requested,
               qtyAllocated: row.qty_allocated,
               qtyPicked: row.qty_picked,
               packNotes: row.pack_notes,
          }));
     }

     /** Live allocations of an order; `lock` holds the allocation rows. */
     async listAllocations(
          client: PoolClient,
          orderId: number,
          lock: boolean = false
     ): Promise<Allocation[]> {
          const { rows } = await client.query<AllocationRow>(
               `
      SELECT a.id, a.order_item_id, oi.item_id, a.batch_id, b.lot_no, a.qty_allocated
      FROM allocation a
      JOIN order_item oi ON oi.id = a.order_item_id
      JOIN batch b ON b.id = a.batch_id
      WHERE oi.order_id = $1
      ORDER BY a.id
      ${lock ? 'FOR UPDATE OF a' : ''}
    `,
               [orderId]
          );

          return rows.map((row) => ({
               id: row.id,
               orderItemId: row.order_item_id,
               itemId: row.item_id,
               batchId: row.batch_id,
               lotNo: row.lot_no,
               qtyAllocated: row.qty_allocated,
          }));
     }

     async deleteAllocations(client: PoolClient, allocationIds: number[]): Promise<void> {
          if (allocationIds.length === 0) {
               return;
          }
          await client.query(`DELETE FROM allocation WHERE id = ANY($1::int[])`, [allocationIds]);
     }

     async findShipment(client: PoolClient, orderId: number): Promise<Shipment | null> {
          const { rows } = await client.query<ShipmentRow>(
               `
      SELECT id, order_id, shipment_no, tracking_no, carrier, shipping_address, notes, status, shipped_at, delivered_at
      FROM shipment
      WHERE order_id = $1
    `,
               [orderId]
          );
          return rows.length > 0 ? toShipment(rows[0]) : null;
     }

     async updateStatus(client: PoolClient, orderId: number, status: OrderStatus): Promise<void> {
          await client.query(
               `
      UPDATE customer_order
      SET status = $1,
          updated_at = NOW()
      WHERE id = $2
    `,
               [status, orderId]
          );
     }

     private async selectOrder(client: PoolClient, orderId: number, lock: boolean): Promise<Order> {
          const { rows } = await client.query<OrderRow>(
               `
      SELECT id, order_no, customer_name, status, created_at
      FROM customer_order
      WHERE id = $1
      ${lock ? 'FOR UPDATE' : ''}
    `,
               [orderId]
          );

          if (rows.length === 0) {
               throw new OrderNotFoundError(orderId);
          }

          return toOrder(rows[0]);
     }

     private async generateOrderNo(client: PoolClient): Promise<string> {
          const now = new Date();
          const { rows } = await client.query<{ order_no: string }>(
               `
      SELECT order_no
      FROM customer_order
      WHERE order_no LIKE $1
      ORDER BY order_no DESC
      LIMIT 1
    `,
               [`${orderNumberPrefix(now)}%`]
          );
          return nextOrderNumber(now, rows.length > 0 ? rows[0].order_no : null);
     }
}

function toOrder(row: OrderRow): Order {
     return {
          id: row.id,
          orderNo: row.order_no,
          customerName: row.customer_name,
          status: row.status,
          createdAt: row.created_at,
     };
}

export function toShipment(row: ShipmentRow): Shipment {
     return {
          id: row.id,
          orderId: row.order_id,
          shipmentNo: row.shipment_no,
          trackingNo: row.tracking_no,
          carrier: row.carrier,
          shippingAddress: row.shipping_address,
          notes: row.notes,
          status: row.status,
          shippedAt: row.shipped_at,
          deliveredAt: row.delivered_at,
     };
}
