import type { PoolClient } from 'pg';

/**
 * In-process stand-in for the PostgreSQL tables the engine touches. It
 * understands exactly the statements the services issue (matched on their
 * whitespace-normalised text) and throws on anything else, so a changed query
 * shows up as a failing test rather than a silent no-op.
 *
 * Each client keeps an undo log between BEGIN and COMMIT; ROLLBACK replays it
 * backwards. Row locks are not modelled: conditional updates carry the
 * concurrency guarantees, as they do in the real schema.
 */

export interface FakeItem {
     id: number;
     sku: string;
     name: string;
     reorder_threshold: number;
}

export interface FakeBatch {
     id: number;
     item_id: number;
     lot_no: string;
     quantity: number;
     available_qty: number;
     expiry_date: string | null;
     status: string;
}

export interface FakeOrder {
     id: number;
     order_no: string;
     customer_name: string;
     status: string;
     created_at: Date;
}

export interface FakeOrderItem {
     id: number;
     order_id: number;
     item_id: number;
     line_no: number;
     qty_requested: number;
     qty_allocated: number;
     qty_picked: number | null;
     pack_notes: string | null;
}

export interface FakeAllocation {
     id: number;
     order_item_id: number;
     batch_id: number;
     qty_allocated: number;
}

export interface FakeShipment {
     id: number;
     order_id: number;
     shipment_no: string;
     tracking_no: string;
     carrier: string;
     shipping_address: string;
     notes: string | null;
     status: string;
     shipped_at: Date;
     delivered_at: Date | null;
}

export interface FakeLogEntry {
     id: string;
     type: string;
     qty: number;
     item_id: number | null;
     batch_id: number | null;
     order_id: number | null;
     shipment_id: number | null;
     actor: string;
     metadata: Record<string, unknown>;
     created_at: Date;
}

export interface FakeReturn {
     id: number;
     return_no: string;
     order_item_id: number;
     qty_returned: number;
     reason: string;
     status: string;
     disposition: string | null;
     qty_accepted: number | null;
     batch_id: number | null;
     notes: string;
     created_by: string;
     processed_by: string | null;
     created_at: Date;
     processed_at: Date | null;
}

export interface FakeEvent {
     id: string;
     type: string;
     payload: Record<string, unknown>;
     status: string;
}

interface Result {
     rows: object[];
     rowCount: number;
}

type Handler = (client: FakeClient, match: RegExpMatchArray, params: unknown[]) => Result;

interface Failure {
     pattern: RegExp;
     error: Error;
     skip: number;
}

function result(rows: object[]): Result {
     return { rows, rowCount: rows.length };
}

function num(value: unknown): number {
     return Number(value);
}

function str(value: unknown): string {
     return String(value);
}

function nullableNum(value: unknown): number | null {
     return value === null || value === undefined ? null : Number(value);
}

function nullableStr(value: unknown): string | null {
     return value === null || value === undefined ? null : String(value);
}

function list(value: unknown): unknown[] {
     return Array.isArray(value) ? value : [];
}

function json(value: unknown): Record<string, unknown> {
     const parsed: unknown = JSON.parse(str(value));
     return typeof parsed === 'object' && parsed !== null ? Object.fromEntries(Object.entries(parsed)) : {};
}

export function pgError(code: string, constraint: string, message: string): Error {
     return Object.assign(new Error(message), { code, constraint });
}

function addDays(date: string, days: number): string {
     const d = new Date(`${date}T00:00:00Z`);
     d.setUTCDate(d.getUTCDate() + days);
     return d.toISOString().slice(0, 10);
}

function fefo(a: FakeBatch, b: FakeBatch): number {
     if (a.expiry_date !== b.expiry_date) {
          if (a.expiry_date === null) return 1;
          if (b.expiry_date === null) return -1;
          return a.expiry_date < b.expiry_date ? -1 : 1;
     }
     return a.id - b.id;
}

export class FakeDb {
     items: FakeItem[] = [];
     batches: FakeBatch[] = [];
     orders: FakeOrder[] = [];
     orderItems: FakeOrderItem[] = [];
     allocations: FakeAllocation[] = [];
     shipments: FakeShipment[] = [];
     logs: FakeLogEntry[] = [];
     events: FakeEvent[] = [];
     returns: FakeReturn[] = [];

     /** Every statement run, normalised, in order. */
     readonly statements: string[] = [];

     private nextId = 1;
     private failures: Failure[] = [];
     private readonly handlers: Array<[RegExp, Handler]>;

     constructor(public today: string = '2025-10-01') {
          this.handlers = this.buildHandlers();
     }

     connect(): Promise<PoolClient> {
          const client = new FakeClient(this);
          return Promise.resolve(client.asPoolClient());
     }

     client(): PoolClient {
          return new FakeClient(this).asPoolClient();
     }

     /** Makes the next statement matching `pattern` (after `skip` matches) throw `error`. */
     failOn(pattern: RegExp, error: Error, skip: number = 0): void {
          this.failures.push({ pattern, error, skip });
     }

     addItem(sku: string, reorderThreshold: number = 0): FakeItem {
          const item: FakeItem = { id: this.id(), sku, name: sku, reorder_threshold: reorderThreshold };
          this.items.push(item);
          return item;
     }

     addBatch(
          item: FakeItem,
          lotNo: string,
          quantity: number,
          expiryDate: string | null,
          options: { available?: number; status?: string } = {}
     ): FakeBatch {
          const batch: FakeBatch = {
               id: this.id(),
               item_id: item.id,
               lot_no: lotNo,
               quantity,
               available_qty: options.available ?? quantity,
               expiry_date: expiryDate,
               status: options.status ?? 'AVAILABLE',
          };
          this.batches.push(batch);
          return batch;
     }

     batch(id: number): FakeBatch {
          const batch = this.batches.find((b) => b.id === id);
          if (!batch) throw new Error(`No batch ${id}`);
          return batch;
     }

     order(id: number): FakeOrder {
          const order = this.orders.find((o) => o.id === id);
          if (!order) throw new Error(`No order ${id}`);
          return order;
     }

     itemsOf(orderId: number): FakeOrderItem[] {
          return this.orderItems.filter((oi) => oi.order_id === orderId);
     }

     allocationsOf(orderId: number): FakeAllocation[] {
          const lineIds = new Set(this.itemsOf(orderId).map((oi) => oi.id));
          return this.allocations.filter((a) => lineIds.has(a.order_item_id));
     }

     logsOf(orderId: number): FakeLogEntry[] {
          return this.logs.filter((l) => l.order_id === orderId);
     }

     run(client: FakeClient, text: string, params: unknown[]): Result {
          const sql = text.replace(/\s+/g, ' ').trim();
          this.statements.push(sql);

          const failure = this.failures.find((f) => f.pattern.test(sql));
          if (failure) {
               if (failure.skip === 0) {
                    this.failures = this.failures.filter((f) => f !== failure);
                    throw failure.error;
               }
               failure.skip -= 1;
          }

          for (const [pattern, handler] of this.handlers) {
               const match = sql.match(pattern);
               if (match) {
                    return handler(client, match, params);
               }
          }
          throw new Error(`Unhandled SQL: ${sql}`);
     }

     private id(): number {
          return this.nextId++;
     }

     private eligible(batch: FakeBatch): boolean {
          return (
               batch.status === 'AVAILABLE' &&
               (batch.expiry_date === null || batch.expiry_date > this.today)
          );
     }

     private held(batchId: number): number {
          return this.allocations
               .filter((a) => a.batch_id === batchId)
               .reduce((sum, a) => sum + a.qty_allocated, 0);
     }

     private returnRow(entry: FakeReturn): object {
          const line = this.orderItems.find((oi) => oi.id === entry.order_item_id);
          if (!line) throw new Error(`No order item ${entry.order_item_id}`);
          return { ...entry, order_id: line.order_id, item_id: line.item_id, sku: this.itemOf(line.item_id).sku };
     }

     private itemOf(id: number): FakeItem {
          const item = this.items.find((i) => i.id === id);
          if (!item) throw new Error(`No item ${id}`);
          return item;
     }

     private batchRow(batch: FakeBatch): object {
          return { ...batch, sku: this.itemOf(batch.item_id).sku };
     }

     private insert<T>(client: FakeClient, table: T[], row: T): T {
          table.push(row);
          client.onUndo(() => {
               const index = table.indexOf(row);
               if (index >= 0) table.splice(index, 1);
          });
          return row;
     }

     private update<T extends object>(client: FakeClient, row: T, changes: Partial<T>): void {
          const previous = Object.fromEntries(Object.keys(changes).map((key) => [key, Reflect.get(row, key)]));
          Object.assign(row, changes);
          client.onUndo(() => Object.assign(row, previous));
     }

     private remove<T>(client: FakeClient, table: T[], predicate: (row: T) => boolean): T[] {
          const removed = table.filter(predicate);
          for (const row of removed) {
               const index = table.indexOf(row);
               table.splice(index, 1);
               client.onUndo(() => table.splice(index, 0, row));
          }
          return removed;
     }

     private buildHandlers(): Array<[RegExp, Handler]> {
          return [
               [/^BEGIN$/, (client) => {
                    client.begin();
                    return result([]);
               }],
               [/^COMMIT$/, (client) => {
                    client.commit();
                    return result([]);
               }],
               [/^ROLLBACK$/, (client) => {
                    client.rollback();
                    return result([]);
               }],

               // Items
               [/^SELECT id, sku FROM item WHERE sku = ANY\(\$1::text\[\]\)$/, (_c, _m, p) => {
                    const skus = list(p[0]).map(str);
                    return result(this.items.filter((i) => skus.includes(i.sku)).map((i) => ({ id: i.id, sku: i.sku })));
               }],
               [/^SELECT id, sku FROM item WHERE sku = \$1$/, (_c, _m, p) =>
                    result(this.items.filter((i) => i.sku === str(p[0])).map((i) => ({ id: i.id, sku: i.sku }))),
               ],

               // Orders
               [/^SELECT order_no FROM customer_order WHERE order_no LIKE \$1 ORDER BY order_no DESC LIMIT 1$/, (_c, _m, p) => {
                    const prefix = str(p[0]).replace(/%$/, '');
                    const numbers = this.orders
                         .map((o) => o.order_no)
                         .filter((n) => n.startsWith(prefix))
                         .sort()
                         .reverse();
                    return result(numbers.slice(0, 1).map((order_no) => ({ order_no })));
               }],
               [/^INSERT INTO customer_order \(order_no, customer_name, status\) VALUES \(\$1, \$2, 'new'\) RETURNING/, (client, _m, p) => {
                    if (this.orders.some((o) => o.order_no === str(p[0]))) {
                         throw pgError('23505', 'customer_order_order_no_key', 'duplicate key value');
                    }
                    const order = this.insert(client, this.orders, {
                         id: this.id(),
                         order_no: str(p[0]),
                         customer_name: str(p[1]),
                         status: 'new',
                         created_at: new Date(),
                    });
                    return result([{ ...order }]);
               }],
               [/^SELECT id, order_no, customer_name, status, created_at FROM customer_order WHERE id = \$1( FOR UPDATE)?$/, (_c, _m, p) =>
                    result(this.orders.filter((o) => o.id === num(p[0])).map((o) => ({ ...o }))),
               ],
               [/^SELECT id, order_no, customer_name, status, created_at FROM customer_order WHERE status = 'new' ORDER BY created_at, id LIMIT \$1 FOR UPDATE SKIP LOCKED$/, (_c, _m, p) =>
                    result(
                         this.orders
                              .filter((o) => o.status === 'new')
                              .sort((a, b) => a.created_at.getTime() - b.created_at.getTime() || a.id - b.id)
                              .slice(0, num(p[0]))
                              .map((o) => ({ ...o }))
                    ),
               ],
               [/^UPDATE customer_order SET status = \$1, updated_at = NOW\(\) WHERE id = \$2$/, (client, _m, p) => {
                    const order = this.orders.find((o) => o.id === num(p[1]));
                    if (order) this.update(client, order, { status: str(p[0]) });
                    return result([]);
               }],

               // Order items
               [/^INSERT INTO order_item \(order_id, item_id, line_no, qty_requested\) VALUES \(\$1, \$2, \$3, \$4\) RETURNING id$/, (client, _m, p) => {
                    if (this.orderItems.some((oi) => oi.order_id === num(p[0]) && oi.item_id === num(p[1]))) {
                         throw pgError('23505', 'order_item_order_item_key', 'duplicate key value');
                    }
                    const line = this.insert(client, this.orderItems, {
                         id: this.id(),
                         order_id: num(p[0]),
                         item_id: num(p[1]),
                         line_no: num(p[2]),
                         qty_requested: num(p[3]),
                         qty_allocated: 0,
                         qty_picked: null,
                         pack_notes: null,
                    });
                    return result([{ id: line.id }]);
               }],
               [/^SELECT oi\.id, oi\.order_id, oi\.item_id, i\.sku, oi\.line_no, oi\.qty_requested, oi\.qty_allocated, oi\.qty_picked, oi\.pack_notes FROM order_item oi JOIN item i ON i\.id = oi\.item_id WHERE oi\.order_id = \$1 ORDER BY oi\.line_no, oi\.id$/, (_c, _m, p) =>
                    result(
                         this.itemsOf(num(p[0]))
                              .sort((a, b) => a.line_no - b.line_no || a.id - b.id)
                              .map((oi) => ({ ...oi, sku: this.itemOf(oi.item_id).sku }))
                    ),
               ],
               [/^UPDATE order_item SET qty_allocated = qty_allocated \+ \$1 WHERE id = \$2$/, (client, _m, p) => {
                    const line = this.orderItems.find((oi) => oi.id === num(p[1]));
                    if (line) {
                         const next = line.qty_allocated + num(p[0]);
                         if (next < 0 || next > line.qty_requested) {
                              throw pgError('23514', 'order_item_allocated_bounds', 'check constraint violated');
                         }
                         this.update(client, line, { qty_allocated: next });
                    }
                    return result([]);
               }],
               [/^UPDATE order_item SET qty_allocated = 0, qty_picked = NULL WHERE order_id = \$1$/, (client, _m, p) => {
                    for (const line of this.itemsOf(num(p[0]))) {
                         this.update(client, line, { qty_allocated: 0, qty_picked: null });
                    }
                    return result([]);
               }],
               [/^UPDATE order_item SET qty_picked = \$1 WHERE id = \$2$/, (client, _m, p) => {
                    const line = this.orderItems.find((oi) => oi.id === num(p[1]));
                    if (line) this.update(client, line, { qty_picked: num(p[0]) });
                    return result([]);
               }],
               [/^UPDATE order_item SET qty_picked = \$1, pack_notes = COALESCE\(\$2, pack_notes\) WHERE id = \$3$/, (client, _m, p) => {
                    const line = this.orderItems.find((oi) => oi.id === num(p[2]));
                    if (line) {
                         this.update(client, line, {
                              qty_picked: num(p[0]),
                              pack_notes: nullableStr(p[1]) ?? line.pack_notes,
                         });
                    }
                    return result([]);
               }],

               // Allocations
               [/^INSERT INTO allocation \(order_item_id, batch_id, qty_allocated\) VALUES \(\$1, \$2, \$3\)$/, (client, _m, p) => {
                    this.insert(client, this.allocations, {
                         id: this.id(),
                         order_item_id: num(p[0]),
                         batch_id: num(p[1]),
                         qty_allocated: num(p[2]),
                    });
                    return result([]);
               }],
               [/^SELECT a\.id, a\.order_item_id, oi\.item_id, a\.batch_id, b\.lot_no, a\.qty_allocated FROM allocation a JOIN order_item oi ON oi\.id = a\.order_item_id JOIN batch b ON b\.id = a\.batch_id WHERE oi\.order_id = \$1 ORDER BY a\.id( FOR UPDATE OF a)?$/, (_c, _m, p) =>
                    result(
                         this.allocationsOf(num(p[0]))
                              .sort((a, b) => a.id - b.id)
                              .map((a) => {
                                   const line = this.orderItems.find((oi) => oi.id === a.order_item_id);
                                   return {
                                        ...a,
                                        item_id: line ? line.item_id : 0,
                                        lot_no: this.batch(a.batch_id).lot_no,
                                   };
                              })
                    ),
               ],
               [/^DELETE FROM allocation WHERE id = ANY\(\$1::int\[\]\)$/, (client, _m, p) => {
                    const ids = list(p[0]).map(num);
                    return result(this.remove(client, this.allocations, (a) => ids.includes(a.id)));
               }],

               // Batches
               [/^SELECT id, lot_no, available_qty, expiry_date FROM batch WHERE item_id = \$1 AND status = 'AVAILABLE' AND available_qty > 0 AND \(expiry_date IS NULL OR expiry_date > CURRENT_DATE\) ORDER BY expiry_date ASC NULLS LAST, id ASC FOR UPDATE$/, (_c, _m, p) =>
                    result(
                         this.batches
                              .filter((b) => b.item_id === num(p[0]) && b.available_qty > 0 && this.eligible(b))
                              .sort(fefo)
                              .map((b) => ({
                                   id: b.id,
                                   lot_no: b.lot_no,
                                   available_qty: b.available_qty,
                                   expiry_date: b.expiry_date,
                              }))
                    ),
               ],
               [/^UPDATE batch SET available_qty = available_qty - \$1, updated_at = NOW\(\) WHERE id = \$2 AND status = 'AVAILABLE' AND available_qty >= \$1 RETURNING available_qty$/, (client, _m, p) => {
                    const batch = this.batches.find((b) => b.id === num(p[1]));
                    if (!batch || batch.status !== 'AVAILABLE' || batch.available_qty < num(p[0])) {
                         return result([]);
                    }
                    this.update(client, batch, { available_qty: batch.available_qty - num(p[0]) });
                    return result([{ available_qty: batch.available_qty }]);
               }],
               [/^UPDATE batch SET available_qty = available_qty \+ \$1, updated_at = NOW\(\) WHERE id = \$2 AND available_qty \+ \$1 <= quantity RETURNING available_qty$/, (client, _m, p) => {
                    const batch = this.batches.find((b) => b.id === num(p[1]));
                    if (!batch || batch.available_qty + num(p[0]) > batch.quantity) {
                         return result([]);
                    }
                    this.update(client, batch, { available_qty: batch.available_qty + num(p[0]) });
                    return result([{ available_qty: batch.available_qty }]);
               }],
               [/^INSERT INTO batch \( item_id, lot_no, quantity, available_qty, expiry_date, status \) VALUES \(\$1, \$2, \$3, \$3, \$4, \$5\) RETURNING/, (client, _m, p) => {
                    if (this.batches.some((b) => b.lot_no === str(p[1]))) {
                         throw pgError('23505', 'batch_lot_no_key', 'duplicate key value');
                    }
                    const batch = this.insert(client, this.batches, {
                         id: this.id(),
                         item_id: num(p[0]),
                         lot_no: str(p[1]),
                         quantity: num(p[2]),
                         available_qty: num(p[2]),
                         expiry_date: nullableStr(p[3]),
                         status: str(p[4]),
                    });
                    return result([{ ...batch }]);
               }],
               [/^WITH updated AS \( UPDATE batch SET available_qty = available_qty \+ \$1, updated_at = NOW\(\) WHERE id = \$2 AND available_qty \+ \$1 >= 0 AND available_qty \+ \$1 <= quantity - \( SELECT COALESCE\(SUM\(a\.qty_allocated\), 0\) FROM allocation a WHERE a\.batch_id = \$2 \)/, (client, _m, p) => {
                    const batch = this.batches.find((b) => b.id === num(p[1]));
                    const next = batch ? batch.available_qty + num(p[0]) : -1;
                    if (!batch || next < 0 || next > batch.quantity - this.held(batch.id)) {
                         return result([]);
                    }
                    this.update(client, batch, { available_qty: next });
                    return result([this.batchRow(batch)]);
               }],
               [/^SELECT COALESCE\(SUM\(qty_allocated\), 0\)::int AS held FROM allocation WHERE batch_id = \$1$/, (_c, _m, p) =>
                    result([{ held: this.held(num(p[0])) }]),
               ],
               [/^UPDATE batch SET status = \$1, updated_at = NOW\(\) WHERE id = \$2$/, (client, _m, p) => {
                    const batch = this.batches.find((b) => b.id === num(p[1]));
                    if (batch) this.update(client, batch, { status: str(p[0]) });
                    return result([]);
               }],
               [/^SELECT b\.id, b\.item_id, i\.sku, b\.lot_no, b\.quantity, b\.available_qty, b\.expiry_date, b\.status FROM batch b JOIN item i ON i\.id = b\.item_id WHERE b\.id = \$1( FOR UPDATE OF b)?$/, (_c, _m, p) =>
                    result(this.batches.filter((b) => b.id === num(p[0])).map((b) => this.batchRow(b))),
               ],
               [/^SELECT b\.id, b\.item_id, i\.sku, b\.lot_no, b\.quantity, b\.available_qty, b\.expiry_date, b\.status, \(b\.status = 'AVAILABLE'.* WHERE i\.sku = \$1 ORDER BY b\.expiry_date ASC NULLS LAST, b\.id ASC$/, (_c, _m, p) => {
                    const item = this.items.find((i) => i.sku === str(p[0]));
                    return result(
                         this.batches
                              .filter((b) => item !== undefined && b.item_id === item.id)
                              .sort(fefo)
                              .map((b) => ({ ...this.batchRow(b), eligible: this.eligible(b) }))
                    );
               }],
               [/^SELECT b\.id, .* WHERE b\.status = 'AVAILABLE' AND b\.available_qty > 0 AND b\.expiry_date < CURRENT_DATE ORDER BY b\.expiry_date ASC, b\.id ASC( FOR UPDATE OF b)?$/, () =>
                    result(
                         this.batches
                              .filter((b) => b.status === 'AVAILABLE' && b.available_qty > 0 && b.expiry_date !== null && b.expiry_date < this.today)
                              .sort(fefo)
                              .map((b) => this.batchRow(b))
                    ),
               ],
               [/^SELECT b\.id, .* WHERE b\.status = 'AVAILABLE' AND b\.available_qty > 0 AND b\.expiry_date >= CURRENT_DATE AND b\.expiry_date <= CURRENT_DATE \+ \$1::int ORDER BY b\.expiry_date ASC, b\.id ASC$/, (_c, _m, p) => {
                    const limit = addDays(this.today, num(p[0]));
                    return result(
                         this.batches
                              .filter(
                                   (b) =>
                                        b.status === 'AVAILABLE' &&
                                        b.available_qty > 0 &&
                                        b.expiry_date !== null &&
                                        b.expiry_date >= this.today &&
                                        b.expiry_date <= limit
                              )
                              .sort(fefo)
                              .map((b) => this.batchRow(b))
                    );
               }],
               [/^SELECT i\.id, i\.sku, i\.reorder_threshold, COALESCE\(SUM\(b\.available_qty\) FILTER/, (_c, _m, p) => {
                    const ids = list(p[0]).map(num);
                    return result(
                         this.items
                              .filter((i) => ids.includes(i.id))
                              .sort((a, b) => a.id - b.id)
                              .map((i) => ({
                                   id: i.id,
                                   sku: i.sku,
                                   reorder_threshold: i.reorder_threshold,
                                   total_available: this.batches
                                        .filter((b) => b.item_id === i.id && this.eligible(b))
                                        .reduce((sum, b) => sum + b.available_qty, 0),
                              }))
                    );
               }],

               // Shipments
               [/^INSERT INTO shipment \( order_id, shipment_no, tracking_no, carrier, shipping_address, notes, status, shipped_at \) VALUES/, (client, _m, p) => {
                    if (this.shipments.some((s) => s.order_id === num(p[0]))) {
                         throw pgError('23505', 'shipment_order_id_key', 'duplicate key value');
                    }
                    if (this.shipments.some((s) => s.shipment_no === str(p[1]))) {
                         throw pgError('23505', 'shipment_shipment_no_key', 'duplicate key value');
                    }
                    const shippedAt = p[6] instanceof Date ? p[6] : new Date();
                    const shipment = this.insert(client, this.shipments, {
                         id: this.id(),
                         order_id: num(p[0]),
                         shipment_no: str(p[1]),
                         tracking_no: str(p[2]),
                         carrier: str(p[3]),
                         shipping_address: str(p[4]),
                         notes: nullableStr(p[5]),
                         status: 'SHIPPED',
                         shipped_at: shippedAt,
                         delivered_at: null,
                    });
                    return result([{ ...shipment }]);
               }],
               [/^SELECT id, order_id, shipment_no, tracking_no, carrier, shipping_address, notes, status, shipped_at, delivered_at FROM shipment WHERE order_id = \$1$/, (_c, _m, p) =>
                    result(this.shipments.filter((s) => s.order_id === num(p[0])).map((s) => ({ ...s }))),
               ],
               [/^UPDATE shipment SET status = 'DELIVERED', delivered_at = NOW\(\) WHERE order_id = \$1 RETURNING/, (client, _m, p) => {
                    const shipment = this.shipments.find((s) => s.order_id === num(p[0]));
                    if (!shipment) return result([]);
                    this.update(client, shipment, { status: 'DELIVERED', delivered_at: new Date() });
                    return result([{ ...shipment }]);
               }],

               // Transaction log
               [/^INSERT INTO transaction_log \( type, qty, item_id, batch_id, order_id, shipment_id, actor, metadata \) VALUES/, (client, _m, p) => {
                    this.insert(client, this.logs, {
                         id: String(this.id()),
                         type: str(p[0]),
                         qty: num(p[1]),
                         item_id: nullableNum(p[2]),
                         batch_id: nullableNum(p[3]),
                         order_id: nullableNum(p[4]),
                         shipment_id: nullableNum(p[5]),
                         actor: str(p[6]),
                         metadata: json(p[7]),
                         created_at: new Date(),
                    });
                    return result([]);
               }],
               [/^SELECT id, type, qty, item_id, batch_id, order_id, shipment_id, actor, metadata, created_at FROM transaction_log WHERE (order_id|batch_id) = \$1 ORDER BY id$/, (_c, m, p) => {
                    const column = m[1] === 'order_id' ? 'order_id' : 'batch_id';
                    return result(this.logs.filter((l) => l[column] === num(p[0])).map((l) => ({ ...l })));
               }],

               [/^SELECT batch_id, SUM\(-qty\)::int AS restockable FROM transaction_log WHERE order_id = \$1 AND batch_id IS NOT NULL AND \(metadata->>'orderItemId'\)::int = \$2 AND \(type = 'SHIP' OR \(type = 'ADJUST' AND metadata->>'reason' = 'return_restock'\)\) GROUP BY batch_id ORDER BY MIN\(id\)$/, (_c, _m, p) => {
                    const totals = new Map<number, number>();
                    for (const entry of this.logs) {
                         const restock = entry.type === 'ADJUST' && entry.metadata.reason === 'return_restock';
                         if (
                              entry.order_id === num(p[0]) &&
                              entry.batch_id !== null &&
                              Number(entry.metadata.orderItemId) === num(p[1]) &&
                              (entry.type === 'SHIP' || restock)
                         ) {
                              totals.set(entry.batch_id, (totals.get(entry.batch_id) ?? 0) - entry.qty);
                         }
                    }
                    return result([...totals].map(([batch_id, restockable]) => ({ batch_id, restockable })));
               }],

               // Returns
               [/^SELECT COALESCE\(SUM\(qty_returned\), 0\)::int AS returned FROM return_request WHERE order_item_id = \$1$/, (_c, _m, p) =>
                    result([
                         {
                              returned: this.returns
                                   .filter((r) => r.order_item_id === num(p[0]))
                                   .reduce((sum, r) => sum + r.qty_returned, 0),
                         },
                    ]),
               ],
               [/^INSERT INTO return_request \(return_no, order_item_id, qty_returned, reason, notes, created_by\) VALUES \(\$1, \$2, \$3, \$4, \$5, \$6\) RETURNING id$/, (client, _m, p) => {
                    if (this.returns.some((r) => r.return_no === str(p[0]))) {
                         throw pgError('23505', 'return_request_return_no_key', 'duplicate key value');
                    }
                    const entry = this.insert(client, this.returns, {
                         id: this.id(),
                         return_no: str(p[0]),
                         order_item_id: num(p[1]),
                         qty_returned: num(p[2]),
                         reason: str(p[3]),
                         status: 'pending',
                         disposition: null,
                         qty_accepted: null,
                         batch_id: null,
                         notes: str(p[4]),
                         created_by: str(p[5]),
                         processed_by: null,
                         created_at: new Date(),
                         processed_at: null,
                    });
                    return result([{ id: entry.id }]);
               }],
               [/^SELECT r\.id, .* FROM return_request r JOIN order_item oi ON oi\.id = r\.order_item_id JOIN item i ON i\.id = oi\.item_id WHERE r\.id = \$1( FOR UPDATE OF r)?$/, (_c, _m, p) =>
                    result(this.returns.filter((r) => r.id === num(p[0])).map((r) => this.returnRow(r))),
               ],
               [/^SELECT r\.id, .* FROM return_request r JOIN order_item oi ON oi\.id = r\.order_item_id JOIN item i ON i\.id = oi\.item_id WHERE \(\$1::text IS NULL OR r\.status = \$1\) ORDER BY r\.id DESC LIMIT \$2$/, (_c, _m, p) => {
                    const status = nullableStr(p[0]);
                    return result(
                         this.returns
                              .filter((r) => status === null || r.status === status)
                              .sort((a, b) => b.id - a.id)
                              .slice(0, num(p[1]))
                              .map((r) => this.returnRow(r))
                    );
               }],
               [/^UPDATE return_request SET status = \$1, disposition = \$2, qty_accepted = \$3, batch_id = \$4, notes = \$5, processed_by = \$6, processed_at = NOW\(\) WHERE id = \$7$/, (client, _m, p) => {
                    const entry = this.returns.find((r) => r.id === num(p[6]));
                    if (entry) {
                         this.update(client, entry, {
                              status: str(p[0]),
                              disposition: str(p[1]),
                              qty_accepted: num(p[2]),
                              batch_id: nullableNum(p[3]),
                              notes: str(p[4]),
                              processed_by: str(p[5]),
                              processed_at: new Date(),
                         });
                    }
                    return result([]);
               }],

               // Outbox
               [/^INSERT INTO domain_event \(type, payload\) VALUES \(\$1, \$2::jsonb\)$/, (client, _m, p) => {
                    this.insert(client, this.events, {
                         id: String(this.id()),
                         type: str(p[0]),
                         payload: json(p[1]),
                         status: 'PENDING',
                    });
                    return result([]);
               }],
          ];
     }
}

export class FakeClient {
     private undo: Array<() => void> | null = null;
     readonly release = jest.fn();

     constructor(private readonly db: FakeDb) {}

     query(text: string, params: unknown[] = []): Promise<Result> {
          try {
               return Promise.resolve(this.db.run(this, text, params));
          } catch (err) {
               return Promise.reject(err);
          }
     }

     begin(): void {
          this.undo = [];
     }

     commit(): void {
          this.undo = null;
     }

     rollback(): void {
          const steps = this.undo ?? [];
          for (let i = steps.length - 1; i >= 0; i--) {
               steps[i]();
          }
          this.undo = null;
     }

     onUndo(step: () => void): void {
          this.undo?.push(step);
     }

     asPoolClient(): PoolClient {
          return this as unknown as PoolClient;
     }
}
