import { pool } from '@stockroom/shared/src/db/client';
import { OrderService } from '@stockroom/shared/src/services/order-service';
import type { Actor, OrderDetail } from '@stockroom/shared/src/types/fulfillment.types';
import { FakeDb } from './fakeDb';

export const clerk: Actor = { id: 'clerk-1', privileged: false };
export const supervisor: Actor = { id: 'supervisor-1', privileged: true };

/**
 * Routes `pool.connect()` to the fake so the transaction helpers run against
 * it. Restore the returned spy in afterEach.
 */
export function useFakePool(db: FakeDb): jest.SpyInstance {
     return jest.spyOn(pool, 'connect').mockImplementation((() => db.connect()) as never);
}

let orderCounter = 0;

/**
 * Create a test order outside any transaction
 */
export async function createTestOrder(
     db: FakeDb,
     lines: Array<{ sku: string; quantity: number }>,
     customerName: string = 'Corner Shop'
): Promise<OrderDetail> {
     orderCounter++;
     return new OrderService().createOrder(db.client(), {
          orderNo: `TEST-${String(orderCounter).padStart(4, '0')}`,
          customerName,
          lines,
     });
}
