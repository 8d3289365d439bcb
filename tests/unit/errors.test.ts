import {
     BatchNotFoundError,
     CapacityExceededError,
     ConcurrentModificationError,
     DomainError,
     DuplicateLotError,
     EmptyContainerError,
     InvalidQuantityError,
     InvalidTransitionError,
     LedgerInvariantError,
     OrderItemNotFoundError,
     OrderNotFoundError,
     ShipmentNotFoundError,
} from '@stockroom/shared/src/utils/errors';

describe('Error Classes', () => {
     describe('DomainError', () => {
          it('should create a domain error with message and code', () => {
               const error = new DomainError('Test error', 'TEST_CODE');
               expect(error.message).toBe('Test error');
               expect(error.code).toBe('TEST_CODE');
               expect(error.statusCode).toBe(400);
               expect(error.name).toBe('DomainError');
               expect(error instanceof Error).toBe(true);
          });

          it('should accept custom status code', () => {
               const error = new DomainError('Test error', 'TEST_CODE', 503);
               expect(error.statusCode).toBe(503);
          });
     });

     describe('not-found errors', () => {
          it('should describe a missing order', () => {
               const error = new OrderNotFoundError(42);
               expect(error.message).toBe('Order 42 not found');
               expect(error.code).toBe('ORDER_NOT_FOUND');
               expect(error.statusCode).toBe(404);
               expect(error.orderId).toBe(42);
               expect(error.name).toBe('OrderNotFoundError');
          });

          it('should name both ids for a foreign order item', () => {
               const error = new OrderItemNotFoundError(7, 99);
               expect(error.message).toBe('Order item 99 does not belong to order 7');
               expect(error.code).toBe('ORDER_ITEM_NOT_FOUND');
               expect(error.statusCode).toBe(404);
          });

          it('should carry the batch id', () => {
               const error = new BatchNotFoundError(123);
               expect(error.code).toBe('BATCH_NOT_FOUND');
               expect(error.batchId).toBe(123);
          });

          it('should report a missing shipment by order', () => {
               const error = new ShipmentNotFoundError(5);
               expect(error.message).toBe('No shipment recorded for order 5');
               expect(error.code).toBe('SHIPMENT_NOT_FOUND');
          });
     });

     describe('InvalidTransitionError', () => {
          it('should name the order, status and action', () => {
               const error = new InvalidTransitionError(3, 'new', 'pick');
               expect(error.message).toBe("Cannot pick order 3 in status 'new'");
               expect(error.code).toBe('INVALID_TRANSITION');
               expect(error.statusCode).toBe(409);
               expect(error.status).toBe('new');
               expect(error.action).toBe('pick');
          });

          it('should append the reason when given', () => {
               const error = new InvalidTransitionError(3, 'delivered', 'ship', 'order is closed');
               expect(error.message).toBe("Cannot ship order 3 in status 'delivered': order is closed");
          });
     });

     describe('InvalidQuantityError', () => {
          it('should create error with message', () => {
               const error = new InvalidQuantityError('Quantity must be positive');
               expect(error.message).toBe('Quantity must be positive');
               expect(error.code).toBe('INVALID_QUANTITY');
               expect(error.statusCode).toBe(400);
          });
     });

     describe('DuplicateLotError', () => {
          it('should be a conflict', () => {
               const error = new DuplicateLotError('LOT-1');
               expect(error.message).toBe('Lot LOT-1 already exists');
               expect(error.statusCode).toBe(409);
          });
     });

     describe('ConcurrentModificationError', () => {
          it('should build a default message from the entity', () => {
               const error = new ConcurrentModificationError('batch', 12);
               expect(error.message).toBe('Concurrent modification of batch 12');
               expect(error.code).toBe('CONCURRENT_MODIFICATION');
               expect(error.statusCode).toBe(409);
          });

          it('should accept a custom message', () => {
               const error = new ConcurrentModificationError('batch', 12, 'gone');
               expect(error.message).toBe('gone');
               expect(error.entityId).toBe(12);
          });
     });

     describe('LedgerInvariantError', () => {
          it('should be a server error', () => {
               const error = new LedgerInvariantError('over quantity', 4);
               expect(error.statusCode).toBe(500);
               expect(error.code).toBe('LEDGER_INVARIANT_VIOLATION');
               expect(error.batchId).toBe(4);
          });
     });

     describe('container errors', () => {
          it('should not be domain errors', () => {
               const full = new CapacityExceededError('WorkQueue', 2);
               const empty = new EmptyContainerError('SelectionStack');

               expect(full.message).toBe('WorkQueue is full (capacity 2)');
               expect(empty.message).toBe('SelectionStack is empty');
               expect(full).not.toBeInstanceOf(DomainError);
               expect(empty).not.toBeInstanceOf(DomainError);
               expect(full.name).toBe('CapacityExceededError');
          });
     });
});
