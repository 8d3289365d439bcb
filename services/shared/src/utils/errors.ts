// Custom error classes for domain-specific errors

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class OrderNotFoundError extends DomainError {
     constructor(public readonly orderId: number) {
          super(`Order ${orderId} not found`, 'ORDER_NOT_FOUND', 404);
     }
}

export class OrderItemNotFoundError extends DomainError {
     constructor(
          public readonly orderId: number,
          public readonly orderItemId: number
     ) {
          super(
               `Order item ${orderItemId} does not belong to order ${orderId}`,
               'ORDER_ITEM_NOT_FOUND',
               404
          );
     }
}

export class ItemNotFoundError extends DomainError {
     constructor(public readonly sku: string) {
          super(`Item ${sku} not found`, 'ITEM_NOT_FOUND', 404);
     }
}

export class BatchNotFoundError extends DomainError {
     constructor(public readonly batchId: number) {
          super(`Batch ${batchId} not found`, 'BATCH_NOT_FOUND', 404);
     }
}

export class ShipmentNotFoundError extends DomainError {
     constructor(public readonly orderId: number) {
          super(`No shipment recorded for order ${orderId}`, 'SHIPMENT_NOT_FOUND', 404);
     }
}

export class InvalidTransitionError extends DomainError {
     constructor(
          public readonly orderId: number,
          public readonly status: string,
          public readonly action: string,
          reason?: string
     ) {
          super(
               `Cannot ${action} order ${orderId} in status '${status}'${reason ? `: ${reason}` : ''}`,
               'INVALID_TRANSITION',
               409
          );
     }
}

export class InvalidQuantityError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_QUANTITY', 400);
     }
}

export class DuplicateLotError extends DomainError {
     constructor(public readonly lotNo: string) {
          super(`Lot ${lotNo} already exists`, 'DUPLICATE_LOT', 409);
     }
}

export class ReturnNotFoundError extends DomainError {
     constructor(public readonly returnId: number) {
          super(`Return ${returnId} not found`, 'RETURN_NOT_FOUND', 404);
     }
}

export class ReturnAlreadyProcessedError extends DomainError {
     constructor(
          public readonly returnNo: string,
          public readonly status: string
     ) {
          super(`Return ${returnNo} was already processed (${status})`, 'RETURN_ALREADY_PROCESSED', 409);
     }
}

export class PrivilegeRequiredError extends DomainError {
     constructor(action: string) {
          super(`${action} requires a privileged actor`, 'PRIVILEGE_REQUIRED', 403);
     }
}

/**
 * An optimistic update lost a race (or the database aborted the transaction
 * to break a conflict). The whole unit of work may be retried.
 */
export class ConcurrentModificationError extends DomainError {
     constructor(
          public readonly entity: string,
          public readonly entityId: number | string,
          message: string = `Concurrent modification of ${entity} ${entityId}`
     ) {
          super(message, 'CONCURRENT_MODIFICATION', 409);
     }
}

export class LedgerInvariantError extends DomainError {
     constructor(
          message: string,
          public readonly batchId: number
     ) {
          super(message, 'LEDGER_INVARIANT_VIOLATION', 500);
     }
}

// Ordering primitive misuse. These indicate a bug in the caller and are never
// mapped to a client response.

export class CapacityExceededError extends Error {
     constructor(
          public readonly container: string,
          public readonly capacity: number
     ) {
          super(`${container} is full (capacity ${capacity})`);
          this.name = 'CapacityExceededError';
     }
}

export class EmptyContainerError extends Error {
     constructor(public readonly container: string) {
          super(`${container} is empty`);
          this.name = 'EmptyContainerError';
     }
}
