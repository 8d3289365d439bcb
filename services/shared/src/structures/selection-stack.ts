import { CapacityExceededError, EmptyContainerError } from '../utils/errors';

/**
 * Bounded LIFO stack over a fixed-size array.
 *
 * Batch candidates arrive sorted by expiry ascending; pushing them in reverse
 * leaves the earliest-expiring batch on top, so successive pops walk the
 * candidates in FEFO order.
 */
export class SelectionStack<T> {
     private readonly slots: Array<T | undefined>;
     private top = 0;

     constructor(public readonly capacity: number) {
          if (!Number.isInteger(capacity) || capacity < 0) {
               throw new RangeError(
                    `SelectionStack capacity must be a non-negative integer, got ${capacity}`
               );
          }
          this.slots = new Array<T | undefined>(capacity);
     }

     get size(): number {
          return this.top;
     }

     isEmpty(): boolean {
          return this.top === 0;
     }

     isFull(): boolean {
          return this.top === this.capacity;
     }

     push(item: T): void {
          if (this.isFull()) {
               throw new CapacityExceededError('SelectionStack', this.capacity);
          }
          this.slots[this.top] = item;
          this.top++;
     }

     pop(): T {
          const item = this.top > 0 ? this.slots[this.top - 1] : undefined;
          if (item === undefined) {
               throw new EmptyContainerError('SelectionStack');
          }
          this.top--;
          this.slots[this.top] = undefined;
          return item;
     }

     peek(): T {
          const item = this.top > 0 ? this.slots[this.top - 1] : undefined;
          if (item === undefined) {
               throw new EmptyContainerError('SelectionStack');
          }
          return item;
     }
}
