import { CapacityExceededError, EmptyContainerError } from '../utils/errors';

/**
 * Bounded FIFO queue over a fixed-size ring buffer.
 *
 * The allocator loads an order's lines into one of these so they are always
 * processed in their stored sequence.
 */
export class WorkQueue<T> {
     private readonly slots: Array<T | undefined>;
     private head = 0;
     private tail = 0;
     private count = 0;

     constructor(public readonly capacity: number) {
          if (!Number.isInteger(capacity) || capacity < 0) {
               throw new RangeError(`WorkQueue capacity must be a non-negative integer, got ${capacity}`);
          }
          this.slots = new Array<T | undefined>(capacity);
     }

     get size(): number {
          return this.count;
     }

     isEmpty(): boolean {
          return this.count === 0;
     }

     isFull(): boolean {
          return this.count === this.capacity;
     }

     enqueue(item: T): void {
          if (this.isFull()) {
               throw new CapacityExceededError('WorkQueue', this.capacity);
          }
          this.slots[this.tail] = item;
          this.tail = (this.tail + 1) % this.capacity;
          this.count++;
     }

     dequeue(): T {
          const item = this.slots[this.head];
          if (this.count === 0 || item === undefined) {
               throw new EmptyContainerError('WorkQueue');
          }
          this.slots[this.head] = undefined;
          this.head = (this.head + 1) % this.capacity;
          this.count--;
          return item;
     }

     peek(): T {
          const item = this.slots[this.head];
          if (this.count === 0 || item === undefined) {
               throw new EmptyContainerError('WorkQueue');
          }
          return item;
     }
}
