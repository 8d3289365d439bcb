import { Actor, OrderAction, OrderStatus } from '../types/fulfillment.types';
import { InvalidTransitionError } from '../utils/errors';

export const ORDER_ACTIONS: readonly OrderAction[] = [
     'allocate',
     'pick',
     'pack',
     'ship',
     'deliver',
     'cancel',
     'deallocate',
];

export const TERMINAL_STATUSES: readonly OrderStatus[] = ['delivered', 'cancelled'];

const NON_TERMINAL: readonly OrderStatus[] = ['new', 'allocated', 'picked', 'packed', 'shipped'];

interface TransitionRule {
     from: readonly OrderStatus[];
     // Statuses the action is legal from only for privileged actors
     privilegedFrom?: readonly OrderStatus[];
}

const TRANSITIONS: Record<OrderAction, TransitionRule> = {
     allocate: { from: ['new'] },
     pick: { from: ['allocated'] },
     pack: { from: ['picked'] },
     ship: { from: ['packed'], privilegedFrom: ['allocated', 'picked'] },
     deliver: { from: ['shipped'] },
     cancel: { from: NON_TERMINAL },
     deallocate: { from: NON_TERMINAL },
};

export function isTerminalStatus(status: OrderStatus): boolean {
     return TERMINAL_STATUSES.includes(status);
}

export function canTransition(status: OrderStatus, action: OrderAction, actor: Actor): boolean {
     const rule = TRANSITIONS[action];
     if (rule.from.includes(status)) {
          return true;
     }
     return actor.privileged && (rule.privilegedFrom?.includes(status) ?? false);
}

export function assertTransition(
     orderId: number,
     status: OrderStatus,
     action: OrderAction,
     actor: Actor
): void {
     if (canTransition(status, action, actor)) {
          return;
     }

     const rule = TRANSITIONS[action];
     if (isTerminalStatus(status)) {
          throw new InvalidTransitionError(orderId, status, action, 'order is closed');
     }
     if (rule.privilegedFrom?.includes(status)) {
          throw new InvalidTransitionError(
               orderId,
               status,
               action,
               'skipping packing requires a privileged actor'
          );
     }
     throw new InvalidTransitionError(
          orderId,
          status,
          action,
          `expected status ${rule.from.map((s) => `'${s}'`).join(' or ')}`
     );
}

/** Actions the given actor may perform on an order in `status`. */
export function availableActions(status: OrderStatus, actor: Actor): OrderAction[] {
     return ORDER_ACTIONS.filter((action) => canTransition(status, action, actor));
}

/**
 * Status an order lands in after a successful action. Allocation and
 * deallocation depend on what the action achieved, so callers pass that in.
 */
export function nextStatus(
     status: OrderStatus,
     action: OrderAction,
     outcome: { allocatedUnits?: number } = {}
): OrderStatus {
     switch (action) {
          case 'allocate':
               return (outcome.allocatedUnits ?? 0) > 0 ? 'allocated' : status;
          case 'deallocate':
               return status === 'allocated' || status === 'picked' || status === 'packed'
                    ? 'new'
                    : status;
          case 'pick':
               return 'picked';
          case 'pack':
               return 'packed';
          case 'ship':
               return 'shipped';
          case 'deliver':
               return 'delivered';
          case 'cancel':
               return 'cancelled';
     }
}
