import { PoolClient } from 'pg';
import { DomainEventType } from '../types/fulfillment.types';

/**
 * Records a domain event in the outbox table inside the caller's transaction.
 * The event dispatcher publishes it once the transaction has committed.
 */
export async function recordDomainEvent(
     client: PoolClient,
     type: DomainEventType,
     payload: Record<string, unknown>
): Promise<void> {
     await client.query(
          `
      INSERT INTO domain_event (type, payload)
      VALUES ($1, $2::jsonb)
    `,
          [type, JSON.stringify({ ...payload, timestamp: new Date().toISOString() })]
     );
}
