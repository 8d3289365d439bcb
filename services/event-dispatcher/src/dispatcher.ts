import type { Channel } from 'amqplib';
import { PoolClient } from 'pg';
import { withTransaction } from '@stockroom/shared/src/db/client';
import {
     FULFILLMENT_EVENTS_EXCHANGE,
     getChannel,
     routingKeyFor,
} from '@stockroom/shared/src/messaging/client';
import { logger } from '@stockroom/shared/src/utils/logger';

export interface DispatcherOptions {
     batchSize: number;
     pollIntervalMs: number;
     // FAILED events are picked up again until they have failed this many times
     maxRetries: number;
}

type Publisher = Pick<Channel, 'publish'>;

interface OutboxRow {
     id: string;
     type: string;
     payload: Record<string, unknown>;
     created_at: Date;
}

export interface BatchOutcome {
     sent: number;
     failed: number;
}

/**
 * Relays committed outbox rows to the fulfillment exchange. Rows are claimed
 * with SKIP LOCKED so several dispatchers can run side by side.
 */
export class EventDispatcher {
     private running = false;

     constructor(
          private readonly options: DispatcherOptions,
          private readonly channelProvider: () => Promise<Publisher> = getChannel,
          private readonly runInTransaction: <T>(
               fn: (client: PoolClient) => Promise<T>
          ) => Promise<T> = withTransaction
     ) {}

     async start(): Promise<void> {
          this.running = true;
          logger.info(this.options, 'Starting event dispatcher');

          while (this.running) {
               try {
                    await this.processBatch();
               } catch (error) {
                    logger.error({ error }, 'Error processing event batch');
               }

               await this.sleep(this.options.pollIntervalMs);
          }
     }

     async processBatch(): Promise<BatchOutcome> {
          return this.runInTransaction(async (client) => {
               const { rows: events } = await client.query<OutboxRow>(
                    `
        SELECT id, type, payload, created_at
        FROM domain_event
        WHERE status = 'PENDING'
           OR (status = 'FAILED' AND retry_count < $2)
        ORDER BY created_at, id
        LIMIT $1
        FOR UPDATE SKIP LOCKED
      `,
                    [this.options.batchSize, this.options.maxRetries]
               );

               const outcome: BatchOutcome = { sent: 0, failed: 0 };
               if (events.length === 0) {
                    return outcome;
               }

               logger.debug({ eventCount: events.length }, 'Processing event batch');

               const channel = await this.channelProvider();

               for (const event of events) {
                    try {
                         channel.publish(
                              FULFILLMENT_EVENTS_EXCHANGE,
                              routingKeyFor(event.type),
                              Buffer.from(JSON.stringify({ type: event.type, ...event.payload })),
                              {
                                   persistent: true,
                                   contentType: 'application/json',
                                   timestamp: Date.now(),
                                   messageId: String(event.id),
                                   type: event.type,
                              }
                         );

                         await client.query(
                              `
            UPDATE domain_event
            SET status = 'SENT', error = NULL, updated_at = NOW()
            WHERE id = $1
          `,
                              [event.id]
                         );
                         outcome.sent += 1;

                         logger.debug({ eventId: event.id, type: event.type }, 'Event dispatched');
                    } catch (error) {
                         logger.error({ error, eventId: event.id }, 'Failed to dispatch event');

                         await client.query(
                              `
            UPDATE domain_event
            SET status = 'FAILED',
                updated_at = NOW(),
                retry_count = retry_count + 1,
                error = $2
            WHERE id = $1
          `,
                              [event.id, error instanceof Error ? error.message : 'Unknown error']
                         );
                         outcome.failed += 1;
                    }
               }

               logger.info(outcome, 'Event batch processed');
               return outcome;
          });
     }

     stop(): void {
          logger.info('Stopping event dispatcher');
          this.running = false;
     }

     private sleep(ms: number): Promise<void> {
          return new Promise((resolve) => setTimeout(resolve, ms));
     }
}
