import * as amqplib from 'amqplib';
import type { Channel, ConsumeMessage } from 'amqplib';
import { DomainEventType } from '../types/fulfillment.types';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

let connection: AmqpConnection | null = null;
let channel: Channel | null = null;

export const FULFILLMENT_EVENTS_EXCHANGE = 'fulfillment.events';
export const DEAD_LETTER_EXCHANGE = 'dlx.fulfillment';

export const LOW_STOCK_QUEUE = 'notifications.low-stock';
export const EXPIRY_QUEUE = 'notifications.expiry';
export const ORDER_LIFECYCLE_QUEUE = 'reporting.order-lifecycle';

// Consumer queues and the event types each one receives
export const QUEUE_BINDINGS: Record<string, readonly DomainEventType[]> = {
     [LOW_STOCK_QUEUE]: ['LowStockDetected'],
     [EXPIRY_QUEUE]: ['BatchesExpired', 'NearExpiryWarning'],
     [ORDER_LIFECYCLE_QUEUE]: [
          'OrderAllocated',
          'OrderDeallocated',
          'OrderCancelled',
          'OrderShipped',
          'OrderDelivered',
     ],
};

export function routingKeyFor(type: string): string {
     return `fulfillment.${type}`;
}

function deadLetterQueueFor(queue: string): string {
     return `dlq.${queue}`;
}

async function connect(): Promise<AmqpConnection> {
     const url = process.env.AMQP_URL || 'amqp://localhost:5672';
     logger.info({ url: url.replace(/:[^:]*@/, ':****@') }, 'Connecting to RabbitMQ');

     const conn = await amqplib.connect(url);

     conn.on('error', (err) => {
          logger.error({ err }, 'RabbitMQ connection error');
     });

     conn.on('close', () => {
          logger.warn('RabbitMQ connection closed, attempting to reconnect...');
          setTimeout(() => {
               connection = null;
               channel = null;
          }, 5000);
     });

     logger.info('Connected to RabbitMQ');
     return conn;
}

export async function getChannel(): Promise<Channel> {
     if (channel) return channel;

     if (!connection) {
          connection = await connect();
     }

     const ch = await connection.createChannel();
     await ch.prefetch(parseInt(process.env.AMQP_PREFETCH || '10', 10));

     await ch.assertExchange(FULFILLMENT_EVENTS_EXCHANGE, 'topic', { durable: true });
     await ch.assertExchange(DEAD_LETTER_EXCHANGE, 'topic', { durable: true });

     for (const [queue, types] of Object.entries(QUEUE_BINDINGS)) {
          const dlq = deadLetterQueueFor(queue);

          await ch.assertQueue(queue, {
               durable: true,
               deadLetterExchange: DEAD_LETTER_EXCHANGE,
               deadLetterRoutingKey: dlq,
          });
          await ch.assertQueue(dlq, { durable: true });
          await ch.bindQueue(dlq, DEAD_LETTER_EXCHANGE, dlq);

          for (const type of types) {
               await ch.bindQueue(queue, FULFILLMENT_EVENTS_EXCHANGE, routingKeyFor(type));
          }
     }

     logger.info('RabbitMQ channel created and configured');

     channel = ch;
     return ch;
}

export async function publishEvent(
     exchange: string,
     routingKey: string,
     payload: Record<string, unknown>
): Promise<void> {
     const ch = await getChannel();
     const content = Buffer.from(JSON.stringify(payload));

     ch.publish(exchange, routingKey, content, {
          persistent: true,
          contentType: 'application/json',
          timestamp: Date.now(),
     });
}

export async function closeConnection(): Promise<void> {
     if (channel) {
          await channel.close();
          channel = null;
     }
     if (connection) {
          await connection.close();
          connection = null;
     }
     logger.info('RabbitMQ connection closed');
}

// Handle shutdown signals (disabled in test mode)
if (process.env.NODE_ENV !== 'test') {
     process.on('SIGINT', async () => {
          await closeConnection();
     });

     process.on('SIGTERM', async () => {
          await closeConnection();
     });
}

export type { ConsumeMessage };
