import dotenv from 'dotenv';
import { logger } from '@stockroom/shared/src/utils/logger';
import { EventDispatcher } from './dispatcher';

dotenv.config();

async function main() {
     const dispatcher = new EventDispatcher({
          batchSize: parseInt(process.env.EVENT_BATCH_SIZE || '100', 10),
          pollIntervalMs: parseInt(process.env.EVENT_POLL_INTERVAL_MS || '200', 10),
          maxRetries: parseInt(process.env.EVENT_MAX_RETRIES || '5', 10),
     });

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          dispatcher.stop();
          await new Promise((resolve) => setTimeout(resolve, 1000));
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);

     await dispatcher.start();
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in event dispatcher');
     process.exit(1);
});
