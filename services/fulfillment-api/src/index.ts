import * as dotenv from 'dotenv';
import { buildApp } from './app';
import { logger } from '@stockroom/shared/src/utils/logger';

// Load environment variables
dotenv.config();

const PORT = parseInt(process.env.FULFILLMENT_API_PORT || '3000', 10);
const HOST = process.env.FULFILLMENT_API_HOST || '0.0.0.0';

async function main() {
     const app = await buildApp();

     // Start server
     try {
          await app.listen({ port: PORT, host: HOST });
          logger.info(`Fulfillment API listening on ${HOST}:${PORT}`);
          logger.info(`OpenAPI docs available at http://${HOST}:${PORT}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

     // The pool's own signal handlers end the process once connections are closed
     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await app.close();
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in fulfillment API');
     process.exit(1);
});
