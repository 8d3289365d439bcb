import * as dotenv from 'dotenv';
import { buildApp } from './app';
import { logger } from '@stockroom/shared/src/utils/logger';

dotenv.config();

const PORT = parseInt(process.env.ADMIN_API_PORT || '3100', 10);
const HOST = process.env.ADMIN_API_HOST || '0.0.0.0';

async function main() {
     const app = await buildApp();

     try {
          await app.listen({ port: PORT, host: HOST });
          logger.info(`Admin API listening on ${HOST}:${PORT}`);
          logger.info(`OpenAPI docs available at http://${HOST}:${PORT}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await app.close();
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in admin API');
     process.exit(1);
});
