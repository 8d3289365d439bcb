import Fastify, { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import { registerAdminRoutes } from './routes/admin';
import { checkConnection } from '@stockroom/shared/src/db/client';

export interface AppOptions {
     logger?: boolean;
}

const PORT = parseInt(process.env.ADMIN_API_PORT || '3100', 10);

export async function buildApp(options: AppOptions = {}): Promise<FastifyInstance> {
     const app = Fastify({
          logger: options.logger ?? { level: process.env.LOG_LEVEL || 'info' },
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => {
               const header = req.headers['x-correlation-id'];
               return (Array.isArray(header) ? header[0] : header) || `admin-${Date.now()}`;
          },
          ajv: {
               customOptions: {
                    removeAdditional: 'all',
                    coerceTypes: true,
                    useDefaults: true,
                    strict: false,
               },
          },
     });

     await app.register(cors, {
          origin: true,
     });

     await app.register(swagger, {
          openapi: {
               info: {
                    title: 'Stockroom Admin API',
                    description: 'Stock receipt and adjustment, batch status, expiry scans, order queue runs and returns',
                    version: '1.0.0',
               },
               servers: [{ url: `http://localhost:${PORT}`, description: 'Development' }],
               tags: [
                    { name: 'batches', description: 'Receipt, adjustment and status of stock batches' },
                    { name: 'expiry', description: 'Expiry scanning' },
                    { name: 'orders', description: 'Order queue runs' },
                    { name: 'returns', description: 'Customer returns and their disposition' },
                    { name: 'health', description: 'Health and readiness checks' },
               ],
               components: {
                    securitySchemes: {
                         actorId: {
                              type: 'apiKey',
                              name: 'x-actor-id',
                              in: 'header',
                              description: 'Identifier of the operator, recorded in the ledger',
                         },
                    },
               },
               security: [{ actorId: [] }],
          },
     });

     await app.register(swaggerUi, {
          routePrefix: '/docs',
          uiConfig: {
               docExpansion: 'list',
               deepLinking: true,
          },
     });

     // Health checks
     app.get(
          '/health',
          {
               schema: {
                    tags: ['health'],
                    description: 'Basic health check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ok' },
                                   timestamp: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          async () => {
               return {
                    status: 'ok',
                    timestamp: new Date().toISOString(),
               };
          }
     );

     app.get(
          '/health/ready',
          {
               schema: {
                    tags: ['health'],
                    description: 'Readiness check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ready' },
                                   dependencies: { type: 'object' },
                              },
                         },
                         503: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string' },
                                   error: { type: 'string' },
                              },
                         },
                    },
               },
          },
          async (_, reply) => {
               try {
                    const dbHealthy = await checkConnection();
                    if (!dbHealthy) {
                         reply.code(503);
                         return { status: 'not_ready', error: 'Database connection failed' };
                    }
                    return { status: 'ready', dependencies: { database: 'ok' } };
               } catch (error) {
                    reply.code(503);
                    return {
                         status: 'not_ready',
                         error: error instanceof Error ? error.message : 'Unknown error',
                    };
               }
          }
     );

     await app.register(registerAdminRoutes, { prefix: '/admin' });

     return app;
}
