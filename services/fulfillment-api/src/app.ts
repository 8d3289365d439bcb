import Fastify, { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import { registerInventoryRoutes } from './routes/inventory';
import { registerOrderRoutes } from './routes/orders';
import { checkConnection } from '@stockroom/shared/src/db/client';

export interface AppOptions {
     logger?: boolean;
}

const PORT = parseInt(process.env.FULFILLMENT_API_PORT || '3000', 10);

export async function buildApp(options: AppOptions = {}): Promise<FastifyInstance> {
     const app = Fastify({
          logger: options.logger ?? { level: process.env.LOG_LEVEL || 'info' },
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => {
               const header = req.headers['x-correlation-id'];
               return (Array.isArray(header) ? header[0] : header) || `req-${Date.now()}`;
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

     // CORS
     await app.register(cors, {
          origin: true,
     });

     // OpenAPI/Swagger
     await app.register(swagger, {
          openapi: {
               info: {
                    title: 'Stockroom Fulfillment API',
                    description: 'Order lifecycle: FEFO allocation, picking, packing, shipping and cancellation',
                    version: '1.0.0',
               },
               servers: [{ url: `http://localhost:${PORT}`, description: 'Development' }],
               tags: [
                    { name: 'orders', description: 'Order creation and status transitions' },
                    { name: 'inventory', description: 'Batch availability queries' },
                    { name: 'health', description: 'Health and readiness checks' },
               ],
               components: {
                    securitySchemes: {
                         actorId: {
                              type: 'apiKey',
                              name: 'x-actor-id',
                              in: 'header',
                         },
                    },
               },
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
                    description: 'Readiness check with dependency validation',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ready' },
                                   dependencies: {
                                        type: 'object',
                                        properties: {
                                             database: { type: 'string' },
                                        },
                                   },
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
          async (_request, reply) => {
               try {
                    const dbHealthy = await checkConnection();
                    if (!dbHealthy) {
                         reply.code(503);
                         return {
                              status: 'not_ready',
                              error: 'Database connection failed',
                         };
                    }

                    return {
                         status: 'ready',
                         dependencies: {
                              database: 'ok',
                         },
                    };
               } catch (error) {
                    reply.code(503);
                    return {
                         status: 'not_ready',
                         error: error instanceof Error ? error.message : 'Unknown error',
                    };
               }
          }
     );

     await app.register(registerOrderRoutes, { prefix: '/orders' });
     await app.register(registerInventoryRoutes, { prefix: '/inventory' });

     return app;
}
