import Fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import * as dotenv from 'dotenv';
import { registerCheckoutRoutes } from './routes/checkout';
import { checkConnection, closePool } from '@checkout-stock/shared/src/db/client';
import { logger } from '@checkout-stock/shared/src/utils/logger';

dotenv.config();

const PORT = parseInt(process.env.CHECKOUT_API_PORT || '3000', 10);
const HOST = process.env.CHECKOUT_API_HOST || '0.0.0.0';

async function main() {
     const app = Fastify({
          logger: true,
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => {
               const header = req.headers['x-correlation-id'];
               return typeof header === 'string' && header ? header : `req-${Date.now()}`;
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
                    title: 'Checkout Stock API',
                    description:
                         'Shipping address updates with stock availability checks and time-bounded reservations',
                    version: '1.0.0',
               },
               servers: [{ url: 'http://localhost:3000', description: 'Development' }],
               tags: [
                    { name: 'checkout', description: 'Checkout shipping address and availability' },
                    { name: 'stock', description: 'Stock availability and reservations' },
                    { name: 'health', description: 'Health and readiness checks' },
               ],
          },
     });

     await app.register(swaggerUi, {
          routePrefix: '/docs',
          uiConfig: {
               docExpansion: 'list',
               deepLinking: true,
          },
     });

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
               },
          },
          async (_request, reply) => {
               const dbHealthy = await checkConnection();
               if (!dbHealthy) {
                    reply.code(503);
                    return { status: 'not_ready', error: 'Database connection failed' };
               }
               return { status: 'ready', dependencies: { database: 'ok' } };
          }
     );

     await app.register(registerCheckoutRoutes);

     try {
          await app.listen({ port: PORT, host: HOST });
          logger.info(`Checkout API listening on ${HOST}:${PORT}`);
          logger.info(`OpenAPI docs available at http://${HOST}:${PORT}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await app.close();
          await closePool();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error');
     process.exit(1);
});
