import Fastify, { type FastifyInstance } from 'fastify';

import { getLogger } from './utils/logger.js';
import { errorHandler } from './middleware/error.middleware.js';
import { stimulateRoutes } from './routes/stimulate.routes.js';
import { systemRoutes } from './routes/system.routes.js';
import type { Runtime } from './operations/setup.js';

/** Largest accepted request envelope (batch requests list many paths) */
const BODY_LIMIT_BYTES = 4 * 1024 * 1024;

/**
 * Build and configure the Fastify application around a wired runtime
 */
export async function buildApp(runtime: Runtime): Promise<FastifyInstance> {
  const logger = getLogger();

  const app = Fastify({
    logger: false, // We use our own Pino logger
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
    bodyLimit: BODY_LIMIT_BYTES,
  });

  // Request logging
  app.addHook('onRequest', async (request) => {
    logger.debug(
      {
        requestId: request.id,
        method: request.method,
        url: request.url,
      },
      'Incoming request'
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.info(
      {
        requestId: request.id,
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed'
    );
  });

  // Error handler
  app.setErrorHandler(errorHandler);

  // Register routes
  await app.register(systemRoutes, { router: runtime.router });
  await app.register(stimulateRoutes, { router: runtime.router });

  return app;
}
