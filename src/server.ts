import Fastify, { type FastifyInstance } from 'fastify';
import { healthRoutes, type HealthRouteOptions } from './api/routes/health.routes.js';
import { getLogger } from './shared/logger.js';

const logger = getLogger('server');

/**
 * Creates and configures the Fastify server instance.
 *
 * - Health check at GET /health
 * - Plain uptime check at GET /uptime
 * - JSON 404 for everything else
 */
export async function createServer(options: HealthRouteOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own pino logger
    requestTimeout: 10_000,
  });

  // ---------------------------------------------------------------------------
  // Request logging
  // ---------------------------------------------------------------------------
  app.addHook('onResponse', (request, reply, done) => {
    logger.debug(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed',
    );
    done();
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  await app.register(healthRoutes, options);

  app.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send({
      error: { code: 'NOT_FOUND', message: 'Resource not found' },
    });
  });

  return app;
}
