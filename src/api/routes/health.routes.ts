import type { FastifyInstance } from 'fastify';
import type { AirdropStore } from '../../db/store.js';

export interface HealthRouteOptions {
  store: Pick<AirdropStore, 'ping' | 'getRecipientCount'>;
  scheduler: { readonly isRunning: boolean };
  startedAt: Date;
}

/**
 * Health check routes.
 * Liveness for the process supervisor and the uptime pinger.
 */
export async function healthRoutes(app: FastifyInstance, options: HealthRouteOptions): Promise<void> {
  // GET /health - System health overview
  app.get('/health', async (_request, reply) => {
    const uptimeMs = Date.now() - options.startedAt.getTime();

    // Database: execute a real query to confirm connectivity
    let databaseStatus: 'ok' | 'error' = 'error';
    let recipients: number | null = null;
    try {
      databaseStatus = (await options.store.ping()) ? 'ok' : 'error';
      recipients = await options.store.getRecipientCount();
    } catch {
      databaseStatus = 'error';
    }

    const schedulerStatus = options.scheduler.isRunning ? 'running' : 'stopped';
    const isHealthy = databaseStatus === 'ok' && options.scheduler.isRunning;

    return reply.status(isHealthy ? 200 : 503).send({
      status: isHealthy ? 'healthy' : 'degraded',
      uptime: uptimeMs,
      uptimeHuman: formatUptime(uptimeMs),
      database: databaseStatus,
      scheduler: schedulerStatus,
      recipients,
      timestamp: new Date().toISOString(),
    });
  });

  // GET /uptime - Plain liveness check for keep-alive pingers
  app.get('/uptime', async (_request, reply) => {
    return reply.type('text/plain').send(`OK ${formatUptime(Date.now() - options.startedAt.getTime())}`);
  });
}

export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h ${minutes % 60}m`;
  if (hours > 0) return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}
