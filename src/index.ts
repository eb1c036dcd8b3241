/**
 * Application entry point for dropwatch.
 *
 * Initializes all subsystems in order:
 * 1. Environment validation
 * 2. Database (open + migrate) and component wiring
 * 3. Cadence scheduler
 * 4. Health server
 * 5. Bot long polling
 *
 * SIGINT/SIGTERM stop everything in reverse order.
 */

import type { FastifyInstance } from 'fastify';
import { loadEnv, type Env } from './env.js';
import { createContext, type AppContext } from './context.js';
import { createServer } from './server.js';
import { CommandHandlers, registerCommands } from './bot/commands.js';
import { getLogger } from './shared/logger.js';
import { isOperationalError } from './shared/errors.js';

const logger = getLogger('server');

let shutdown: ((reason: string) => Promise<void>) | undefined;

async function main(): Promise<void> {
  logger.info('Starting dropwatch...');

  // ---------------------------------------------------------------------------
  // 1. Validate environment
  // ---------------------------------------------------------------------------
  let env: Env;
  try {
    env = loadEnv();
    logger.info({ nodeEnv: env.NODE_ENV }, 'Environment validated');
  } catch (error) {
    logger.fatal({ err: error }, 'Environment validation failed');
    process.exit(1);
  }

  // ---------------------------------------------------------------------------
  // 2. Database and components
  // ---------------------------------------------------------------------------
  let ctx: AppContext;
  try {
    ctx = createContext(env);
    logger.info({ databasePath: env.DATABASE_PATH }, 'Database ready');
  } catch (error) {
    logger.fatal({ err: error }, 'Initialization failed');
    process.exit(1);
  }

  registerCommands(
    ctx.bot,
    new CommandHandlers({
      store: ctx.store,
      ops: ctx.ops,
      scheduler: ctx.scheduler,
      adminChatId: env.ADMIN_CHAT_ID,
    }),
  );

  let server: FastifyInstance | undefined;
  let stopping = false;

  shutdown = async (reason: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info({ reason }, 'Shutting down');

    try {
      await ctx.scheduler.stop();
      if (ctx.bot.isRunning()) {
        await ctx.bot.stop();
      }
      if (server) {
        await server.close();
      }
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
    } finally {
      ctx.database.close();
      logger.info('Shutdown complete');
    }
  };

  // ---------------------------------------------------------------------------
  // 3. Scheduler
  // ---------------------------------------------------------------------------
  ctx.scheduler.start();

  // ---------------------------------------------------------------------------
  // 4. Health server
  // ---------------------------------------------------------------------------
  try {
    server = await createServer({
      store: ctx.store,
      scheduler: ctx.scheduler,
      startedAt: ctx.startedAt,
    });
    const host = '0.0.0.0';
    await server.listen({ host, port: env.PORT });
    logger.info({ port: env.PORT }, `Health server on http://${host}:${env.PORT}/health`);
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start health server');
    await shutdown('server-start-failed');
    process.exit(1);
  }

  // ---------------------------------------------------------------------------
  // 5. Bot long polling
  // ---------------------------------------------------------------------------
  void ctx.bot
    .start({
      drop_pending_updates: true,
      onStart: (info) => logger.info({ username: info.username }, 'Bot polling started'),
    })
    .catch(async (error: unknown) => {
      logger.fatal({ err: error }, 'Bot polling stopped unexpectedly');
      await shutdown?.('bot-failed');
      process.exit(1);
    });

  logger.info(
    {
      liveIntervalSeconds: env.LIVE_INTERVAL_SECONDS,
      intervalMinutes: env.INTERVAL_MINUTES,
      dailyHourUtc: env.DAILY_HOUR_UTC,
      opsChannel: env.ADMIN_CHAT_ID !== undefined,
      safeBrowsing: env.SAFE_BROWSING_KEY !== undefined,
      whois: env.WHOIS_API_KEY !== undefined,
      etherscan: env.ETHERSCAN_API_KEY !== undefined,
      socialBuzz: env.TWITTER_BEARER_TOKEN !== undefined,
    },
    'dropwatch started',
  );
}

// ---------------------------------------------------------------------------
// Signals and global error handlers
// ---------------------------------------------------------------------------

function exitAfterShutdown(reason: string, code: number): void {
  const done = shutdown ? shutdown(reason) : Promise.resolve();
  void done
    .catch((err: unknown) => logger.error({ err }, 'Shutdown failed'))
    .finally(() => process.exit(code));
}

process.once('SIGINT', () => exitAfterShutdown('SIGINT', 0));
process.once('SIGTERM', () => exitAfterShutdown('SIGTERM', 0));

process.on('uncaughtException', (error: Error) => {
  logger.fatal({ err: error }, 'Uncaught exception - initiating graceful shutdown');
  exitAfterShutdown('uncaughtException', 1);
});

process.on('unhandledRejection', (reason: unknown) => {
  if (isOperationalError(reason)) {
    logger.error({ err: reason }, 'Unhandled operational rejection');
    return;
  }
  logger.fatal({ err: reason }, 'Unhandled rejection - initiating graceful shutdown');
  exitAfterShutdown('unhandledRejection', 1);
});

// ---------------------------------------------------------------------------
// Start
// ---------------------------------------------------------------------------
main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Startup failed');
  process.exit(1);
});
