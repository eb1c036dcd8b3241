/**
 * Application context: every long-lived component, constructed once at
 * startup and passed by reference. Nothing in the tree reaches for a
 * module-level singleton.
 */

import { Bot } from 'grammy';
import type { Env } from './env.js';
import { openDatabase, type DatabaseHandle } from './db/index.js';
import { migrate } from './db/migrate.js';
import { SqliteAirdropStore } from './db/sqlite-store.js';
import type { AirdropStore } from './db/store.js';
import { TypedEventEmitter } from './shared/events.js';
import {
  RecencyGuard,
  SocialBuzzRater,
  TrustScorer,
  createSourceFetcher,
  createTrustChecks,
} from './discovery/index.js';
import type { SourceFetcher } from './discovery/types.js';
import {
  DigestBuilder,
  DistributionEngine,
  OpsNotifier,
  TelegramTarget,
} from './notification/index.js';
import { DiscoveryPipeline } from './queue/pipeline.js';
import { CadenceScheduler } from './queue/schedulers/cadence-scheduler.js';

const HOUR_MS = 60 * 60 * 1000;

export interface AppContext {
  env: Env;
  database: DatabaseHandle;
  store: AirdropStore;
  events: TypedEventEmitter;
  bot: Bot;
  source: SourceFetcher;
  ops: OpsNotifier;
  engine: DistributionEngine;
  pipeline: DiscoveryPipeline;
  scheduler: CadenceScheduler;
  startedAt: Date;
}

/**
 * Opens and migrates the database, then wires every component. Throws
 * when the database cannot be opened or the cadence config is invalid.
 */
export function createContext(env: Env): AppContext {
  const database = openDatabase(env.DATABASE_PATH);
  try {
    migrate(database.sqlite);
    return wireComponents(env, database);
  } catch (error) {
    database.close();
    throw error;
  }
}

function wireComponents(env: Env, database: DatabaseHandle): AppContext {
  const store = new SqliteAirdropStore(database.db);
  const events = new TypedEventEmitter();
  const bot = new Bot(env.BOT_TOKEN);
  const target = new TelegramTarget(bot.api);
  const ops = new OpsNotifier(target, env.ADMIN_CHAT_ID, env.EXTERNAL_TIMEOUT_MS);

  const source = createSourceFetcher('quest-platform', {
    baseUrl: env.SOURCE_BASE_URL,
    apiUrl: env.SOURCE_API_URL,
    requestTimeoutMs: env.EXTERNAL_TIMEOUT_MS,
  });

  const scorer = new TrustScorer({
    checks: createTrustChecks({
      safeBrowsingKey: env.SAFE_BROWSING_KEY,
      whoisApiKey: env.WHOIS_API_KEY,
      etherscanApiKey: env.ETHERSCAN_API_KEY,
    }),
    thresholds: { scam: env.SCAM_THRESHOLD, suspicious: env.SUSPICIOUS_THRESHOLD },
    checkTimeoutMs: env.EXTERNAL_TIMEOUT_MS,
    store,
  });

  const engine = new DistributionEngine({
    target,
    store,
    sendDelayMs: env.SEND_DELAY_MS,
    sendTimeoutMs: env.EXTERNAL_TIMEOUT_MS,
  });

  const pipeline = new DiscoveryPipeline({
    source,
    guard: new RecencyGuard(store, env.COOLDOWN_HOURS * HOUR_MS),
    scorer,
    buzz: new SocialBuzzRater({
      bearerToken: env.TWITTER_BEARER_TOKEN,
      timeoutMs: env.EXTERNAL_TIMEOUT_MS,
    }),
    store,
    engine,
    ops,
    events,
    policy: {
      rankFloor: env.RANK_FLOOR,
      immediateRewardMin: env.IMMEDIATE_REWARD_MIN,
      immediateRewardMax: env.IMMEDIATE_REWARD_MAX,
    },
    quarantineAfterFailures: env.QUARANTINE_AFTER_FAILURES,
  });

  const scheduler = new CadenceScheduler(
    {
      liveIntervalSeconds: env.LIVE_INTERVAL_SECONDS,
      intervalMinutes: env.INTERVAL_MINUTES,
      dailyHourUtc: env.DAILY_HOUR_UTC,
      keepAliveMinutes: env.KEEP_ALIVE_MINUTES,
      uptimeUrl: env.UPTIME_URL,
      batchSizes: {
        live: env.LIVE_BATCH_SIZE,
        interval: env.INTERVAL_BATCH_SIZE,
        daily: env.DAILY_BATCH_SIZE,
      },
    },
    {
      pipeline,
      digest: new DigestBuilder({ store, size: env.DIGEST_SIZE }),
      ops,
      events,
    },
  );

  return {
    env,
    database,
    store,
    events,
    bot,
    source,
    ops,
    engine,
    pipeline,
    scheduler,
    startedAt: new Date(),
  };
}
