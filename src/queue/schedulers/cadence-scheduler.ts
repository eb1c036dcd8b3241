/**
 * Cadence scheduler.
 *
 * Drives the discovery pipeline on independent node-cron schedules (UTC):
 * - live:       every LIVE_INTERVAL_SECONDS, small batch
 * - interval:   every INTERVAL_MINUTES, medium batch
 * - daily:      once per UTC day at DAILY_HOUR_UTC, large batch + digest
 * - keep-alive: every KEEP_ALIVE_MINUTES, heartbeat to UPTIME_URL
 *
 * Each cadence holds a single-pass lock, so a tick arriving while the
 * previous run of the same cadence is still going is dropped.
 */

import cron from 'node-cron';
import got, { type Got } from 'got';
import { getLogger } from '../../shared/logger.js';
import { ConfigError, errorMessage } from '../../shared/errors.js';
import { utcDateKey } from '../../shared/utils.js';
import type { TypedEventEmitter } from '../../shared/events.js';
import type { DigestData } from '../../notification/types.js';
import type { OpsNotifier } from '../../notification/ops-notifier.js';
import type { RunCycleOptions } from '../pipeline.js';
import { SinglePassLock } from '../job-lock.js';
import { CADENCE_NAMES, type CadenceName, type CycleReport } from '../types.js';

const log = getLogger('scheduler', { component: 'cadence-scheduler' });

type CronTask = ReturnType<typeof cron.schedule>;

const TIMEZONE = 'UTC';
const KEEP_ALIVE_TIMEOUT_MS = 10_000;
/** Gate check for the daily cadence. */
const DAILY_TICK = '0 * * * * *';

export interface CadenceConfig {
  liveIntervalSeconds: number;
  intervalMinutes: number;
  dailyHourUtc: number;
  keepAliveMinutes: number;
  uptimeUrl?: string;
  batchSizes: {
    live: number;
    interval: number;
    daily: number;
  };
}

export interface CadenceSchedulerDependencies {
  pipeline: { runCycle(batchSize: number, options?: RunCycleOptions): Promise<CycleReport> };
  digest: { buildDailyDigest(): Promise<DigestData> };
  ops: OpsNotifier;
  events: TypedEventEmitter;
  http?: Got;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Cron expressions
// ---------------------------------------------------------------------------

const SECOND_TICK = '* * * * * *';
const MINUTE_TICK = '0 * * * * *';

/**
 * Cron schedule for a fixed period. A step expression only repeats evenly
 * when the step divides its field: a 16-minute step fires at :00, :16,
 * :32 and :48, then again after 12 minutes. Other periods tick every
 * second or minute and are gated on the time since the last start.
 */
export interface CadenceTiming {
  expression: string;
  gate: { periodMs: number; slackMs: number } | null;
}

function steady(expression: string): CadenceTiming {
  return { expression, gate: null };
}

function gated(expression: string, seconds: number): CadenceTiming {
  // Half a tick, so a tick landing a few ms early still counts
  const slackMs = expression === SECOND_TICK ? 500 : 30_000;
  return { expression, gate: { periodMs: seconds * 1000, slackMs } };
}

export function periodTiming(seconds: number, field: string): CadenceTiming {
  if (!Number.isInteger(seconds) || seconds < 1) {
    throw new ConfigError(`Invalid period for ${field}: ${seconds}s`, field);
  }

  if (seconds < 60) {
    if (60 % seconds !== 0) return gated(SECOND_TICK, seconds);
    return steady(seconds === 1 ? SECOND_TICK : `*/${seconds} * * * * *`);
  }
  if (seconds % 60 !== 0) return gated(SECOND_TICK, seconds);

  const minutes = seconds / 60;
  if (minutes < 60) {
    if (60 % minutes !== 0) return gated(MINUTE_TICK, seconds);
    return steady(minutes === 1 ? MINUTE_TICK : `0 */${minutes} * * * *`);
  }

  const hours = minutes / 60;
  if (Number.isInteger(hours) && 24 % hours === 0) {
    if (hours === 1) return steady('0 0 * * * *');
    return steady(hours === 24 ? '0 0 0 * * *' : `0 0 */${hours} * * *`);
  }
  return gated(MINUTE_TICK, seconds);
}

// ---------------------------------------------------------------------------
// Scheduler
// ---------------------------------------------------------------------------

export class CadenceScheduler {
  private readonly locks = new Map<CadenceName, SinglePassLock>(
    CADENCE_NAMES.map((name) => [name, new SinglePassLock(name)]),
  );
  private readonly http: Got;
  private readonly now: () => Date;
  private readonly timings: Record<CadenceName, CadenceTiming>;
  private readonly lastStarted = new Map<CadenceName, number>();
  private cronJobs: CronTask[] = [];
  private controller = new AbortController();
  private running = false;
  /** UTC date the daily cadence last fired; lost on restart. */
  private lastDailyRun: string | null = null;

  constructor(
    private readonly config: CadenceConfig,
    private readonly deps: CadenceSchedulerDependencies,
  ) {
    this.http = deps.http ?? got;
    this.now = deps.now ?? (() => new Date());

    if (!Number.isInteger(config.dailyHourUtc) || config.dailyHourUtc < 0 || config.dailyHourUtc > 23) {
      throw new ConfigError(`Invalid daily hour: ${config.dailyHourUtc}`, 'DAILY_HOUR_UTC');
    }

    // Validated up front so a bad config fails at startup, not at first tick
    this.timings = {
      live: periodTiming(config.liveIntervalSeconds, 'LIVE_INTERVAL_SECONDS'),
      interval: periodTiming(config.intervalMinutes * 60, 'INTERVAL_MINUTES'),
      daily: steady(DAILY_TICK),
      'keep-alive': periodTiming(config.keepAliveMinutes * 60, 'KEEP_ALIVE_MINUTES'),
    };
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Date key of the last daily run, if any. */
  get lastDailyRunDate(): string | null {
    return this.lastDailyRun;
  }

  /**
   * Starts all cadence cron jobs.
   */
  start(): void {
    if (this.running) {
      log.warn('CadenceScheduler already running');
      return;
    }

    this.controller = new AbortController();

    for (const name of CADENCE_NAMES) {
      const { expression } = this.timings[name];
      const task = cron.schedule(
        expression,
        () => {
          this.tick(name).catch((err) => {
            log.error({ err, cadence: name }, 'Cadence tick failed');
          });
        },
        { timezone: TIMEZONE },
      );
      this.cronJobs.push(task);
      log.info({ cadence: name, expression }, 'Cadence scheduled');
    }

    this.running = true;
    log.info('CadenceScheduler started');
  }

  /**
   * Stops the cron jobs, signals in-flight runs to stop after their
   * current candidate or recipient, and waits for them to settle.
   */
  async stop(): Promise<void> {
    for (const job of this.cronJobs) {
      job.stop();
    }
    this.cronJobs = [];
    this.running = false;
    this.controller.abort();

    await Promise.all([...this.locks.values()].map((lock) => lock.idle()));
    log.info('CadenceScheduler stopped');
  }

  /**
   * One scheduled tick of `name`. The daily cadence only proceeds at the
   * configured UTC hour, once per UTC day; a gated cadence only once its
   * period has passed since the last start. Resolves false when the tick
   * was gated or collapsed into a run already in flight.
   */
  async tick(name: CadenceName): Promise<boolean> {
    const now = this.now();
    if (name === 'daily') {
      if (now.getUTCHours() !== this.config.dailyHourUtc) return false;
      if (this.lastDailyRun === utcDateKey(now)) return false;
    }

    const { gate } = this.timings[name];
    const last = this.lastStarted.get(name);
    if (gate && last !== undefined && now.getTime() - last < gate.periodMs - gate.slackMs) {
      return false;
    }
    return this.run(name);
  }

  /**
   * Runs `name` immediately, ignoring the daily hour gate. Still subject
   * to the cadence's lock.
   */
  async triggerNow(name: CadenceName): Promise<boolean> {
    log.info({ cadence: name }, 'Manual trigger');
    return this.run(name);
  }

  // -------------------------------------------------------------------------
  // Cadence bodies
  // -------------------------------------------------------------------------

  private async run(name: CadenceName): Promise<boolean> {
    const lock = this.locks.get(name);
    if (!lock) return false;

    const result = await lock.tryRun(async () => {
      this.lastStarted.set(name, this.now().getTime());
      switch (name) {
        case 'live':
          await this.runCycle(name, this.config.batchSizes.live);
          break;
        case 'interval':
          await this.runCycle(name, this.config.batchSizes.interval);
          break;
        case 'daily':
          await this.runDaily();
          break;
        case 'keep-alive':
          await this.heartbeat();
          break;
      }
    });

    if (!result.ran) {
      log.debug({ cadence: name }, 'Previous run still in flight, tick dropped');
    }
    return result.ran;
  }

  private async runCycle(name: CadenceName, batchSize: number): Promise<CycleReport> {
    return this.deps.pipeline.runCycle(batchSize, {
      cadence: name,
      signal: this.controller.signal,
    });
  }

  private async runDaily(): Promise<void> {
    this.lastDailyRun = utcDateKey(this.now());
    await this.runCycle('daily', this.config.batchSizes.daily);

    if (this.controller.signal.aborted) return;

    const digest = await this.deps.digest.buildDailyDigest();
    const delivered = await this.deps.ops.digest(digest);
    this.deps.events.emit('digest:sent', { items: digest.items.length });
    log.info({ items: digest.items.length, delivered }, 'Daily digest sent');
  }

  private async heartbeat(): Promise<void> {
    const url = this.config.uptimeUrl;
    if (!url) {
      log.debug('Heartbeat');
      return;
    }

    try {
      const response = await this.http.get(url, {
        timeout: { request: KEEP_ALIVE_TIMEOUT_MS },
        signal: this.controller.signal,
      });
      log.debug({ statusCode: response.statusCode }, 'Heartbeat sent');
    } catch (error) {
      log.warn({ url, error: errorMessage(error) }, 'Heartbeat failed');
    }
  }
}
