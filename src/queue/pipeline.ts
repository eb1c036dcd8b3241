/**
 * One discovery cycle: fetch, guard, score, rank, persist, dispatch.
 *
 * Every cadence drives the same pipeline with its own batch size. A
 * candidate that throws is isolated from the rest of its batch; after
 * repeated failures it is quarantined (stored as unknown and notified)
 * so later cycles stop reprocessing it.
 */

import { ulid } from 'ulid';
import { getCycleLogger, type Logger } from '../shared/logger.js';
import { PersistenceError, errorMessage } from '../shared/errors.js';
import { VERDICTS } from '../shared/constants.js';
import { normalizeUrl } from '../shared/utils.js';
import type { TypedEventEmitter } from '../shared/events.js';
import type { AirdropStore } from '../db/store.js';
import type { SourceFetcher } from '../discovery/types.js';
import type { ScoreInput } from '../discovery/trust-scorer.js';
import { computeRank, isEligible, type EligibilityPolicy } from '../intelligence/rank-composer.js';
import { composeAdminReport, composeAlert } from '../notification/message-composer.js';
import type { OpsNotifier } from '../notification/ops-notifier.js';
import type { Candidate, NewCandidate, RawCandidate, ScoreResult } from '../types/index.js';
import type { CycleReport, DeliveryReport, PipelineState } from './types.js';

/** Upper bound on links tracked for repeated failures. */
const MAX_TRACKED_FAILURES = 1_000;

export interface PipelineDependencies {
  source: SourceFetcher;
  guard: { shouldProcess(link: string): Promise<boolean> };
  scorer: { score(input: ScoreInput, signal?: AbortSignal): Promise<ScoreResult> };
  buzz: { rate(socialHandle: string | null, signal?: AbortSignal): Promise<number | null> };
  store: AirdropStore;
  engine: {
    deliver(message: string, recipients: readonly string[], signal?: AbortSignal): Promise<DeliveryReport>;
  };
  ops: OpsNotifier;
  events: TypedEventEmitter;
  policy: EligibilityPolicy;
  /** Consecutive failures before a candidate is quarantined. */
  quarantineAfterFailures: number;
}

export interface RunCycleOptions {
  /** Label used in logs and state events. Default: "manual" */
  cadence?: string;
  signal?: AbortSignal;
}

type ProcessOutcome =
  | { kind: 'skipped' }
  | { kind: 'persist-failed' }
  | { kind: 'stored'; candidate: Candidate; eligible: boolean };

export class DiscoveryPipeline {
  private readonly states = new Map<string, PipelineState>();
  private readonly failures = new Map<string, number>();

  constructor(private readonly deps: PipelineDependencies) {}

  /** Current state of the cycle run under `cadence`. */
  stateOf(cadence: string): PipelineState {
    return this.states.get(cadence) ?? 'idle';
  }

  async runCycle(batchSize: number, options: RunCycleOptions = {}): Promise<CycleReport> {
    const cadence = options.cadence ?? 'manual';
    const { signal } = options;
    const startTime = Date.now();
    const cycleId = ulid();
    const log = getCycleLogger('pipeline', cycleId).child({ cadence });

    const report: CycleReport = {
      cycleId,
      fetched: 0,
      skipped: 0,
      stored: 0,
      dispatched: 0,
      failed: 0,
      quarantined: 0,
      sentCount: 0,
      failedCount: 0,
      sourceError: null,
      aborted: false,
      durationMs: 0,
    };

    try {
      // ── scraping ──────────────────────────────────────────────────────
      this.transition(cadence, 'scraping');
      const raw = await this.fetchBatch(batchSize, report, log, signal);
      if (raw === null) {
        return report;
      }

      // ── processing ────────────────────────────────────────────────────
      this.transition(cadence, 'processing');
      const eligible = await this.processBatch(raw, report, log, signal);

      // ── dispatching ───────────────────────────────────────────────────
      this.transition(cadence, 'dispatching');
      if (eligible.length > 0 && !report.aborted) {
        await this.dispatch(eligible, report, log, signal);
      }

      return report;
    } finally {
      this.transition(cadence, 'idle');
      report.durationMs = Date.now() - startTime;
      if (signal?.aborted) report.aborted = true;
      log.info(
        {
          fetched: report.fetched,
          skipped: report.skipped,
          stored: report.stored,
          dispatched: report.dispatched,
          failed: report.failed,
          quarantined: report.quarantined,
          sentCount: report.sentCount,
          failedCount: report.failedCount,
          sourceError: report.sourceError,
          aborted: report.aborted,
          durationMs: report.durationMs,
        },
        'Cycle finished',
      );
    }
  }

  // -------------------------------------------------------------------------
  // Stages
  // -------------------------------------------------------------------------

  /** Null ends the cycle early: the source failed or had nothing. */
  private async fetchBatch(
    batchSize: number,
    report: CycleReport,
    log: Logger,
    signal?: AbortSignal,
  ): Promise<RawCandidate[] | null> {
    const { source, ops, events } = this.deps;

    let raw: RawCandidate[];
    try {
      raw = await source.fetch(batchSize, signal);
    } catch (error) {
      report.sourceError = errorMessage(error);
      log.warn({ source: source.name, err: error }, 'Source fetch failed, waiting for next tick');
      events.emit('source:failed', { source: source.name, error: report.sourceError });
      await ops.sourceDown(source.name, report.sourceError);
      return null;
    }

    report.fetched = raw.length;
    if (raw.length === 0) {
      report.sourceError = 'empty result';
      log.warn({ source: source.name }, 'Source returned no items');
      events.emit('source:failed', { source: source.name, error: report.sourceError });
      await ops.emptyFetch(source.name);
      return null;
    }

    return raw.slice(0, batchSize);
  }

  private async processBatch(
    raw: RawCandidate[],
    report: CycleReport,
    log: Logger,
    signal?: AbortSignal,
  ): Promise<Candidate[]> {
    const { events } = this.deps;
    const seen = new Set<string>();
    const eligible: Candidate[] = [];

    for (const item of raw) {
      if (signal?.aborted) {
        report.aborted = true;
        break;
      }

      const link = normalizeUrl(item.link);
      if (seen.has(link)) {
        report.skipped++;
        events.emit('candidate:skipped', { link, reason: 'in-batch-duplicate' });
        continue;
      }
      seen.add(link);

      try {
        const outcome = await this.processCandidate(item, link, log, signal);
        switch (outcome.kind) {
          case 'skipped':
            report.skipped++;
            events.emit('candidate:skipped', { link, reason: 'duplicate' });
            break;
          case 'persist-failed':
            report.failed++;
            break;
          case 'stored':
            report.stored++;
            this.failures.delete(link);
            if (outcome.eligible) eligible.push(outcome.candidate);
            break;
        }
      } catch (error) {
        report.failed++;
        const quarantined = await this.recordFailure(item, link, error, log);
        if (quarantined) report.quarantined++;
      }
    }

    return eligible;
  }

  private async processCandidate(
    item: RawCandidate,
    link: string,
    log: Logger,
    signal?: AbortSignal,
  ): Promise<ProcessOutcome> {
    const { guard, scorer, buzz, store, ops, events, policy } = this.deps;

    if (!(await guard.shouldProcess(link))) {
      return { kind: 'skipped' };
    }

    const title = item.title.trim();
    const description = item.description?.trim() ?? '';
    const score = await scorer.score({ title, description, link }, signal);
    const socialBuzzScore = await buzz.rate(item.socialHandle ?? null, signal);
    const rewardMagnitude = item.rewardMagnitude ?? null;

    const values: NewCandidate = {
      link,
      title,
      description,
      socialHandle: item.socialHandle ?? null,
      rewardMagnitude,
      riskScore: score.riskScore,
      socialBuzzScore,
      verdict: score.verdict,
      rankScore: computeRank(score.riskScore, socialBuzzScore, rewardMagnitude),
      source: this.deps.source.name,
    };

    let candidate: Candidate;
    try {
      candidate = await store.insertCandidate(values);
    } catch (error) {
      // Not retried this cycle; the next fetch brings the link back
      log.error({ link, err: error }, 'Candidate write failed');
      return { kind: 'persist-failed' };
    }

    events.emit('candidate:stored', {
      link,
      verdict: candidate.verdict,
      rankScore: candidate.rankScore,
    });

    if (score.degraded) {
      const degraded = score.factors.filter((factor) => factor.degraded).map((factor) => factor.check);
      await ops.scoringDegraded(link, degraded);
    }
    await ops.report(composeAdminReport(candidate, score));

    const eligible = isEligible(candidate, policy);
    log.info(
      { link, verdict: candidate.verdict, riskScore: candidate.riskScore, rankScore: candidate.rankScore, eligible },
      'Candidate stored',
    );

    return { kind: 'stored', candidate, eligible };
  }

  private async dispatch(
    eligible: Candidate[],
    report: CycleReport,
    log: Logger,
    signal?: AbortSignal,
  ): Promise<void> {
    const { store, engine, ops, events } = this.deps;

    let recipients: string[];
    try {
      recipients = await store.listActiveRecipients();
    } catch (error) {
      log.error({ err: error }, 'Cannot list recipients, dispatch skipped');
      return;
    }

    for (const candidate of eligible) {
      if (signal?.aborted) {
        report.aborted = true;
        break;
      }

      const delivery = await engine.deliver(composeAlert(candidate), recipients, signal);
      report.dispatched++;
      report.sentCount += delivery.sentCount;
      report.failedCount += delivery.failedCount;
      if (delivery.unreachable.length > 0) {
        const dropped = new Set(delivery.unreachable);
        recipients = recipients.filter((recipientId) => !dropped.has(recipientId));
      }

      try {
        await store.logNotified(candidate.link);
        await store.markCandidateNotified(candidate.link);
      } catch (error) {
        log.error({ link: candidate.link, err: error }, 'Failed to record send');
      }

      events.emit('delivery:completed', {
        link: candidate.link,
        sentCount: delivery.sentCount,
        failedCount: delivery.failedCount,
      });
      await ops.deliverySummary(candidate.link, delivery);
    }
  }

  // -------------------------------------------------------------------------
  // Failure handling
  // -------------------------------------------------------------------------

  /** Counts a processing failure; returns true when the link was quarantined. */
  private async recordFailure(
    item: RawCandidate,
    link: string,
    error: unknown,
    log: Logger,
  ): Promise<boolean> {
    const count = (this.failures.get(link) ?? 0) + 1;
    this.trackFailure(link, count);
    log.error({ link, attempt: count, err: error }, 'Candidate processing failed');

    let quarantined = false;
    if (count >= this.deps.quarantineAfterFailures) {
      quarantined = await this.quarantine(item, link, log);
    }

    this.deps.events.emit('candidate:failed', { link, error: errorMessage(error), quarantined });
    await this.deps.ops.poisonCandidate(link, errorMessage(error), quarantined);
    return quarantined;
  }

  private trackFailure(link: string, count: number): void {
    this.failures.delete(link);
    this.failures.set(link, count);
    if (this.failures.size > MAX_TRACKED_FAILURES) {
      const oldest = this.failures.keys().next();
      if (!oldest.done) this.failures.delete(oldest.value);
    }
  }

  private async quarantine(item: RawCandidate, link: string, log: Logger): Promise<boolean> {
    const rewardMagnitude = typeof item.rewardMagnitude === 'number' && Number.isFinite(item.rewardMagnitude)
      ? item.rewardMagnitude
      : null;

    try {
      await this.deps.store.insertCandidate({
        link,
        title: item.title,
        description: '',
        socialHandle: null,
        rewardMagnitude,
        riskScore: null,
        socialBuzzScore: null,
        verdict: VERDICTS.UNKNOWN,
        rankScore: computeRank(null, null, rewardMagnitude),
        source: this.deps.source.name,
        notified: true,
      });
      this.failures.delete(link);
      log.warn({ link }, 'Candidate quarantined after repeated failures');
      return true;
    } catch (error) {
      const detail = error instanceof PersistenceError ? error.code : errorMessage(error);
      log.error({ link, detail }, 'Quarantine write failed');
      return false;
    }
  }

  private transition(cadence: string, to: PipelineState): void {
    const from = this.stateOf(cadence);
    if (from === to) return;
    this.states.set(cadence, to);
    this.deps.events.emit('pipeline:state', { cadence, from, to });
  }
}
