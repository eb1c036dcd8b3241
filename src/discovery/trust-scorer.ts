/**
 * Trust scoring for discovered candidates.
 *
 * Sums bounded penalties from independent checks into a risk score in
 * [0, 100] (higher = more risk-flagged). A failing or slow check never
 * fails the score: its fallback penalty is used and the result is
 * marked degraded. Clean results are cached per (link, contract).
 */

import { getLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { withTimeout } from '../shared/timing.js';
import { RISK_SCORE_MAX, RISK_SCORE_MIN, VERDICTS, type Verdict } from '../shared/constants.js';
import type { AirdropStore } from '../db/store.js';
import type { RiskFactor, ScoreResult } from '../types/index.js';
import type { TrustCheck, TrustCheckInput, VerdictThresholds } from './types.js';

const log = getLogger('scoring', { component: 'trust-scorer' });

const CONTRACT_PATTERN = /0x[a-fA-F0-9]{40}/;

export interface TrustScorerOptions {
  checks: TrustCheck[];
  thresholds: VerdictThresholds;
  /** Upper bound for each check, including its network calls. */
  checkTimeoutMs: number;
  /** Omit to disable caching. */
  store?: AirdropStore;
}

export interface ScoreInput {
  title: string;
  description: string;
  link: string;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function extractContractAddress(text: string): string | null {
  const match = CONTRACT_PATTERN.exec(text);
  return match ? match[0].toLowerCase() : null;
}

/** Maps a risk score to its verdict. A veto always wins. */
export function deriveVerdict(
  riskScore: number,
  thresholds: VerdictThresholds,
  vetoed: boolean,
): Verdict {
  if (vetoed || riskScore >= thresholds.scam) return VERDICTS.SCAM;
  if (riskScore >= thresholds.suspicious) return VERDICTS.SUSPICIOUS;
  return VERDICTS.CLEAN;
}

export class TrustScorer {
  constructor(private readonly options: TrustScorerOptions) {}

  async score(input: ScoreInput, signal?: AbortSignal): Promise<ScoreResult> {
    const contract = extractContractAddress(`${input.link} ${input.title} ${input.description}`);

    const cached = await this.readCache(input.link, contract);
    if (cached) {
      return cached;
    }

    const checkInput: TrustCheckInput = { ...input, contract };
    const factors = await Promise.all(
      this.options.checks.map((check) => this.runCheck(check, checkInput, signal)),
    );

    const total = factors.reduce((sum, factor) => sum + factor.penalty, 0);
    const riskScore = clamp(total, RISK_SCORE_MIN, RISK_SCORE_MAX);
    const vetoFactor = factors.find((factor) => factor.veto);
    const degraded = factors.some((factor) => factor.degraded);
    const verdict = deriveVerdict(riskScore, this.options.thresholds, vetoFactor !== undefined);

    const result: ScoreResult = {
      riskScore,
      verdict,
      factors,
      degraded,
      vetoedBy: vetoFactor?.check ?? null,
      cached: false,
    };

    log.debug(
      { link: input.link, riskScore, verdict, degraded, vetoedBy: result.vetoedBy },
      'Candidate scored',
    );

    // Degraded results carry fallback penalties; let the next cycle re-query
    if (!degraded) {
      await this.writeCache(input.link, contract, result);
    }

    return result;
  }

  private async runCheck(
    check: TrustCheck,
    input: TrustCheckInput,
    signal?: AbortSignal,
  ): Promise<RiskFactor> {
    const timeout = AbortSignal.timeout(this.options.checkTimeoutMs);
    const checkSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

    try {
      const outcome = await withTimeout(
        check.run(input, checkSignal),
        this.options.checkTimeoutMs,
        check.name,
      );
      if (!Number.isFinite(outcome.penalty)) {
        throw new Error(`Non-numeric penalty ${String(outcome.penalty)}`);
      }
      return {
        check: check.name,
        penalty: clamp(outcome.penalty, 0, check.maxPenalty),
        reason: outcome.reason,
        veto: outcome.veto ?? false,
        degraded: false,
      };
    } catch (error) {
      log.warn(
        { check: check.name, link: input.link, error: errorMessage(error) },
        'Trust check failed, using fallback penalty',
      );
      return {
        check: check.name,
        penalty: clamp(check.fallbackPenalty, 0, check.maxPenalty),
        reason: `Check unavailable: ${errorMessage(error)}`,
        veto: false,
        degraded: true,
      };
    }
  }

  private async readCache(link: string, contract: string | null): Promise<ScoreResult | null> {
    const { store } = this.options;
    if (!store) return null;

    try {
      const hit = await store.getCachedScore(link, contract);
      if (!hit) return null;
      log.debug({ link, contract }, 'Score cache hit');
      const veto = hit.factors.find((factor) => factor.veto);
      return {
        riskScore: hit.riskScore,
        verdict: hit.verdict,
        factors: hit.factors,
        degraded: false,
        vetoedBy: veto?.check ?? null,
        cached: true,
      };
    } catch (error) {
      log.warn({ link, error: errorMessage(error) }, 'Score cache read failed');
      return null;
    }
  }

  private async writeCache(link: string, contract: string | null, result: ScoreResult): Promise<void> {
    const { store } = this.options;
    if (!store || result.riskScore === null) return;

    try {
      await store.cacheScore(link, contract, {
        riskScore: result.riskScore,
        verdict: result.verdict,
        factors: result.factors,
      });
    } catch (error) {
      log.warn({ link, error: errorMessage(error) }, 'Score cache write failed');
    }
  }
}
