import type { Verdict } from '../shared/constants.js';

/**
 * A record as it comes out of a Source Fetcher, before any identity,
 * scoring or persistence has been applied.
 */
export interface RawCandidate {
  title: string;
  link: string;
  description?: string;
  socialHandle?: string;
  /** Reward units reported by the source (quest XP). */
  rewardMagnitude?: number;
}

/** A discovered opportunity as stored. */
export interface Candidate {
  id: string;
  /** Canonical URL; unique across every candidate ever stored. */
  link: string;
  title: string;
  description: string;
  socialHandle: string | null;
  rewardMagnitude: number | null;
  /** 0-100, higher = more risk-flagged. Null when scoring failed outright. */
  riskScore: number | null;
  socialBuzzScore: number | null;
  verdict: Verdict;
  /** Derived from riskScore, socialBuzzScore and rewardMagnitude. */
  rankScore: number;
  source: string;
  discoveredAt: Date;
  notified: boolean;
}

export type NewCandidate = Omit<Candidate, 'id' | 'discoveredAt' | 'notified'> & {
  notified?: boolean;
};

export interface RiskFactor {
  check: string;
  penalty: number;
  reason: string;
  /** Deterministic match that forces the scam verdict. */
  veto: boolean;
  /** The check failed or timed out and its fallback penalty was used. */
  degraded: boolean;
}

export interface ScoreResult {
  riskScore: number | null;
  verdict: Verdict;
  factors: RiskFactor[];
  /** At least one check fell back to its conservative default. */
  degraded: boolean;
  /** Name of the check whose match forced the scam verdict. */
  vetoedBy: string | null;
  cached: boolean;
}

export interface CachedScore {
  riskScore: number;
  verdict: Verdict;
  factors: RiskFactor[];
  scoredAt: Date;
}
