/**
 * Type definitions for the discovery module.
 * These types define the shape of data flowing through fetching,
 * the recency guard, and trust scoring.
 */

import type { RawCandidate } from '../types/index.js';

// ---------------------------------------------------------------------------
// Source fetchers
// ---------------------------------------------------------------------------

/**
 * Stable contract every catalog adapter implements. `fetch` returns the
 * current catalog state and may be called repeatedly; it rejects with a
 * `SourceError` when the catalog cannot be read.
 */
export interface SourceFetcher {
  readonly name: string;
  fetch(limit: number, signal?: AbortSignal): Promise<RawCandidate[]>;
}

// ---------------------------------------------------------------------------
// Trust checks
// ---------------------------------------------------------------------------

export interface TrustCheckInput {
  title: string;
  description: string;
  link: string;
  /** First 0x-prefixed contract address found in the candidate, if any. */
  contract: string | null;
}

export interface CheckOutcome {
  penalty: number;
  reason: string;
  /** Deterministic positive match; forces the scam verdict. */
  veto?: boolean;
}

/**
 * One independent signal of the trust scorer. Contributions are clamped
 * to `[0, maxPenalty]`; a check that throws or times out contributes
 * `fallbackPenalty` instead.
 */
export interface TrustCheck {
  readonly name: string;
  readonly maxPenalty: number;
  readonly fallbackPenalty: number;
  run(input: TrustCheckInput, signal: AbortSignal): Promise<CheckOutcome>;
}

export interface VerdictThresholds {
  /** Risk at or above this value is a scam. */
  scam: number;
  /** Risk at or above this value (and below `scam`) is suspicious. */
  suspicious: number;
}
