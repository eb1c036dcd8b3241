/**
 * Rank composition for scored candidates.
 *
 * The rank blends the inverted risk score, the social buzz estimate and
 * a log-damped reward magnitude. Weights are fixed so that a given
 * input triple always produces the same rank.
 */

import { NEUTRAL_SCORE, VERDICTS, type Verdict } from '../shared/constants.js';

const RISK_WEIGHT = 0.45;
const BUZZ_WEIGHT = 0.35;
const REWARD_WEIGHT = 2.0;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * rank = (100 - risk) * 0.45 + buzz * 0.35 + ln(1 + reward) * 2.0,
 * rounded to two decimals. Missing risk and buzz count as 50, a
 * missing (or negative) reward as 0.
 */
export function computeRank(
  riskScore: number | null | undefined,
  socialBuzzScore: number | null | undefined,
  rewardMagnitude: number | null | undefined,
): number {
  const risk = riskScore ?? NEUTRAL_SCORE;
  const buzz = socialBuzzScore ?? NEUTRAL_SCORE;
  const reward = Math.max(0, rewardMagnitude ?? 0);

  return round2(
    (100 - risk) * RISK_WEIGHT + buzz * BUZZ_WEIGHT + Math.log(1 + reward) * REWARD_WEIGHT,
  );
}

export interface EligibilityPolicy {
  rankFloor: number;
  /** Exclusive bounds of the immediate-send reward window. */
  immediateRewardMin: number;
  immediateRewardMax: number;
}

export interface RankedCandidate {
  verdict: Verdict;
  rankScore: number;
  rewardMagnitude: number | null;
}

/**
 * Whether a stored candidate is handed to the distribution engine.
 * Scam and unknown verdicts never are.
 */
export function isEligible(candidate: RankedCandidate, policy: EligibilityPolicy): boolean {
  if (candidate.verdict !== VERDICTS.CLEAN && candidate.verdict !== VERDICTS.SUSPICIOUS) {
    return false;
  }
  if (candidate.rankScore >= policy.rankFloor) {
    return true;
  }
  const reward = candidate.rewardMagnitude;
  return reward !== null && reward > policy.immediateRewardMin && reward < policy.immediateRewardMax;
}
