export { RecencyGuard } from './guard.js';
export { TrustScorer, deriveVerdict, extractContractAddress } from './trust-scorer.js';
export type { TrustScorerOptions, ScoreInput } from './trust-scorer.js';
export { SocialBuzzRater, buzzFromMetrics, extractPostId } from './social-buzz.js';
export { createTrustChecks } from './checks/index.js';
export type { TrustCheckKeys } from './checks/index.js';
export { createSourceFetcher, QuestPlatformSource } from './sources/index.js';
export type {
  SourceFetcher,
  TrustCheck,
  TrustCheckInput,
  CheckOutcome,
  VerdictThresholds,
} from './types.js';
