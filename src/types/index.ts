export type {
  RawCandidate,
  Candidate,
  NewCandidate,
  RiskFactor,
  ScoreResult,
  CachedScore,
} from './candidate.types.js';

export type {
  Recipient,
  SupportTicket,
  NewSupportTicket,
} from './recipient.types.js';
