// ---------------------------------------------------------------------------
// Candidate domain enums
// ---------------------------------------------------------------------------

export const VERDICTS = {
  CLEAN: 'clean',
  SUSPICIOUS: 'suspicious',
  SCAM: 'scam',
  UNKNOWN: 'unknown',
} as const;

export type Verdict = (typeof VERDICTS)[keyof typeof VERDICTS];

export const VERDICT_VALUES = [
  VERDICTS.CLEAN,
  VERDICTS.SUSPICIOUS,
  VERDICTS.SCAM,
  VERDICTS.UNKNOWN,
] as const;

export const TICKET_STATUSES = ['open', 'replied', 'closed'] as const;

export type TicketStatus = (typeof TICKET_STATUSES)[number];

// ---------------------------------------------------------------------------
// Scores
// ---------------------------------------------------------------------------

/** Bounds of the risk score (higher = more risk-flagged). */
export const RISK_SCORE_MIN = 0;
export const RISK_SCORE_MAX = 100;

/** Value used for a missing risk or buzz score when ranking. */
export const NEUTRAL_SCORE = 50;

// ---------------------------------------------------------------------------
// HTTP
// ---------------------------------------------------------------------------

export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
] as const;
