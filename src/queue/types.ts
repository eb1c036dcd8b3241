/** Stages of one discovery cycle. */
export type PipelineState = 'idle' | 'scraping' | 'processing' | 'dispatching';

export const CADENCE_NAMES = ['live', 'interval', 'daily', 'keep-alive'] as const;

export type CadenceName = (typeof CADENCE_NAMES)[number];

/** Outcome of one `runCycle` pass, logged and returned to the caller. */
export interface CycleReport {
  cycleId: string;
  fetched: number;
  /** Skipped by the guard or repeated inside the batch. */
  skipped: number;
  stored: number;
  /** Candidates handed to the distribution engine. */
  dispatched: number;
  /** Candidates that threw while being processed. */
  failed: number;
  quarantined: number;
  sentCount: number;
  failedCount: number;
  /** Set when the source failed or returned nothing. */
  sourceError: string | null;
  aborted: boolean;
  durationMs: number;
}

export interface DeliveryReport {
  sentCount: number;
  failedCount: number;
  /** Recipients that failed permanently; leave them out of later sends. */
  unreachable: string[];
}
