/**
 * Type definitions for the notification module.
 * Shared by the distribution engine, the messaging targets and the
 * operational notifier.
 */

import type { Candidate } from '../types/index.js';

// ---------------------------------------------------------------------------
// Distribution target
// ---------------------------------------------------------------------------

export type SendOutcome = 'success' | 'permanent_failure' | 'transient_failure';

/** Whether a failed recipient can ever be reached again. */
export type DeliveryFailureKind = 'permanent' | 'transient';

/**
 * A messaging platform adapter. `send` classifies failures instead of
 * throwing; a rejection is treated as a transient failure.
 */
export interface DistributionTarget {
  readonly name: string;
  send(recipientId: string, text: string): Promise<SendOutcome>;
}

// ---------------------------------------------------------------------------
// Digest data
// ---------------------------------------------------------------------------

export interface DigestData {
  period: {
    from: Date;
    to: Date;
  };
  items: Candidate[];
  /** Active recipients at the time the digest was built. */
  recipientCount: number;
}
