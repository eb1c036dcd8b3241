/**
 * Builds the daily digest of the best-ranked candidates.
 */

import { getLogger } from '../shared/logger.js';
import type { AirdropStore } from '../db/store.js';
import type { DigestData } from './types.js';

const log = getLogger('delivery', { service: 'digest-builder' });

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DigestBuilderOptions {
  store: Pick<AirdropStore, 'listRecentCandidates' | 'getRecipientCount'>;
  size: number;
  now?: () => Date;
}

export class DigestBuilder {
  private readonly now: () => Date;

  constructor(private readonly options: DigestBuilderOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Top candidates of the last 24 hours, ordered by rank.
   */
  async buildDailyDigest(): Promise<DigestData> {
    const to = this.now();
    const from = new Date(to.getTime() - DAY_MS);

    const [items, recipientCount] = await Promise.all([
      this.options.store.listRecentCandidates(from, this.options.size),
      this.options.store.getRecipientCount(),
    ]);

    log.info({ items: items.length, recipientCount }, 'Daily digest built');

    return { period: { from, to }, items, recipientCount };
  }
}
