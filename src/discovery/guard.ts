import { getLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import type { AirdropStore } from '../db/store.js';

const log = getLogger('discovery', { component: 'recency-guard' });

/**
 * Decides whether a candidate link is new enough to act on. A link is
 * rejected when it was ever stored, or when it was notified within the
 * cool-down window. Storage errors reject the link (fail closed).
 */
export class RecencyGuard {
  constructor(
    private readonly store: Pick<AirdropStore, 'candidateExists' | 'wasNotifiedRecently'>,
    private readonly cooldownMs: number,
  ) {}

  async shouldProcess(link: string): Promise<boolean> {
    try {
      if (await this.store.candidateExists(link)) {
        log.debug({ link }, 'Already stored');
        return false;
      }
      if (await this.store.wasNotifiedRecently(link, this.cooldownMs)) {
        log.debug({ link }, 'Notified within cool-down');
        return false;
      }
      return true;
    } catch (error) {
      log.warn({ link, error: errorMessage(error) }, 'Guard lookup failed, treating as duplicate');
      return false;
    }
  }
}
