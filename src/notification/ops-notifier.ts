import { getLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { withTimeout } from '../shared/timing.js';
import type { DeliveryReport } from '../queue/types.js';
import { composeDigest } from './message-composer.js';
import type { DigestData, DistributionTarget } from './types.js';

const log = getLogger('delivery', { component: 'ops-notifier' });

/**
 * Routes operational messages to the admin chat only. Ordinary
 * recipients never see these. Every method resolves within
 * `sendTimeoutMs`, even when the admin chat is unset or unreachable.
 */
export class OpsNotifier {
  constructor(
    private readonly target: DistributionTarget,
    private readonly adminChatId: string | undefined,
    private readonly sendTimeoutMs = 10_000,
  ) {}

  get enabled(): boolean {
    return this.adminChatId !== undefined;
  }

  async notify(text: string): Promise<boolean> {
    if (!this.adminChatId) {
      log.debug({ text }, 'No admin chat configured, operational message logged only');
      return false;
    }

    try {
      const outcome = await withTimeout(
        this.target.send(this.adminChatId, text),
        this.sendTimeoutMs,
        'operational message',
      );
      if (outcome !== 'success') {
        log.warn({ outcome }, 'Operational message not delivered');
        return false;
      }
      return true;
    } catch (error) {
      log.warn({ error: errorMessage(error) }, 'Operational message failed');
      return false;
    }
  }

  async sourceDown(source: string, error: string): Promise<void> {
    await this.notify(`⚠️ Source ${source} unavailable: ${error}`);
  }

  async emptyFetch(source: string): Promise<void> {
    await this.notify(`⚠️ Source ${source} returned no items`);
  }

  async scoringDegraded(link: string, checks: string[]): Promise<void> {
    await this.notify(`⚠️ Scoring degraded for ${link}: ${checks.join(', ')} unavailable`);
  }

  async poisonCandidate(link: string, error: string, quarantined: boolean): Promise<void> {
    const suffix = quarantined ? ' (quarantined)' : '';
    await this.notify(`❌ Candidate failed${suffix}: ${link}\n${error}`);
  }

  async deliverySummary(link: string, report: DeliveryReport): Promise<void> {
    await this.notify(`📨 ${link}\nSent: ${report.sentCount}, failed: ${report.failedCount}`);
  }

  async report(text: string): Promise<void> {
    await this.notify(text);
  }

  async digest(digest: DigestData): Promise<boolean> {
    return this.notify(composeDigest(digest));
  }
}
