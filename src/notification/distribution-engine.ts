/**
 * Fan-out of one message to many recipients.
 *
 * Sends sequentially with a courtesy pause between recipients. A failing
 * recipient never stops the broadcast: permanent failures remove the
 * recipient from future rounds, transient ones are only counted.
 */

import { getLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { sleep, withTimeout } from '../shared/timing.js';
import type { AirdropStore } from '../db/store.js';
import type { DeliveryReport } from '../queue/types.js';
import type { DistributionTarget, SendOutcome } from './types.js';

const log = getLogger('delivery', { component: 'distribution-engine' });

export interface DistributionEngineOptions {
  target: DistributionTarget;
  /** Receives permanent-failure reports. */
  store: Pick<AirdropStore, 'markRecipientUnreachable'>;
  /** Pause between consecutive sends. Default: 150 */
  sendDelayMs?: number;
  /** Upper bound for one send. Default: 10000 */
  sendTimeoutMs?: number;
}

export class DistributionEngine {
  private readonly target: DistributionTarget;
  private readonly store: Pick<AirdropStore, 'markRecipientUnreachable'>;
  private readonly sendDelayMs: number;
  private readonly sendTimeoutMs: number;

  constructor(options: DistributionEngineOptions) {
    this.target = options.target;
    this.store = options.store;
    this.sendDelayMs = options.sendDelayMs ?? 150;
    this.sendTimeoutMs = options.sendTimeoutMs ?? 10_000;
  }

  /**
   * Delivers `message` to every recipient in order. Resolves with the
   * counts and the recipients found unreachable; never rejects because of
   * a single recipient. When `signal` aborts, the recipient in flight is
   * finished and the rest skipped.
   */
  async deliver(
    message: string,
    recipients: readonly string[],
    signal?: AbortSignal,
  ): Promise<DeliveryReport> {
    let sentCount = 0;
    let failedCount = 0;
    const unreachable: string[] = [];

    for (const [index, recipientId] of recipients.entries()) {
      if (index > 0 && this.sendDelayMs > 0) {
        await sleep(this.sendDelayMs, signal);
      }
      if (signal?.aborted) {
        log.info({ remaining: recipients.length - index }, 'Broadcast interrupted by shutdown');
        break;
      }

      const outcome = await this.sendOne(recipientId, message);

      if (outcome === 'success') {
        sentCount++;
        continue;
      }

      failedCount++;
      if (outcome === 'permanent_failure') {
        unreachable.push(recipientId);
        await this.dropRecipient(recipientId);
      }
    }

    log.info(
      {
        recipients: recipients.length,
        sentCount,
        failedCount,
        unreachable: unreachable.length,
        target: this.target.name,
      },
      'Broadcast finished',
    );

    return { sentCount, failedCount, unreachable };
  }

  private async sendOne(recipientId: string, message: string): Promise<SendOutcome> {
    try {
      return await withTimeout(
        this.target.send(recipientId, message),
        this.sendTimeoutMs,
        `send to ${recipientId}`,
      );
    } catch (error) {
      // Targets classify their own failures; a rejection or timeout says nothing permanent
      log.warn({ recipientId, error: errorMessage(error) }, 'Send threw, counting as transient');
      return 'transient_failure';
    }
  }

  private async dropRecipient(recipientId: string): Promise<void> {
    try {
      await this.store.markRecipientUnreachable(recipientId);
      log.info({ recipientId }, 'Recipient marked unreachable');
    } catch (error) {
      log.error({ recipientId, err: error }, 'Failed to mark recipient unreachable');
    }
  }
}
