/**
 * Telegram distribution target on the grammY Bot API client.
 */

import { GrammyError } from 'grammy';
import { getLogger } from '../../shared/logger.js';
import type { DeliveryFailureKind, DistributionTarget, SendOutcome } from '../types.js';

const log = getLogger('delivery', { channel: 'telegram' });

/** Descriptions the Bot API returns for chats that will never accept messages. */
const PERMANENT_DESCRIPTIONS = [
  'chat not found',
  'user is deactivated',
  'bot was blocked by the user',
  'bot was kicked',
];

/** The slice of grammY's `Api` this target uses. */
export interface TelegramMessenger {
  sendMessage(
    chatId: string,
    text: string,
    other?: { link_preview_options?: { is_disabled?: boolean } },
  ): Promise<unknown>;
}

/**
 * 403 and dead-chat descriptions are permanent; rate limits, server
 * errors and network failures are transient.
 */
export function classifyTelegramError(error: unknown): DeliveryFailureKind {
  if (error instanceof GrammyError) {
    if (error.error_code === 403) return 'permanent';
    const description = error.description.toLowerCase();
    if (PERMANENT_DESCRIPTIONS.some((text) => description.includes(text))) return 'permanent';
    return 'transient';
  }
  // HttpError and anything else: network trouble
  return 'transient';
}

export class TelegramTarget implements DistributionTarget {
  readonly name = 'telegram';

  constructor(private readonly api: TelegramMessenger) {}

  async send(recipientId: string, text: string): Promise<SendOutcome> {
    try {
      await this.api.sendMessage(recipientId, text, {
        link_preview_options: { is_disabled: true },
      });
      return 'success';
    } catch (error) {
      const kind = classifyTelegramError(error);
      log.debug(
        { recipientId, kind, error: error instanceof Error ? error.message : String(error) },
        'Telegram send failed',
      );
      return kind === 'permanent' ? 'permanent_failure' : 'transient_failure';
    }
  }
}
