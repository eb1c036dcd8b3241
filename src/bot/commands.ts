/**
 * Minimal chat command layer on grammY.
 *
 * Replies are plain text. Command logic lives in `CommandHandlers` so it
 * can run without a Telegram connection; `registerCommands` only adapts
 * grammY contexts to it.
 */

import type { Bot, Context } from 'grammy';
import { getLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import type { AirdropStore } from '../db/store.js';
import type { OpsNotifier } from '../notification/ops-notifier.js';
import type { CadenceName } from '../queue/types.js';

const log = getLogger('bot', { component: 'commands' });

const SUPPORT_CATEGORIES = ['general', 'bug', 'scam-report', 'account'] as const;

export interface Sender {
  id: string;
  username: string | null;
}

export interface CommandDependencies {
  store: AirdropStore;
  ops: OpsNotifier;
  scheduler: { triggerNow(name: CadenceName): Promise<boolean> };
  adminChatId?: string;
}

export class CommandHandlers {
  constructor(private readonly deps: CommandDependencies) {}

  isAdmin(sender: Sender): boolean {
    return this.deps.adminChatId !== undefined && sender.id === this.deps.adminChatId;
  }

  async start(sender: Sender): Promise<string> {
    const existing = await this.deps.store.getRecipient(sender.id);
    if (existing?.banned) {
      return 'You have been banned from this bot.';
    }

    await this.deps.store.registerRecipient(sender.id, sender.username);
    log.info({ recipientId: sender.id, returning: existing !== null }, 'Recipient registered');

    return existing
      ? 'Welcome back! Airdrop alerts are active again.'
      : 'Welcome! You will now receive new airdrop alerts.';
  }

  async stats(): Promise<string> {
    const [active, banned] = await Promise.all([
      this.deps.store.getRecipientCount(),
      this.deps.store.listBannedRecipients(),
    ]);
    return `Active recipients: ${active}\nBanned: ${banned.length}`;
  }

  async ban(argument: string): Promise<string> {
    const recipientId = argument.trim();
    if (!recipientId) return 'Usage: /ban <user id>';
    const changed = await this.deps.store.banRecipient(recipientId);
    return changed ? `User ${recipientId} banned.` : `User ${recipientId} is already banned.`;
  }

  async unban(argument: string): Promise<string> {
    const recipientId = argument.trim();
    if (!recipientId) return 'Usage: /unban <user id>';
    const changed = await this.deps.store.unbanRecipient(recipientId);
    return changed ? `User ${recipientId} unbanned.` : `User ${recipientId} was not banned.`;
  }

  /** `/support <category> <message>`; unknown categories fall back to general. */
  async support(sender: Sender, argument: string): Promise<string> {
    const [first = '', ...rest] = argument.trim().split(/\s+/);
    const category = SUPPORT_CATEGORIES.find((name) => name === first.toLowerCase());
    const message = (category ? rest.join(' ') : argument).trim();
    if (!message) {
      return `Usage: /support [${SUPPORT_CATEGORIES.join('|')}] <message>`;
    }

    const ticket = await this.deps.store.openSupportTicket({
      recipientId: sender.id,
      username: sender.username,
      category: category ?? 'general',
      message,
    });

    await this.deps.ops.report(
      `🎫 ${ticket.ticketId} [${ticket.category}] from ${sender.username ?? sender.id}\n${message}`,
    );
    return `Ticket ${ticket.ticketId} opened. We will get back to you.`;
  }

  async closeTicket(argument: string): Promise<string> {
    const ticketId = argument.trim().toUpperCase();
    if (!ticketId) return 'Usage: /close <ticket id>';
    const changed = await this.deps.store.setTicketStatus(ticketId, 'closed');
    return changed ? `Ticket ${ticketId} closed.` : `Ticket ${ticketId} not found.`;
  }

  /** Starts an interval cycle now; the run continues after the reply. */
  scan(onDone: (text: string) => Promise<unknown>): string {
    this.deps.scheduler
      .triggerNow('interval')
      .then((ran) => onDone(ran ? 'Scan finished.' : 'A scan is already running.'))
      .catch((error: unknown) => {
        log.error({ err: error }, 'Manual scan failed');
      });
    return 'Scan started.';
  }
}

function senderOf(ctx: Context): Sender | null {
  if (!ctx.from) return null;
  return { id: String(ctx.from.id), username: ctx.from.username ?? null };
}

/**
 * Wires the handlers to bot commands. Admin commands are ignored for
 * everyone but the admin chat.
 */
export function registerCommands(bot: Bot, handlers: CommandHandlers): void {
  bot.command('start', async (ctx) => {
    const sender = senderOf(ctx);
    if (!sender) return;
    await ctx.reply(await handlers.start(sender));
  });

  bot.command('support', async (ctx) => {
    const sender = senderOf(ctx);
    if (!sender) return;
    await ctx.reply(await handlers.support(sender, ctx.match));
  });

  const admin = bot.filter((ctx) => {
    const sender = senderOf(ctx);
    return sender !== null && handlers.isAdmin(sender);
  });

  admin.command('stats', async (ctx) => {
    await ctx.reply(await handlers.stats());
  });

  admin.command('ban', async (ctx) => {
    await ctx.reply(await handlers.ban(ctx.match));
  });

  admin.command('unban', async (ctx) => {
    await ctx.reply(await handlers.unban(ctx.match));
  });

  admin.command('close', async (ctx) => {
    await ctx.reply(await handlers.closeTicket(ctx.match));
  });

  admin.command('scan', async (ctx) => {
    await ctx.reply(handlers.scan((text) => ctx.reply(text)));
  });

  bot.catch((err) => {
    log.error({ error: errorMessage(err.error), updateId: err.ctx.update.update_id }, 'Bot handler failed');
  });
}
