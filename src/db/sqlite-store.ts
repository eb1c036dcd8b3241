import { and, count, desc, eq, gte, max, sql } from 'drizzle-orm';
import { ulid } from 'ulid';
import { z } from 'zod';
import type { AppDatabase } from './index.js';
import { candidates, recipients, scoreCache, sendLog, supportTickets } from './schema.js';
import type { AirdropStore } from './store.js';
import { PersistenceError, errorMessage } from '../shared/errors.js';
import { getLogger } from '../shared/logger.js';
import type { TicketStatus } from '../shared/constants.js';
import type {
  CachedScore,
  Candidate,
  NewCandidate,
  NewSupportTicket,
  Recipient,
  RiskFactor,
  SupportTicket,
} from '../types/index.js';

const log = getLogger('store', { component: 'sqlite-store' });

const TICKET_PREFIX = 'SB';

const riskFactorsSchema = z.array(
  z.object({
    check: z.string(),
    penalty: z.number(),
    reason: z.string(),
    veto: z.boolean(),
    degraded: z.boolean(),
  }),
);

type CandidateRow = typeof candidates.$inferSelect;
type RecipientRow = typeof recipients.$inferSelect;
type TicketRow = typeof supportTickets.$inferSelect;

export interface SqliteStoreOptions {
  /** Clock used for every timestamp written or compared. */
  now?: () => Date;
}

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}

function toCandidate(row: CandidateRow): Candidate {
  return {
    id: row.id,
    link: row.link,
    title: row.title,
    description: row.description,
    socialHandle: row.socialHandle,
    rewardMagnitude: row.rewardMagnitude,
    riskScore: row.riskScore,
    socialBuzzScore: row.socialBuzzScore,
    verdict: row.verdict,
    rankScore: row.rankScore,
    source: row.source,
    discoveredAt: new Date(row.discoveredAt),
    notified: row.notified,
  };
}

function toRecipient(row: RecipientRow): Recipient {
  return {
    recipientId: row.recipientId,
    username: row.username,
    registeredAt: new Date(row.registeredAt),
    banned: row.banned,
    unreachable: row.unreachable,
  };
}

function toTicket(row: TicketRow): SupportTicket {
  return {
    ticketId: row.ticketId,
    recipientId: row.recipientId,
    username: row.username,
    category: row.category,
    message: row.message,
    status: row.status,
    createdAt: new Date(row.createdAt),
    updatedAt: new Date(row.updatedAt),
  };
}

export function formatTicketId(year: number, sequence: number): string {
  return `${TICKET_PREFIX}-${year}-${String(sequence).padStart(3, '0')}`;
}

/**
 * `AirdropStore` over better-sqlite3 + Drizzle. Statements are synchronous
 * under the driver; the async surface keeps callers independent of it.
 */
export class SqliteAirdropStore implements AirdropStore {
  private readonly now: () => Date;

  constructor(
    private readonly db: AppDatabase,
    options: SqliteStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  // -------------------------------------------------------------------------
  // Candidates
  // -------------------------------------------------------------------------

  async candidateExists(link: string): Promise<boolean> {
    return this.execute('candidateExists', () => {
      const row = this.db
        .select({ id: candidates.id })
        .from(candidates)
        .where(eq(candidates.link, link))
        .get();
      return row !== undefined;
    });
  }

  async insertCandidate(candidate: NewCandidate): Promise<Candidate> {
    const values: typeof candidates.$inferInsert = {
      id: ulid(),
      link: candidate.link,
      title: candidate.title,
      description: candidate.description,
      socialHandle: candidate.socialHandle,
      rewardMagnitude: candidate.rewardMagnitude,
      riskScore: candidate.riskScore,
      socialBuzzScore: candidate.socialBuzzScore,
      verdict: candidate.verdict,
      rankScore: candidate.rankScore,
      source: candidate.source,
      notified: candidate.notified ?? false,
      discoveredAt: this.now().toISOString(),
    };

    try {
      const row = this.db.insert(candidates).values(values).returning().get();
      if (!row) {
        throw new PersistenceError('Insert returned no row', 'insertCandidate');
      }
      log.debug({ link: row.link, verdict: row.verdict }, 'Candidate inserted');
      return toCandidate(row);
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      if (isUniqueViolation(error)) {
        throw new PersistenceError(
          `Candidate already stored: ${candidate.link}`,
          'insertCandidate',
          'DUPLICATE_CANDIDATE',
        );
      }
      throw new PersistenceError(errorMessage(error), 'insertCandidate');
    }
  }

  async getCandidate(link: string): Promise<Candidate | null> {
    return this.execute('getCandidate', () => {
      const row = this.db.select().from(candidates).where(eq(candidates.link, link)).get();
      return row ? toCandidate(row) : null;
    });
  }

  async markCandidateNotified(link: string): Promise<void> {
    await this.execute('markCandidateNotified', () => {
      this.db.update(candidates).set({ notified: true }).where(eq(candidates.link, link)).run();
    });
  }

  async listRecentCandidates(since: Date, limit: number): Promise<Candidate[]> {
    return this.execute('listRecentCandidates', () =>
      this.db
        .select()
        .from(candidates)
        .where(gte(candidates.discoveredAt, since.toISOString()))
        .orderBy(desc(candidates.rankScore), desc(candidates.discoveredAt))
        .limit(limit)
        .all()
        .map(toCandidate),
    );
  }

  // -------------------------------------------------------------------------
  // Send log
  // -------------------------------------------------------------------------

  async wasNotifiedRecently(link: string, windowMs: number): Promise<boolean> {
    return this.execute('wasNotifiedRecently', () => {
      const cutoff = new Date(this.now().getTime() - windowMs).toISOString();
      const row = this.db
        .select({ id: sendLog.id })
        .from(sendLog)
        .where(and(eq(sendLog.link, link), gte(sendLog.sentAt, cutoff)))
        .limit(1)
        .get();
      return row !== undefined;
    });
  }

  async logNotified(link: string): Promise<void> {
    await this.execute('logNotified', () => {
      this.db.insert(sendLog).values({ link, sentAt: this.now().toISOString() }).run();
    });
  }

  // -------------------------------------------------------------------------
  // Score cache
  // -------------------------------------------------------------------------

  async getCachedScore(link: string, contract: string | null): Promise<CachedScore | null> {
    return this.execute('getCachedScore', () => {
      const row = this.db
        .select()
        .from(scoreCache)
        .where(and(eq(scoreCache.link, link), eq(scoreCache.contract, contract ?? '')))
        .get();
      if (!row) return null;

      const factors = riskFactorsSchema.safeParse(JSON.parse(row.factors));
      if (!factors.success) {
        log.warn({ link }, 'Cached score has malformed factors, ignoring entry');
        return null;
      }

      const result: CachedScore = {
        riskScore: row.riskScore,
        verdict: row.verdict,
        factors: factors.data satisfies RiskFactor[],
        scoredAt: new Date(row.scoredAt),
      };
      return result;
    });
  }

  async cacheScore(
    link: string,
    contract: string | null,
    score: Omit<CachedScore, 'scoredAt'>,
  ): Promise<void> {
    await this.execute('cacheScore', () => {
      const scoredAt = this.now().toISOString();
      const factors = JSON.stringify(score.factors);
      this.db
        .insert(scoreCache)
        .values({
          link,
          contract: contract ?? '',
          riskScore: score.riskScore,
          verdict: score.verdict,
          factors,
          scoredAt,
        })
        .onConflictDoUpdate({
          target: [scoreCache.link, scoreCache.contract],
          set: { riskScore: score.riskScore, verdict: score.verdict, factors, scoredAt },
        })
        .run();
    });
  }

  // -------------------------------------------------------------------------
  // Recipients
  // -------------------------------------------------------------------------

  async listActiveRecipients(): Promise<string[]> {
    return this.execute('listActiveRecipients', () =>
      this.db
        .select({ recipientId: recipients.recipientId })
        .from(recipients)
        .where(and(eq(recipients.banned, false), eq(recipients.unreachable, false)))
        .orderBy(recipients.registeredAt)
        .all()
        .map((row) => row.recipientId),
    );
  }

  async getRecipientCount(): Promise<number> {
    return this.execute('getRecipientCount', () => {
      const row = this.db
        .select({ value: count() })
        .from(recipients)
        .where(and(eq(recipients.banned, false), eq(recipients.unreachable, false)))
        .get();
      return row?.value ?? 0;
    });
  }

  async markRecipientUnreachable(recipientId: string): Promise<void> {
    await this.execute('markRecipientUnreachable', () => {
      this.db
        .update(recipients)
        .set({ unreachable: true, unreachableAt: this.now().toISOString() })
        .where(eq(recipients.recipientId, recipientId))
        .run();
    });
  }

  async registerRecipient(recipientId: string, username: string | null): Promise<Recipient> {
    return this.execute('registerRecipient', () => {
      const row = this.db
        .insert(recipients)
        .values({ recipientId, username, registeredAt: this.now().toISOString() })
        .onConflictDoUpdate({
          target: recipients.recipientId,
          set: {
            username: sql`coalesce(excluded.username, username)`,
            unreachable: false,
            unreachableAt: null,
          },
        })
        .returning()
        .get();
      if (!row) {
        throw new PersistenceError('Upsert returned no row', 'registerRecipient');
      }
      return toRecipient(row);
    });
  }

  async getRecipient(recipientId: string): Promise<Recipient | null> {
    return this.execute('getRecipient', () => {
      const row = this.db
        .select()
        .from(recipients)
        .where(eq(recipients.recipientId, recipientId))
        .get();
      return row ? toRecipient(row) : null;
    });
  }

  /** Bans (soft delete). Unknown ids are created banned. False when already banned. */
  async banRecipient(recipientId: string): Promise<boolean> {
    return this.execute('banRecipient', () => {
      const existing = this.db
        .select({ banned: recipients.banned })
        .from(recipients)
        .where(eq(recipients.recipientId, recipientId))
        .get();
      if (existing?.banned) return false;

      this.db
        .insert(recipients)
        .values({ recipientId, banned: true, registeredAt: this.now().toISOString() })
        .onConflictDoUpdate({ target: recipients.recipientId, set: { banned: true } })
        .run();
      return true;
    });
  }

  async unbanRecipient(recipientId: string): Promise<boolean> {
    return this.execute('unbanRecipient', () => {
      const result = this.db
        .update(recipients)
        .set({ banned: false })
        .where(and(eq(recipients.recipientId, recipientId), eq(recipients.banned, true)))
        .run();
      return result.changes > 0;
    });
  }

  async listBannedRecipients(): Promise<string[]> {
    return this.execute('listBannedRecipients', () =>
      this.db
        .select({ recipientId: recipients.recipientId })
        .from(recipients)
        .where(eq(recipients.banned, true))
        .all()
        .map((row) => row.recipientId),
    );
  }

  // -------------------------------------------------------------------------
  // Support tickets
  // -------------------------------------------------------------------------

  async openSupportTicket(ticket: NewSupportTicket): Promise<SupportTicket> {
    return this.execute('openSupportTicket', () =>
      this.db.transaction((tx) => {
        const createdAt = this.now();
        const year = createdAt.getUTCFullYear();
        const last = tx
          .select({ value: max(supportTickets.sequence) })
          .from(supportTickets)
          .where(eq(supportTickets.year, year))
          .get();
        const sequence = (last?.value ?? 0) + 1;

        const row = tx
          .insert(supportTickets)
          .values({
            ticketId: formatTicketId(year, sequence),
            year,
            sequence,
            recipientId: ticket.recipientId,
            username: ticket.username,
            category: ticket.category,
            message: ticket.message,
            createdAt: createdAt.toISOString(),
            updatedAt: createdAt.toISOString(),
          })
          .returning()
          .get();
        if (!row) {
          throw new PersistenceError('Insert returned no row', 'openSupportTicket');
        }

        log.info({ ticketId: row.ticketId, category: row.category }, 'Support ticket opened');
        return toTicket(row);
      }),
    );
  }

  async getSupportTicket(ticketId: string): Promise<SupportTicket | null> {
    return this.execute('getSupportTicket', () => {
      const row = this.db
        .select()
        .from(supportTickets)
        .where(eq(supportTickets.ticketId, ticketId))
        .get();
      return row ? toTicket(row) : null;
    });
  }

  async setTicketStatus(ticketId: string, status: TicketStatus): Promise<boolean> {
    return this.execute('setTicketStatus', () => {
      const result = this.db
        .update(supportTickets)
        .set({ status, updatedAt: this.now().toISOString() })
        .where(eq(supportTickets.ticketId, ticketId))
        .run();
      return result.changes > 0;
    });
  }

  // -------------------------------------------------------------------------
  // Health
  // -------------------------------------------------------------------------

  async ping(): Promise<boolean> {
    return this.execute('ping', () => {
      const row = this.db.get<{ ok: number }>(sql`SELECT 1 AS ok`);
      return row.ok === 1;
    });
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private async execute<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return fn();
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(errorMessage(error), operation);
    }
  }
}
