import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { formatTicketId } from '../../src/db/sqlite-store.js';
import { PersistenceError } from '../../src/shared/errors.js';
import type { NewCandidate, RiskFactor } from '../../src/types/index.js';
import { createClock, createTestStore, type TestClock, type TestStore } from '../helpers/fakes.js';

function candidate(link: string, overrides: Partial<NewCandidate> = {}): NewCandidate {
  return {
    link,
    title: 'Orbit',
    description: 'Complete tasks to earn XP',
    socialHandle: null,
    rewardMagnitude: 500,
    riskScore: 0,
    socialBuzzScore: null,
    verdict: 'clean',
    rankScore: 62.5,
    source: 'static',
    ...overrides,
  };
}

describe('SqliteAirdropStore', () => {
  let clock: TestClock;
  let ctx: TestStore;

  beforeEach(() => {
    clock = createClock('2026-10-19T10:00:00Z');
    ctx = createTestStore(clock.now);
  });

  afterEach(() => {
    ctx.handle.close();
  });

  describe('candidates', () => {
    it('stores and reads a candidate back', async () => {
      const stored = await ctx.store.insertCandidate(candidate('https://quests.test/c/orbit'));

      expect(stored.id).toMatch(/^[0-9A-Z]{26}$/);
      expect(stored.notified).toBe(false);
      expect(stored.discoveredAt.toISOString()).toBe('2026-10-19T10:00:00.000Z');
      expect(await ctx.store.candidateExists('https://quests.test/c/orbit')).toBe(true);
      expect(await ctx.store.getCandidate('https://quests.test/c/orbit')).toEqual(stored);
    });

    it('rejects a second candidate with the same link', async () => {
      await ctx.store.insertCandidate(candidate('https://quests.test/c/orbit'));

      const attempt = ctx.store.insertCandidate(candidate('https://quests.test/c/orbit', { title: 'Copy' }));

      await expect(attempt).rejects.toBeInstanceOf(PersistenceError);
      await expect(attempt).rejects.toMatchObject({ code: 'DUPLICATE_CANDIDATE' });
    });

    it('marks a candidate notified', async () => {
      await ctx.store.insertCandidate(candidate('https://quests.test/c/orbit'));
      await ctx.store.markCandidateNotified('https://quests.test/c/orbit');

      const row = await ctx.store.getCandidate('https://quests.test/c/orbit');
      expect(row?.notified).toBe(true);
    });

    it('lists recent candidates by rank', async () => {
      await ctx.store.insertCandidate(candidate('https://quests.test/c/old', { rankScore: 99 }));
      clock.advance(2 * 24 * 60 * 60 * 1000);
      await ctx.store.insertCandidate(candidate('https://quests.test/c/low', { rankScore: 41 }));
      await ctx.store.insertCandidate(candidate('https://quests.test/c/high', { rankScore: 77 }));

      const since = new Date(clock.now().getTime() - 24 * 60 * 60 * 1000);
      const recent = await ctx.store.listRecentCandidates(since, 10);

      expect(recent.map((row) => row.link)).toEqual(['https://quests.test/c/high', 'https://quests.test/c/low']);
      expect(await ctx.store.listRecentCandidates(since, 1)).toHaveLength(1);
    });
  });

  describe('send log', () => {
    it('answers whether a link was notified inside a window', async () => {
      await ctx.store.logNotified('https://quests.test/c/orbit');
      clock.advance(60_000);

      expect(await ctx.store.wasNotifiedRecently('https://quests.test/c/orbit', 120_000)).toBe(true);
      expect(await ctx.store.wasNotifiedRecently('https://quests.test/c/orbit', 30_000)).toBe(false);
      expect(await ctx.store.wasNotifiedRecently('https://quests.test/c/other', 120_000)).toBe(false);
    });
  });

  describe('score cache', () => {
    const factors: RiskFactor[] = [
      { check: 'scam-keywords', penalty: 30, reason: 'Scam phrase "send eth"', veto: true, degraded: false },
    ];

    it('keeps separate entries per contract', async () => {
      await ctx.store.cacheScore('https://quests.test/c/orbit', null, { riskScore: 30, verdict: 'scam', factors });
      await ctx.store.cacheScore('https://quests.test/c/orbit', '0xabc', { riskScore: 0, verdict: 'clean', factors: [] });

      const plain = await ctx.store.getCachedScore('https://quests.test/c/orbit', null);
      const withContract = await ctx.store.getCachedScore('https://quests.test/c/orbit', '0xabc');

      expect(plain).toEqual({
        riskScore: 30,
        verdict: 'scam',
        factors,
        scoredAt: new Date('2026-10-19T10:00:00Z'),
      });
      expect(withContract?.verdict).toBe('clean');
      expect(await ctx.store.getCachedScore('https://quests.test/c/other', null)).toBeNull();
    });

    it('overwrites an entry on rescoring', async () => {
      await ctx.store.cacheScore('https://quests.test/c/orbit', null, { riskScore: 30, verdict: 'scam', factors });
      clock.advance(1000);
      await ctx.store.cacheScore('https://quests.test/c/orbit', null, { riskScore: 5, verdict: 'clean', factors: [] });

      const entry = await ctx.store.getCachedScore('https://quests.test/c/orbit', null);
      expect(entry?.riskScore).toBe(5);
      expect(entry?.scoredAt.toISOString()).toBe('2026-10-19T10:00:01.000Z');
    });

    it('ignores entries whose factors do not parse', async () => {
      ctx.handle.sqlite
        .prepare(
          'INSERT INTO score_cache (link, contract, risk_score, verdict, factors, scored_at) VALUES (?, ?, ?, ?, ?, ?)',
        )
        .run('https://quests.test/c/orbit', '', 0, 'clean', '[{"check":1}]', '2026-10-19T10:00:00.000Z');

      expect(await ctx.store.getCachedScore('https://quests.test/c/orbit', null)).toBeNull();
    });
  });

  describe('recipients', () => {
    it('registers idempotently and keeps a known username', async () => {
      await ctx.store.registerRecipient('101', 'alice');
      const again = await ctx.store.registerRecipient('101', null);

      expect(again.username).toBe('alice');
      expect(again.registeredAt.toISOString()).toBe('2026-10-19T10:00:00.000Z');
      expect(await ctx.store.getRecipientCount()).toBe(1);
    });

    it('lists active recipients in registration order', async () => {
      await ctx.store.registerRecipient('101', null);
      clock.advance(1000);
      await ctx.store.registerRecipient('102', null);
      clock.advance(1000);
      await ctx.store.registerRecipient('103', null);

      await ctx.store.markRecipientUnreachable('102');

      expect(await ctx.store.listActiveRecipients()).toEqual(['101', '103']);
      expect(await ctx.store.getRecipientCount()).toBe(2);
    });

    it('reactivates an unreachable recipient on registration', async () => {
      await ctx.store.registerRecipient('101', null);
      await ctx.store.markRecipientUnreachable('101');
      await ctx.store.registerRecipient('101', null);

      expect(await ctx.store.listActiveRecipients()).toEqual(['101']);
    });

    it('bans and unbans', async () => {
      await ctx.store.registerRecipient('101', null);

      expect(await ctx.store.banRecipient('101')).toBe(true);
      expect(await ctx.store.banRecipient('101')).toBe(false);
      expect(await ctx.store.listActiveRecipients()).toEqual([]);
      expect(await ctx.store.listBannedRecipients()).toEqual(['101']);

      // Registration does not lift a ban
      await ctx.store.registerRecipient('101', null);
      expect((await ctx.store.getRecipient('101'))?.banned).toBe(true);

      expect(await ctx.store.unbanRecipient('101')).toBe(true);
      expect(await ctx.store.unbanRecipient('101')).toBe(false);
      expect(await ctx.store.listActiveRecipients()).toEqual(['101']);
    });

    it('bans ids it has never seen', async () => {
      expect(await ctx.store.banRecipient('999')).toBe(true);
      expect((await ctx.store.getRecipient('999'))?.banned).toBe(true);
    });
  });

  describe('support tickets', () => {
    it('formats ticket ids', () => {
      expect(formatTicketId(2026, 7)).toBe('SB-2026-007');
      expect(formatTicketId(2026, 1234)).toBe('SB-2026-1234');
    });

    it('numbers tickets per UTC year', async () => {
      const ticket = { recipientId: '101', username: 'alice', category: 'bug', message: 'No alerts today' };

      const first = await ctx.store.openSupportTicket(ticket);
      const second = await ctx.store.openSupportTicket(ticket);
      clock.set('2027-01-01T00:00:00Z');
      const third = await ctx.store.openSupportTicket(ticket);

      expect([first.ticketId, second.ticketId, third.ticketId]).toEqual([
        'SB-2026-001',
        'SB-2026-002',
        'SB-2027-001',
      ]);
      expect(first.status).toBe('open');
    });

    it('updates ticket status', async () => {
      const ticket = await ctx.store.openSupportTicket({
        recipientId: '101',
        username: null,
        category: 'general',
        message: 'Hello',
      });
      clock.advance(5000);

      expect(await ctx.store.setTicketStatus(ticket.ticketId, 'closed')).toBe(true);
      expect(await ctx.store.setTicketStatus('SB-2026-404', 'closed')).toBe(false);

      const closed = await ctx.store.getSupportTicket(ticket.ticketId);
      expect(closed?.status).toBe('closed');
      expect(closed?.updatedAt.toISOString()).toBe('2026-10-19T10:00:05.000Z');
    });
  });

  it('answers a ping', async () => {
    expect(await ctx.store.ping()).toBe(true);
  });
});
