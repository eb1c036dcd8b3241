import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DigestBuilder } from '../../src/notification/digest-builder.js';
import { OpsNotifier } from '../../src/notification/ops-notifier.js';
import type { DistributionTarget, SendOutcome } from '../../src/notification/types.js';
import type { NewCandidate } from '../../src/types/index.js';
import { RecordingTarget, createClock, createTestStore, type TestClock, type TestStore } from '../helpers/fakes.js';

function candidate(link: string, rankScore: number): NewCandidate {
  return {
    link,
    title: link.split('/').pop() ?? link,
    description: '',
    socialHandle: null,
    rewardMagnitude: null,
    riskScore: 0,
    socialBuzzScore: null,
    verdict: 'clean',
    rankScore,
    source: 'static',
  };
}

describe('DigestBuilder', () => {
  let clock: TestClock;
  let ctx: TestStore;

  beforeEach(() => {
    clock = createClock('2026-10-18T08:00:00Z');
    ctx = createTestStore(clock.now);
  });

  afterEach(() => {
    ctx.handle.close();
  });

  it('collects the top candidates of the last day', async () => {
    await ctx.store.insertCandidate(candidate('https://quests.test/c/stale', 99));
    clock.set('2026-10-19T08:00:00Z');
    await ctx.store.insertCandidate(candidate('https://quests.test/c/mid', 50));
    await ctx.store.insertCandidate(candidate('https://quests.test/c/top', 70));
    await ctx.store.insertCandidate(candidate('https://quests.test/c/low', 41));
    await ctx.store.registerRecipient('101', null);
    clock.set('2026-10-19T09:00:00Z');

    const digest = await new DigestBuilder({ store: ctx.store, size: 2, now: clock.now }).buildDailyDigest();

    expect(digest.items.map((item) => item.title)).toEqual(['top', 'mid']);
    expect(digest.recipientCount).toBe(1);
    expect(digest.period).toEqual({
      from: new Date('2026-10-18T09:00:00Z'),
      to: new Date('2026-10-19T09:00:00Z'),
    });
  });
});

describe('OpsNotifier', () => {
  it('sends operational messages to the admin chat only', async () => {
    const target = new RecordingTarget();
    const ops = new OpsNotifier(target, '900');

    await ops.deliverySummary('https://quests.test/c/orbit', {
      sentCount: 5,
      failedCount: 1,
      unreachable: ['104'],
    });
    await ops.scoringDegraded('https://quests.test/c/orbit', ['domain-age', 'contract']);

    expect(ops.enabled).toBe(true);
    expect(target.sent).toEqual([
      { recipientId: '900', text: '📨 https://quests.test/c/orbit\nSent: 5, failed: 1' },
      {
        recipientId: '900',
        text: '⚠️ Scoring degraded for https://quests.test/c/orbit: domain-age, contract unavailable',
      },
    ]);
  });

  it('stays quiet without an admin chat', async () => {
    const target = new RecordingTarget();
    const ops = new OpsNotifier(target, undefined);

    expect(ops.enabled).toBe(false);
    expect(await ops.notify('hello')).toBe(false);
    expect(target.sent).toEqual([]);
  });

  it('never throws when the admin chat is unreachable', async () => {
    const target = new RecordingTarget();
    target.throwing.set('900', new Error('network down'));
    const blocked = new RecordingTarget();
    blocked.outcomes.set('900', 'permanent_failure');

    expect(await new OpsNotifier(target, '900').notify('hello')).toBe(false);
    expect(await new OpsNotifier(blocked, '900').notify('hello')).toBe(false);
  });

  it('gives up on an admin send that never settles', async () => {
    vi.useFakeTimers();
    try {
      const stuck: DistributionTarget = {
        name: 'stuck',
        send: () => new Promise<SendOutcome>(() => undefined),
      };
      const ops = new OpsNotifier(stuck, '900', 5_000);

      const pending = ops.notify('hello');
      await vi.advanceTimersByTimeAsync(5_000);

      await expect(pending).resolves.toBe(false);
    } finally {
      vi.useRealTimers();
    }
  });
});
