import { describe, it, expect } from 'vitest';
import { composeAdminReport, composeAlert, composeDigest } from '../../src/notification/message-composer.js';
import type { Candidate, ScoreResult } from '../../src/types/index.js';

function candidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    id: '01JAAAAAAAAAAAAAAAAAAAAAAA',
    link: 'https://quests.test/c/orbit',
    title: 'Orbit',
    description: 'Complete tasks to earn XP',
    socialHandle: 'https://x.com/orbit',
    rewardMagnitude: 1200,
    riskScore: 5,
    socialBuzzScore: 70,
    verdict: 'clean',
    rankScore: 81.53,
    source: 'quest-platform',
    discoveredAt: new Date('2026-10-19T10:00:00Z'),
    notified: false,
    ...overrides,
  };
}

describe('composeAlert', () => {
  it('lists title, reward, description, verdict, link and social handle', () => {
    expect(composeAlert(candidate())).toBe(
      [
        '🚀 Orbit',
        '🎯 Reward: 1,200 XP',
        '📝 Complete tasks to earn XP',
        '🛡 Scam check: clean (risk 5/100)',
        '🔗 https://quests.test/c/orbit',
        '🐦 https://x.com/orbit',
      ].join('\n'),
    );
  });

  it('fills missing values and drops an empty description', () => {
    const text = composeAlert(
      candidate({ description: '', rewardMagnitude: null, riskScore: null, socialHandle: null, verdict: 'unknown' }),
    );
    expect(text).toBe(
      [
        '🚀 Orbit',
        '🎯 Reward: N/A',
        '🛡 Scam check: unknown (risk n/a)',
        '🔗 https://quests.test/c/orbit',
        '🐦 N/A',
      ].join('\n'),
    );
  });

  it('truncates long descriptions', () => {
    const text = composeAlert(candidate({ description: 'a'.repeat(130) }));
    expect(text.split('\n')[2]).toBe(`📝 ${'a'.repeat(120)}...`);
  });
});

describe('composeAdminReport', () => {
  it('includes veto, degradation and flagged factors', () => {
    const score: ScoreResult = {
      riskScore: 40,
      verdict: 'scam',
      degraded: true,
      vetoedBy: 'scam-keywords',
      cached: false,
      factors: [
        { check: 'url-pattern', penalty: 0, reason: 'No scam URL pattern', veto: false, degraded: false },
        { check: 'scam-keywords', penalty: 30, reason: 'Scam phrase "send eth"', veto: true, degraded: false },
        { check: 'domain-age', penalty: 10, reason: 'Check unavailable: timeout', veto: false, degraded: true },
      ],
    };

    expect(composeAdminReport(candidate({ verdict: 'scam', riskScore: 40, rankScore: 50.4 }), score)).toBe(
      [
        '🧾 New airdrop found',
        'Rank: 50.4',
        'Project: Orbit',
        'Reward: 1,200 XP',
        'Link: https://quests.test/c/orbit',
        'Social: https://x.com/orbit',
        'Verdict: scam (risk 40/100)',
        'Vetoed by: scam-keywords',
        '⚠️ Scoring degraded: some checks used fallback penalties',
        'Factors:',
        '- scam-keywords +30: Scam phrase "send eth"',
        '- domain-age +10: Check unavailable: timeout',
      ].join('\n'),
    );
  });

  it('marks cached verdicts', () => {
    const score: ScoreResult = {
      riskScore: 0,
      verdict: 'clean',
      degraded: false,
      vetoedBy: null,
      cached: true,
      factors: [],
    };
    expect(composeAdminReport(candidate(), score)).toContain('Verdict: clean (risk 0/100) [cached]');
  });
});

describe('composeDigest', () => {
  const period = { from: new Date('2026-10-18T09:00:00Z'), to: new Date('2026-10-19T09:00:00Z') };

  it('numbers the ranked items', () => {
    const text = composeDigest({
      period,
      recipientCount: 3,
      items: [
        candidate(),
        candidate({ title: 'Nova', link: 'https://quests.test/c/nova', rankScore: 44, verdict: 'suspicious', rewardMagnitude: null }),
      ],
    });

    expect(text).toBe(
      [
        '📊 Daily digest 2026-10-19: top 2',
        '1. Orbit (rank 81.53, clean, 1,200 XP)',
        '   https://quests.test/c/orbit',
        '2. Nova (rank 44, suspicious, N/A)',
        '   https://quests.test/c/nova',
        'Recipients: 3',
      ].join('\n'),
    );
  });

  it('says so when nothing was found', () => {
    expect(composeDigest({ period, recipientCount: 0, items: [] })).toBe(
      '📊 Daily digest 2026-10-19\nNo new airdrops in the last 24h.\nRecipients: 0',
    );
  });
});
