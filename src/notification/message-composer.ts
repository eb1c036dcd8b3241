/**
 * Plain-text message bodies. Recipients only ever receive
 * `composeAlert`; everything else goes to the operational channel.
 */

import { truncate } from '../shared/utils.js';
import type { Candidate, ScoreResult } from '../types/index.js';
import type { DigestData } from './types.js';

const DESCRIPTION_MAX_LENGTH = 120;

function formatReward(reward: number | null): string {
  return reward === null ? 'N/A' : `${reward.toLocaleString('en-US')} XP`;
}

function formatRisk(riskScore: number | null): string {
  return riskScore === null ? 'n/a' : `${riskScore}/100`;
}

export function composeAlert(candidate: Candidate): string {
  const lines = [
    `🚀 ${candidate.title}`,
    `🎯 Reward: ${formatReward(candidate.rewardMagnitude)}`,
  ];

  if (candidate.description) {
    lines.push(`📝 ${truncate(candidate.description, DESCRIPTION_MAX_LENGTH)}`);
  }

  lines.push(
    `🛡 Scam check: ${candidate.verdict} (risk ${formatRisk(candidate.riskScore)})`,
    `🔗 ${candidate.link}`,
    `🐦 ${candidate.socialHandle ?? 'N/A'}`,
  );

  return lines.join('\n');
}

export function composeAdminReport(candidate: Candidate, score: ScoreResult): string {
  const lines = [
    '🧾 New airdrop found',
    `Rank: ${candidate.rankScore}`,
    `Project: ${candidate.title}`,
    `Reward: ${formatReward(candidate.rewardMagnitude)}`,
    `Link: ${candidate.link}`,
    `Social: ${candidate.socialHandle ?? 'N/A'}`,
    `Verdict: ${score.verdict} (risk ${formatRisk(score.riskScore)})${score.cached ? ' [cached]' : ''}`,
  ];

  if (score.vetoedBy) {
    lines.push(`Vetoed by: ${score.vetoedBy}`);
  }
  if (score.degraded) {
    lines.push('⚠️ Scoring degraded: some checks used fallback penalties');
  }

  const flagged = score.factors.filter((factor) => factor.penalty > 0);
  if (flagged.length > 0) {
    lines.push('Factors:');
    for (const factor of flagged) {
      lines.push(`- ${factor.check} +${factor.penalty}: ${factor.reason}`);
    }
  }

  return lines.join('\n');
}

export function composeDigest(digest: DigestData): string {
  const day = digest.period.to.toISOString().slice(0, 10);
  if (digest.items.length === 0) {
    return `📊 Daily digest ${day}\nNo new airdrops in the last 24h.\nRecipients: ${digest.recipientCount}`;
  }

  const lines = [`📊 Daily digest ${day}: top ${digest.items.length}`];
  digest.items.forEach((item, index) => {
    lines.push(
      `${index + 1}. ${item.title} (rank ${item.rankScore}, ${item.verdict}, ${formatReward(item.rewardMagnitude)})`,
      `   ${item.link}`,
    );
  });
  lines.push(`Recipients: ${digest.recipientCount}`);

  return lines.join('\n');
}
