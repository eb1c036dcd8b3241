/**
 * Always-on trust checks that need no network access.
 */

import type { CheckOutcome, TrustCheck, TrustCheckInput } from '../types.js';

// ---------------------------------------------------------------------------
// Pattern lists
// ---------------------------------------------------------------------------

/** Look-alike brands and drainer kits seen in phishing links. */
const SCAM_URL_PATTERN = /(metaamask|uniswop|claimnow|walletconnect|drainwallet)/i;

const SCAM_DOMAIN_PATTERN = /(?:https?:\/\/)?(?:www\.)?(scam|fake|airdrop-claim|wallet-connect)\.\w+/i;

const SCAM_KEYWORDS = [
  'free money',
  'double your crypto',
  'send eth',
  'private key',
  'seed phrase',
  'recovery phrase',
  'airdrop scam',
  'verify wallet',
  'connect wallet to claim',
  'uniswap clone',
  '1inch fake',
  'magic airdrop',
];

const SUSPICIOUS_KEYWORDS = [
  'urgent',
  'click here',
  'giveaway',
  'act now',
  'limited time',
  'last chance',
  'guaranteed',
  '100x',
  'claim now',
];

const THROWAWAY_TLDS = new Set([
  'xyz', 'top', 'click', 'tk', 'ml', 'ga', 'cf', 'gq', 'buzz', 'icu', 'rest', 'loan',
]);

function contentOf(input: TrustCheckInput): string {
  return `${input.title} ${input.description}`.toLowerCase();
}

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

export class UrlPatternCheck implements TrustCheck {
  readonly name = 'url-pattern';
  readonly maxPenalty = 30;
  readonly fallbackPenalty = 10;

  async run(input: TrustCheckInput): Promise<CheckOutcome> {
    const urlMatch = SCAM_URL_PATTERN.exec(input.link);
    if (urlMatch) {
      return { penalty: this.maxPenalty, reason: `Link matches scam pattern "${urlMatch[1] ?? urlMatch[0]}"`, veto: true };
    }

    const domainMatch = SCAM_DOMAIN_PATTERN.exec(`${input.link} ${input.description}`);
    if (domainMatch) {
      return { penalty: this.maxPenalty, reason: `Known scam domain pattern "${domainMatch[0]}"`, veto: true };
    }

    return { penalty: 0, reason: 'No scam URL pattern' };
  }
}

export class ScamKeywordCheck implements TrustCheck {
  readonly name = 'scam-keywords';
  readonly maxPenalty = 30;
  readonly fallbackPenalty = 10;

  async run(input: TrustCheckInput): Promise<CheckOutcome> {
    const text = contentOf(input);
    const hit = SCAM_KEYWORDS.find((keyword) => text.includes(keyword));
    if (hit) {
      return { penalty: this.maxPenalty, reason: `Scam phrase "${hit}"`, veto: true };
    }
    return { penalty: 0, reason: 'No scam phrases' };
  }
}

export class SuspiciousKeywordCheck implements TrustCheck {
  readonly name = 'suspicious-keywords';
  readonly maxPenalty = 15;
  readonly fallbackPenalty = 10;

  private static readonly PER_KEYWORD = 5;

  async run(input: TrustCheckInput): Promise<CheckOutcome> {
    const text = contentOf(input);
    const hits = SUSPICIOUS_KEYWORDS.filter((keyword) => text.includes(keyword));
    if (hits.length === 0) {
      return { penalty: 0, reason: 'No suspicious phrases' };
    }
    return {
      penalty: Math.min(this.maxPenalty, hits.length * SuspiciousKeywordCheck.PER_KEYWORD),
      reason: `Suspicious phrases: ${hits.join(', ')}`,
    };
  }
}

export class DomainHeuristicsCheck implements TrustCheck {
  readonly name = 'domain-heuristics';
  readonly maxPenalty = 15;
  readonly fallbackPenalty = 10;

  async run(input: TrustCheckInput): Promise<CheckOutcome> {
    let url: URL;
    try {
      url = new URL(input.link);
    } catch {
      return { penalty: this.maxPenalty, reason: 'Link is not a valid URL' };
    }

    const host = url.hostname.toLowerCase();
    const notes: string[] = [];
    let penalty = 0;

    if (url.protocol !== 'https:') {
      penalty += 5;
      notes.push('not https');
    }
    if ((host.match(/-/g) ?? []).length > 2) {
      penalty += 5;
      notes.push('many hyphens');
    }
    if ((host.match(/\d/g) ?? []).length > 3) {
      penalty += 5;
      notes.push('many digits');
    }
    const tld = host.split('.').pop() ?? '';
    if (THROWAWAY_TLDS.has(tld)) {
      penalty += 5;
      notes.push(`.${tld} domain`);
    }

    return {
      penalty: Math.min(this.maxPenalty, penalty),
      reason: notes.length > 0 ? `Domain: ${notes.join(', ')}` : 'Domain looks ordinary',
    };
  }
}
