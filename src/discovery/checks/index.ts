import type { Got } from 'got';
import type { TrustCheck } from '../types.js';
import {
  DomainHeuristicsCheck,
  ScamKeywordCheck,
  SuspiciousKeywordCheck,
  UrlPatternCheck,
} from './local-checks.js';
import { ContractCheck, DomainAgeCheck, SafeBrowsingCheck } from './external-checks.js';

export interface TrustCheckKeys {
  safeBrowsingKey?: string;
  whoisApiKey?: string;
  etherscanApiKey?: string;
}

/**
 * Builds the check list: local checks always, external ones only when
 * their key is configured.
 */
export function createTrustChecks(
  keys: TrustCheckKeys,
  options: { client?: Got; now?: () => Date } = {},
): TrustCheck[] {
  const checks: TrustCheck[] = [
    new UrlPatternCheck(),
    new ScamKeywordCheck(),
    new SuspiciousKeywordCheck(),
    new DomainHeuristicsCheck(),
  ];

  if (keys.safeBrowsingKey) {
    checks.push(new SafeBrowsingCheck({ ...options, apiKey: keys.safeBrowsingKey }));
  }
  if (keys.whoisApiKey) {
    checks.push(new DomainAgeCheck({ ...options, apiKey: keys.whoisApiKey }));
  }
  if (keys.etherscanApiKey) {
    checks.push(new ContractCheck({ ...options, apiKey: keys.etherscanApiKey }));
  }

  return checks;
}

export {
  UrlPatternCheck,
  ScamKeywordCheck,
  SuspiciousKeywordCheck,
  DomainHeuristicsCheck,
  SafeBrowsingCheck,
  DomainAgeCheck,
  ContractCheck,
};
export { domainAgePenalty } from './external-checks.js';
