/**
 * Trust checks backed by third-party reputation APIs. Each is enabled
 * only when its API key is configured; any transport or shape error
 * propagates so the scorer substitutes the fallback penalty.
 */

import got, { type Got } from 'got';
import { z } from 'zod';
import { ScoringError } from '../../shared/errors.js';
import { daysBetween, extractDomain } from '../../shared/utils.js';
import type { CheckOutcome, TrustCheck, TrustCheckInput } from '../types.js';

const SAFE_BROWSING_URL = 'https://safebrowsing.googleapis.com/v4/threatMatches:find';
const WHOIS_URL = 'https://www.whoisxmlapi.com/whoisserver/WhoisService';
const ETHERSCAN_URL = 'https://api.etherscan.io/api';

/** Domains and contracts younger than this are penalised. */
const YOUNG_AGE_DAYS = 30;

export interface ExternalCheckOptions {
  apiKey: string;
  client?: Got;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Google Safe Browsing
// ---------------------------------------------------------------------------

const threatMatchSchema = z.object({
  matches: z.array(z.unknown()).optional(),
});

export class SafeBrowsingCheck implements TrustCheck {
  readonly name = 'safe-browsing';
  readonly maxPenalty = 30;
  readonly fallbackPenalty = 10;

  private readonly client: Got;

  constructor(private readonly options: ExternalCheckOptions) {
    this.client = options.client ?? got;
  }

  async run(input: TrustCheckInput, signal: AbortSignal): Promise<CheckOutcome> {
    const body = await this.client
      .post(SAFE_BROWSING_URL, {
        searchParams: { key: this.options.apiKey },
        json: {
          client: { clientId: 'dropwatch', clientVersion: '1.0' },
          threatInfo: {
            threatTypes: ['MALWARE', 'SOCIAL_ENGINEERING'],
            platformTypes: ['ANY_PLATFORM'],
            threatEntryTypes: ['URL'],
            threatEntries: [{ url: input.link }],
          },
        },
        signal,
      })
      .json<unknown>();

    const parsed = threatMatchSchema.parse(body);
    if (parsed.matches && parsed.matches.length > 0) {
      return { penalty: this.maxPenalty, reason: 'Listed by Safe Browsing', veto: true };
    }
    return { penalty: 0, reason: 'Not listed by Safe Browsing' };
  }
}

// ---------------------------------------------------------------------------
// Domain age (WHOIS)
// ---------------------------------------------------------------------------

const whoisSchema = z.object({
  WhoisRecord: z
    .object({
      createdDate: z.string().optional(),
    })
    .optional(),
});

/**
 * Penalty for a WHOIS creation date: 20 when younger than 30 days,
 * 10 when the date is missing or unreadable, 0 otherwise.
 */
export function domainAgePenalty(createdDate: string | undefined, now: Date): CheckOutcome {
  if (!createdDate) {
    return { penalty: 10, reason: 'Domain age unknown' };
  }
  const created = new Date(createdDate.split('T')[0] ?? createdDate);
  if (Number.isNaN(created.getTime())) {
    return { penalty: 10, reason: 'Domain age unknown' };
  }
  const days = Math.floor(daysBetween(created, now));
  if (days < YOUNG_AGE_DAYS) {
    return { penalty: 20, reason: `Domain registered ${days} days ago` };
  }
  return { penalty: 0, reason: `Domain registered ${days} days ago` };
}

export class DomainAgeCheck implements TrustCheck {
  readonly name = 'domain-age';
  readonly maxPenalty = 20;
  readonly fallbackPenalty = 10;

  private readonly client: Got;
  private readonly now: () => Date;

  constructor(private readonly options: ExternalCheckOptions) {
    this.client = options.client ?? got;
    this.now = options.now ?? (() => new Date());
  }

  async run(input: TrustCheckInput, signal: AbortSignal): Promise<CheckOutcome> {
    const domain = extractDomain(input.link);
    if (!domain || domain.includes('/')) {
      throw new ScoringError(`Cannot extract domain from ${input.link}`, 'INVALID_LINK', this.name);
    }

    const body = await this.client
      .get(WHOIS_URL, {
        searchParams: {
          apiKey: this.options.apiKey,
          domainName: domain,
          outputFormat: 'JSON',
        },
        signal,
      })
      .json<unknown>();

    const parsed = whoisSchema.parse(body);
    return domainAgePenalty(parsed.WhoisRecord?.createdDate, this.now());
  }
}

// ---------------------------------------------------------------------------
// Contract verification (Etherscan)
// ---------------------------------------------------------------------------

const sourceCodeSchema = z.object({
  result: z.array(z.object({ SourceCode: z.string() })).min(1),
});

const txListSchema = z.object({
  // "result" is an error string when the address has no transactions
  result: z.union([z.array(z.object({ timeStamp: z.string() })), z.string()]),
});

export class ContractCheck implements TrustCheck {
  readonly name = 'contract';
  readonly maxPenalty = 25;
  readonly fallbackPenalty = 10;

  private readonly client: Got;
  private readonly now: () => Date;

  constructor(private readonly options: ExternalCheckOptions) {
    this.client = options.client ?? got;
    this.now = options.now ?? (() => new Date());
  }

  async run(input: TrustCheckInput, signal: AbortSignal): Promise<CheckOutcome> {
    if (!input.contract) {
      return { penalty: 0, reason: 'No contract reference' };
    }

    const notes: string[] = [];
    let penalty = 0;

    const source = sourceCodeSchema.parse(
      await this.etherscan({ module: 'contract', action: 'getsourcecode', address: input.contract }, signal),
    );
    if (!source.result[0]?.SourceCode) {
      penalty += 15;
      notes.push('unverified source');
    }

    const txs = txListSchema.parse(
      await this.etherscan(
        {
          module: 'account',
          action: 'txlist',
          address: input.contract,
          startblock: '0',
          endblock: '99999999',
          page: '1',
          offset: '1',
          sort: 'asc',
        },
        signal,
      ),
    );
    const first = Array.isArray(txs.result) ? txs.result[0] : undefined;
    if (first) {
      const createdAt = new Date(Number(first.timeStamp) * 1000);
      if (daysBetween(createdAt, this.now()) < YOUNG_AGE_DAYS) {
        penalty += 10;
        notes.push('deployed recently');
      }
    }

    return {
      penalty,
      reason: notes.length > 0 ? `Contract: ${notes.join(', ')}` : 'Contract verified',
    };
  }

  private etherscan(params: Record<string, string>, signal: AbortSignal): Promise<unknown> {
    return this.client
      .get(ETHERSCAN_URL, {
        searchParams: { ...params, apikey: this.options.apiKey },
        signal,
      })
      .json<unknown>();
  }
}
