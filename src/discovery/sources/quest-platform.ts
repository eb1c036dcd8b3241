/**
 * Quest platform catalog adapter.
 *
 * Reads the public communities listing (JSON) and enriches each
 * community with the largest quest reward and a description sampled
 * from its questboard page (HTML).
 */

import * as cheerio from 'cheerio';
import got, { type Got } from 'got';
import { getLogger } from '../../shared/logger.js';
import { SourceError, errorMessage } from '../../shared/errors.js';
import { retry } from '../../shared/retry.js';
import { sleep } from '../../shared/timing.js';
import { USER_AGENTS } from '../../shared/constants.js';
import { parseDigits, pickRandom, squashWhitespace } from '../../shared/utils.js';
import type { RawCandidate } from '../../types/index.js';
import type { SourceFetcher } from '../types.js';

const log = getLogger('discovery', { component: 'quest-platform' });

const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;
const DEFAULT_PAGE_DELAY_MS = 500;
const DEFAULT_RETRY_DELAY_MS = 2_000;

/**
 * CSS selectors for the questboard page structure.
 */
const SELECTORS = {
  questCard: '.quest-item',
  questReward: '.quest-xp',
  questDescription: '.quest-description',
};

const LIST_KEYS = ['data', 'communities', 'items', 'results'] as const;
const SLUG_KEYS = ['slug', 'handle', 'id', 'community_id'] as const;
const TITLE_KEYS = ['title', 'name', 'displayName', 'label'] as const;
const HREF_KEYS = ['href', 'url'] as const;
const SOCIAL_KEYS = ['twitter', 'twitterUrl', 'twitter_url'] as const;

export interface Community {
  slug: string;
  title: string;
  link: string;
  socialHandle?: string;
}

export interface QuestboardSummary {
  rewardMagnitude: number | null;
  description: string;
  questCount: number;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstString(record: Record<string, unknown>, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim().length > 0) return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return undefined;
}

function findItems(body: unknown): unknown[] {
  if (Array.isArray(body)) return body;
  if (!isRecord(body)) return [];

  for (const key of LIST_KEYS) {
    const value = body[key];
    if (Array.isArray(value)) return value;
  }
  // Fallback: first list value
  for (const value of Object.values(body)) {
    if (Array.isArray(value)) return value;
  }
  return [];
}

function resolveHref(href: string, baseUrl: string): URL | null {
  try {
    return new URL(href, baseUrl);
  } catch {
    log.debug({ href }, 'Unparseable community link');
    return null;
  }
}

/**
 * Pulls communities out of a listing response whose envelope varies
 * between API versions. Items without a slug or link are dropped, as
 * are repeated slugs and items whose link cannot be parsed.
 */
export function extractCommunities(body: unknown, baseUrl: string): Community[] {
  const seen = new Set<string>();
  const communities: Community[] = [];

  for (const item of findItems(body)) {
    if (!isRecord(item)) continue;

    const href = firstString(item, HREF_KEYS);
    const absolute = href ? resolveHref(href, baseUrl) : null;
    if (href && !absolute) continue;
    const slug =
      firstString(item, SLUG_KEYS) ?? absolute?.pathname.split('/').filter(Boolean).pop();
    if (!slug) continue;

    if (seen.has(slug)) continue;
    seen.add(slug);

    communities.push({
      slug,
      title: firstString(item, TITLE_KEYS) ?? slug,
      link: absolute ? absolute.toString() : `${baseUrl.replace(/\/+$/, '')}/c/${slug}`,
      socialHandle: firstString(item, SOCIAL_KEYS),
    });
  }

  return communities;
}

/**
 * Summarises a questboard page: the largest quest reward and the first
 * non-empty quest description.
 */
export function parseQuestboard(html: string): QuestboardSummary {
  const $ = cheerio.load(html);
  let rewardMagnitude: number | null = null;
  let description = '';
  let questCount = 0;

  $(SELECTORS.questCard).each((_index, element) => {
    const card = $(element);
    questCount++;

    const reward = parseDigits(card.find(SELECTORS.questReward).first().text());
    if (reward !== null && (rewardMagnitude === null || reward > rewardMagnitude)) {
      rewardMagnitude = reward;
    }

    if (!description) {
      description = squashWhitespace(card.find(SELECTORS.questDescription).first().text());
    }
  });

  return { rewardMagnitude, description, questCount };
}

// ---------------------------------------------------------------------------
// Fetcher
// ---------------------------------------------------------------------------

export interface QuestPlatformOptions {
  /** Site root, used for community and questboard pages. */
  baseUrl: string;
  /** Public API root serving the communities listing. */
  apiUrl: string;
  requestTimeoutMs?: number;
  /** Pause between questboard requests. */
  pageDelayMs?: number;
  /** Wait before the second listing attempt. Default: 2000 */
  retryDelayMs?: number;
  client?: Got;
}

export class QuestPlatformSource implements SourceFetcher {
  readonly name = 'quest-platform';

  private readonly client: Got;
  private readonly requestTimeoutMs: number;
  private readonly pageDelayMs: number;
  private readonly retryDelayMs: number;

  constructor(private readonly options: QuestPlatformOptions) {
    this.client = options.client ?? got;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.pageDelayMs = options.pageDelayMs ?? DEFAULT_PAGE_DELAY_MS;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  }

  async fetch(limit: number, signal?: AbortSignal): Promise<RawCandidate[]> {
    const startTime = Date.now();
    const communities = (await this.fetchCommunities(limit, signal)).slice(0, limit);
    const candidates: RawCandidate[] = [];

    for (const community of communities) {
      if (signal?.aborted) break;

      const candidate: RawCandidate = {
        title: community.title,
        link: community.link,
        socialHandle: community.socialHandle,
      };

      try {
        await sleep(this.pageDelayMs, signal);
        const summary = parseQuestboard(await this.requestQuestboard(community.slug, signal));
        if (summary.rewardMagnitude !== null) candidate.rewardMagnitude = summary.rewardMagnitude;
        if (summary.description) candidate.description = summary.description;
      } catch (error) {
        // The community still counts; it just lacks enrichment
        log.debug({ slug: community.slug, error: errorMessage(error) }, 'Questboard unavailable');
      }

      candidates.push(candidate);
    }

    log.info(
      { listed: communities.length, returned: candidates.length, durationMs: Date.now() - startTime },
      'Quest platform fetch completed',
    );

    return candidates;
  }

  private async fetchCommunities(limit: number, signal?: AbortSignal): Promise<Community[]> {
    try {
      const body = await retry(() => this.requestListing(limit, signal), {
        maxAttempts: 2,
        baseDelayMs: this.retryDelayMs,
        signal,
      });
      return extractCommunities(body, this.options.baseUrl);
    } catch (error) {
      throw new SourceError(
        `Communities listing failed: ${errorMessage(error)}`,
        'SOURCE_UNAVAILABLE',
        this.name,
      );
    }
  }

  /** Raw communities listing body. */
  protected async requestListing(limit: number, signal?: AbortSignal): Promise<unknown> {
    return this.client
      .get(`${this.options.apiUrl.replace(/\/+$/, '')}/communities`, {
        searchParams: { category: 'all', page: 0, limit },
        headers: {
          'User-Agent': pickRandom(USER_AGENTS),
          'Accept': 'application/json, text/plain, */*',
          'Referer': `${this.options.baseUrl}/explore`,
        },
        timeout: { request: this.requestTimeoutMs },
        signal,
      })
      .json<unknown>();
  }

  /** Questboard HTML for one community. */
  protected async requestQuestboard(slug: string, signal?: AbortSignal): Promise<string> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/c/${encodeURIComponent(slug)}/questboard`;
    return this.client
      .get(url, {
        headers: {
          'User-Agent': pickRandom(USER_AGENTS),
          'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.9',
          'Referer': this.options.baseUrl,
        },
        timeout: { request: this.requestTimeoutMs },
        signal,
      })
      .text();
  }
}
