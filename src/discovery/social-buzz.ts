import got, { type Got } from 'got';
import { z } from 'zod';
import { getLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';

const log = getLogger('scoring', { component: 'social-buzz' });

const TWEETS_URL = 'https://api.twitter.com/2/tweets';

const tweetSchema = z.object({
  data: z.object({
    public_metrics: z.object({
      like_count: z.number().default(0),
      retweet_count: z.number().default(0),
      reply_count: z.number().default(0),
    }),
  }),
});

export interface PostMetrics {
  likes: number;
  reposts: number;
  replies: number;
}

/** Engagement total with reposts counted double, mapped onto four tiers. */
export function buzzFromMetrics(metrics: PostMetrics): number {
  const engagement = metrics.likes + metrics.reposts * 2 + metrics.replies;
  if (engagement > 2000) return 90;
  if (engagement > 500) return 70;
  if (engagement > 100) return 50;
  return 25;
}

/** Post id from a status URL ("https://x.com/proj/status/123?s=20" -> "123"). */
export function extractPostId(reference: string): string | null {
  const last = reference.split('?')[0]?.split('/').filter(Boolean).pop() ?? '';
  return /^\d+$/.test(last) ? last : null;
}

export interface SocialBuzzOptions {
  bearerToken?: string;
  timeoutMs: number;
  client?: Got;
}

/**
 * Estimates a 0-100 buzz score from the public metrics of the social
 * post a candidate links to. Resolves `null` whenever no estimate can
 * be made; the rank composer treats that as neutral.
 */
export class SocialBuzzRater {
  private readonly client: Got;

  constructor(private readonly options: SocialBuzzOptions) {
    this.client = options.client ?? got;
  }

  async rate(socialHandle: string | null, signal?: AbortSignal): Promise<number | null> {
    if (!socialHandle || !this.options.bearerToken) return null;

    const postId = extractPostId(socialHandle);
    if (!postId) return null;

    try {
      const body = await this.client
        .get(`${TWEETS_URL}/${postId}`, {
          searchParams: { 'tweet.fields': 'public_metrics' },
          headers: { Authorization: `Bearer ${this.options.bearerToken}` },
          timeout: { request: this.options.timeoutMs },
          signal,
        })
        .json<unknown>();

      const parsed = tweetSchema.safeParse(body);
      if (!parsed.success) {
        log.debug({ postId }, 'Post metrics missing from response');
        return null;
      }

      const metrics = parsed.data.data.public_metrics;
      return buzzFromMetrics({
        likes: metrics.like_count,
        reposts: metrics.retweet_count,
        replies: metrics.reply_count,
      });
    } catch (error) {
      log.warn({ postId, error: errorMessage(error) }, 'Social buzz lookup failed');
      return null;
    }
  }
}
