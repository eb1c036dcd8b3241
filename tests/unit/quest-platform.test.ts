import { describe, it, expect } from 'vitest';
import {
  QuestPlatformSource,
  extractCommunities,
  parseQuestboard,
} from '../../src/discovery/sources/quest-platform.js';
import { createSourceFetcher, isSourceKind } from '../../src/discovery/sources/index.js';
import { ConfigError, SourceError } from '../../src/shared/errors.js';

const BASE = 'https://quests.test';

/** Serves canned listing and questboard bodies instead of calling the network. */
class ScriptedQuestPlatform extends QuestPlatformSource {
  listingCalls = 0;
  readonly boardRequests: string[] = [];

  constructor(
    private readonly listing: unknown,
    private readonly boards: Record<string, string> = {},
  ) {
    super({ baseUrl: BASE, apiUrl: `${BASE}/api`, pageDelayMs: 0, retryDelayMs: 0 });
  }

  protected override async requestListing(): Promise<unknown> {
    this.listingCalls++;
    if (this.listing instanceof Error) throw this.listing;
    return this.listing;
  }

  protected override async requestQuestboard(slug: string): Promise<string> {
    this.boardRequests.push(slug);
    const html = this.boards[slug];
    if (html === undefined) throw new Error(`Response code 404 for ${slug}`);
    return html;
  }
}

function questCard(xp: string, description: string): string {
  return `<div class="quest-item"><span class="quest-xp">${xp}</span><p class="quest-description">${description}</p></div>`;
}

describe('extractCommunities', () => {
  it('reads slugs, titles, links and social handles', () => {
    const body = {
      data: [
        { slug: 'orbit', name: 'Orbit', twitter: 'https://x.com/orbit/status/1' },
        { handle: 'nova', title: 'Nova' },
        { href: '/c/comet', displayName: 'Comet' },
        { id: 42 },
      ],
    };

    expect(extractCommunities(body, BASE)).toEqual([
      { slug: 'orbit', title: 'Orbit', link: 'https://quests.test/c/orbit', socialHandle: 'https://x.com/orbit/status/1' },
      { slug: 'nova', title: 'Nova', link: 'https://quests.test/c/nova', socialHandle: undefined },
      { slug: 'comet', title: 'Comet', link: 'https://quests.test/c/comet', socialHandle: undefined },
      { slug: '42', title: '42', link: 'https://quests.test/c/42', socialHandle: undefined },
    ]);
  });

  it('drops repeated slugs and items without an identity', () => {
    const body = [{ slug: 'orbit', name: 'Orbit' }, { slug: 'orbit', name: 'Orbit copy' }, { name: 'Nameless' }, 'junk'];

    expect(extractCommunities(body, BASE).map((community) => community.title)).toEqual(['Orbit']);
  });

  it('accepts the other envelope shapes', () => {
    expect(extractCommunities({ communities: [{ slug: 'a' }] }, BASE)).toHaveLength(1);
    expect(extractCommunities({ meta: { page: 0 }, rows: [{ slug: 'a' }, { slug: 'b' }] }, BASE)).toHaveLength(2);
    expect(extractCommunities('<html>', BASE)).toEqual([]);
    expect(extractCommunities(null, BASE)).toEqual([]);
  });

  it('skips only the item whose link cannot be parsed', () => {
    const body = { data: [{ slug: 'good', name: 'Good' }, { href: 'http://[broken', name: 'Broken' }] };

    expect(extractCommunities(body, BASE).map((community) => community.slug)).toEqual(['good']);
  });

  it('tolerates a trailing slash on the base URL', () => {
    expect(extractCommunities([{ slug: 'orbit' }], `${BASE}/`)[0]?.link).toBe('https://quests.test/c/orbit');
  });
});

describe('parseQuestboard', () => {
  it('takes the largest reward and the first description', () => {
    const html = `
      <div class="quest-item"><span class="quest-xp">150 XP</span><p class="quest-description"></p></div>
      <div class="quest-item"><span class="quest-xp">1,200 XP</span><p class="quest-description">  Follow
        us   on X </p></div>
      <div class="quest-item"><span class="quest-xp">Bonus</span><p class="quest-description">Join the chat</p></div>
    `;

    expect(parseQuestboard(html)).toEqual({ rewardMagnitude: 1200, description: 'Follow us on X', questCount: 3 });
  });

  it('handles pages without quests', () => {
    expect(parseQuestboard('<main>Nothing here</main>')).toEqual({
      rewardMagnitude: null,
      description: '',
      questCount: 0,
    });
  });
});

describe('QuestPlatformSource', () => {
  it('enriches communities from their questboards', async () => {
    const source = new ScriptedQuestPlatform(
      { data: [{ slug: 'orbit', name: 'Orbit' }, { slug: 'nova', name: 'Nova' }] },
      {
        orbit: questCard('300 XP', 'Join us') + questCard('50 XP', 'Follow'),
        nova: questCard('20 XP', 'Say hi'),
      },
    );

    expect(await source.fetch(10)).toEqual([
      { title: 'Orbit', link: 'https://quests.test/c/orbit', rewardMagnitude: 300, description: 'Join us' },
      { title: 'Nova', link: 'https://quests.test/c/nova', rewardMagnitude: 20, description: 'Say hi' },
    ]);
  });

  it('keeps a community whose questboard fails to load', async () => {
    const source = new ScriptedQuestPlatform(
      { data: [{ slug: 'orbit', name: 'Orbit' }, { slug: 'nova', name: 'Nova' }] },
      { nova: questCard('20 XP', 'Say hi') },
    );

    const candidates = await source.fetch(10);

    expect(candidates).toHaveLength(2);
    expect(candidates[0]).toEqual({ title: 'Orbit', link: 'https://quests.test/c/orbit' });
    expect(candidates[0]?.rewardMagnitude).toBeUndefined();
    expect(candidates[1]?.rewardMagnitude).toBe(20);
  });

  it('stops at the limit', async () => {
    const source = new ScriptedQuestPlatform([{ slug: 'a' }, { slug: 'b' }, { slug: 'c' }]);

    const candidates = await source.fetch(2);

    expect(candidates.map((candidate) => candidate.title)).toEqual(['a', 'b']);
    expect(source.boardRequests).toEqual(['a', 'b']);
  });

  it('keeps the good communities when one listed link is malformed', async () => {
    const source = new ScriptedQuestPlatform({ data: [{ slug: 'good' }, { href: 'http://[broken' }] });

    const candidates = await source.fetch(10);

    expect(candidates.map((candidate) => candidate.link)).toEqual(['https://quests.test/c/good']);
  });

  it('retries the listing once, then reports the source unavailable', async () => {
    const source = new ScriptedQuestPlatform(new Error('Response code 503 (Service Unavailable)'));

    const failure = await source.fetch(10).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(SourceError);
    expect(failure).toMatchObject({
      code: 'SOURCE_UNAVAILABLE',
      source: 'quest-platform',
      message: 'Communities listing failed: Response code 503 (Service Unavailable)',
    });
    expect(source.listingCalls).toBe(2);
    expect(source.boardRequests).toEqual([]);
  });
});

describe('createSourceFetcher', () => {
  it('knows the quest platform source', () => {
    expect(isSourceKind('quest-platform')).toBe(true);
    expect(isSourceKind('rss')).toBe(false);

    const source = createSourceFetcher('quest-platform', { baseUrl: BASE, apiUrl: `${BASE}/api` });
    expect(source.name).toBe('quest-platform');
  });

  it('rejects unknown kinds', () => {
    expect(() => createSourceFetcher('rss', { baseUrl: BASE, apiUrl: BASE })).toThrow(ConfigError);
  });
});
