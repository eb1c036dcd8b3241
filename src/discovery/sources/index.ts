/**
 * Source registry - factory for the catalog adapters.
 *
 * Every adapter implements `SourceFetcher`; the pipeline never searches
 * adapters for alternative method names.
 */

import { ConfigError } from '../../shared/errors.js';
import type { SourceFetcher } from '../types.js';
import { QuestPlatformSource, type QuestPlatformOptions } from './quest-platform.js';

export type SourceKind = 'quest-platform';

const FACTORIES: Record<SourceKind, (options: QuestPlatformOptions) => SourceFetcher> = {
  'quest-platform': (options) => new QuestPlatformSource(options),
};

export function createSourceFetcher(kind: string, options: QuestPlatformOptions): SourceFetcher {
  if (!isSourceKind(kind)) {
    throw new ConfigError(`Unknown source "${kind}"`, 'SOURCE_KIND');
  }
  return FACTORIES[kind](options);
}

export function isSourceKind(kind: string): kind is SourceKind {
  return Object.hasOwn(FACTORIES, kind);
}

export { QuestPlatformSource, extractCommunities, parseQuestboard } from './quest-platform.js';
export type { Community, QuestboardSummary, QuestPlatformOptions } from './quest-platform.js';
