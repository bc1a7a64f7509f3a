/**
 * News types
 */

import { Instrument } from './instrument';

export interface NewsItem {
  title: string;
  source: string;
  url: string;
  publishedAt?: string;
}

/**
 * Result of a news lookup. `none` is the sentinel used when no provider is
 * configured or none returned anything.
 */
export type NewsDigest =
  | { kind: 'items'; provider: string; items: NewsItem[] }
  | { kind: 'none' };

export const NO_NEWS: NewsDigest = Object.freeze({ kind: 'none' });

export const NO_NEWS_TEXT = 'No relevant news available.';

/**
 * A news search backend, tried in priority order
 */
export interface NewsProvider {
  readonly providerName: string;
  /** False when the provider has no credential; it is then never queried */
  isConfigured(): boolean;
  searchNews(instrument: Instrument, maxItems: number, signal?: AbortSignal): Promise<NewsItem[]>;
}
