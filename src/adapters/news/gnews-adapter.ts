/**
 * GNews Adapter
 *
 * Narrow query on the instrument symbol only.
 * GET /search
 */

import { Instrument } from '../../types/instrument';
import { ArticleOutput } from '../../schemas/providers';
import { BaseNewsAdapter, NewsAdapterConfig, validateArticleList } from './base-news-adapter';

/**
 * Largest `max` the GNews free tier accepts
 */
export const GNEWS_MAX_ARTICLES = 10;

export class GNewsAdapter extends BaseNewsAdapter {
  readonly providerName = 'gnews';

  constructor(config: NewsAdapterConfig) {
    super(config);
  }

  protected async fetchArticles(
    instrument: Instrument,
    maxItems: number,
    apiKey: string,
    signal?: AbortSignal
  ): Promise<ArticleOutput[]> {
    const { data } = await this.client.request({
      path: '/search',
      params: {
        q: instrument.symbol,
        lang: 'en',
        max: Math.min(maxItems, GNEWS_MAX_ARTICLES),
        token: apiKey
      },
      signal,
      validate: validateArticleList
    });
    return data.articles;
  }
}
