/**
 * NewsAPI Adapter
 *
 * Broad query: the instrument symbol OR generic crypto terms, newest first.
 * GET /everything
 */

import { Instrument } from '../../types/instrument';
import { ArticleOutput } from '../../schemas/providers';
import { BaseNewsAdapter, NewsAdapterConfig, validateArticleList } from './base-news-adapter';

/**
 * NewsAPI rejects pageSize above 100
 */
const MAX_PAGE_SIZE = 100;

export class NewsApiAdapter extends BaseNewsAdapter {
  readonly providerName = 'newsapi';

  constructor(config: NewsAdapterConfig) {
    super(config);
  }

  /**
   * Build the search query for an instrument
   */
  static buildQuery(instrument: Instrument): string {
    return `${instrument.symbol} OR crypto OR cryptocurrency OR blockchain`;
  }

  protected async fetchArticles(
    instrument: Instrument,
    maxItems: number,
    apiKey: string,
    signal?: AbortSignal
  ): Promise<ArticleOutput[]> {
    const { data } = await this.client.request({
      path: '/everything',
      params: {
        q: NewsApiAdapter.buildQuery(instrument),
        language: 'en',
        sortBy: 'publishedAt',
        pageSize: Math.min(maxItems, MAX_PAGE_SIZE)
      },
      headers: { 'X-Api-Key': apiKey },
      signal,
      validate: validateArticleList
    });
    return data.articles;
  }
}
