/**
 * Base News Adapter - provides common news processing logic for all news adapters
 *
 * - Credential gating: an adapter without an API key reports itself as
 *   unconfigured and is never queried
 * - Normalization of provider articles to NewsItem
 * - Item cap while keeping the provider's order
 */

import { Instrument } from '../../types/instrument';
import { NewsItem, NewsProvider } from '../../types/news';
import { ArticleListOutput, ArticleListSchema, ArticleOutput } from '../../schemas/providers';
import { payloadValidator } from '../../services/schema-validator';
import { RESTClient } from '../rest-client';

/**
 * Configuration for a news adapter
 */
export interface NewsAdapterConfig {
  apiEndpoint: string;
  apiKey?: string;
  timeoutMs: number;
}

export const validateArticleList = payloadValidator.compile<ArticleListOutput>(ArticleListSchema);

/**
 * Error thrown when an unconfigured adapter is asked to search
 */
export class NewsProviderNotConfiguredError extends Error {
  constructor(providerName: string) {
    super(`News provider ${providerName} has no API key`);
    this.name = 'NewsProviderNotConfiguredError';
  }
}

/**
 * Abstract base class for news adapters
 */
export abstract class BaseNewsAdapter implements NewsProvider {
  abstract readonly providerName: string;

  protected readonly config: NewsAdapterConfig;
  private restClient?: RESTClient;

  constructor(config: NewsAdapterConfig) {
    this.config = config;
  }

  isConfigured(): boolean {
    return typeof this.config.apiKey === 'string' && this.config.apiKey.length > 0;
  }

  async searchNews(instrument: Instrument, maxItems: number, signal?: AbortSignal): Promise<NewsItem[]> {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      throw new NewsProviderNotConfiguredError(this.providerName);
    }
    if (maxItems <= 0) {
      return [];
    }

    const articles = await this.fetchArticles(instrument, maxItems, apiKey, signal);
    return this.normalizeArticles(articles, maxItems);
  }

  /**
   * Provider-specific request
   */
  protected abstract fetchArticles(
    instrument: Instrument,
    maxItems: number,
    apiKey: string,
    signal?: AbortSignal
  ): Promise<ArticleOutput[]>;

  protected get client(): RESTClient {
    if (!this.restClient) {
      this.restClient = new RESTClient({
        providerName: this.providerName,
        baseUrl: this.config.apiEndpoint,
        timeoutMs: this.config.timeoutMs
      });
    }
    return this.restClient;
  }

  /**
   * Convert provider articles to NewsItems
   *
   * Articles without a title or URL are dropped; order is preserved.
   */
  protected normalizeArticles(articles: ArticleOutput[], maxItems: number): NewsItem[] {
    const items: NewsItem[] = [];

    for (const article of articles) {
      if (items.length >= maxItems) break;

      const title = article.title?.trim();
      const url = article.url?.trim();
      if (!title || !url) continue;

      items.push({
        title,
        url,
        source: article.source?.name?.trim() || 'Unknown source',
        ...(article.publishedAt ? { publishedAt: article.publishedAt } : {})
      });
    }

    return items;
  }
}
