/**
 * News Service - ordered fallback over news providers
 *
 * Providers are tried in priority order. An unconfigured provider is skipped
 * without a request; a provider that fails or finds nothing falls through to
 * the next. When no provider yields items the result is the NO_NEWS sentinel.
 */

import { Instrument } from '../types/instrument';
import { NO_NEWS, NewsDigest, NewsProvider } from '../types/news';
import { Logger, describeError, noopLogger } from '../utils/logger';

export const DEFAULT_MAX_NEWS_ITEMS = 3;

export interface NewsServiceOptions {
  providers: NewsProvider[];
  logger?: Logger;
}

export class NewsService {
  private readonly providers: NewsProvider[];
  private readonly logger: Logger;

  constructor(options: NewsServiceOptions) {
    this.providers = [...options.providers];
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * True when at least one provider has a credential
   */
  hasConfiguredProvider(): boolean {
    return this.providers.some((provider) => provider.isConfigured());
  }

  async fetchNews(
    instrument: Instrument,
    maxItems: number = DEFAULT_MAX_NEWS_ITEMS,
    signal?: AbortSignal
  ): Promise<NewsDigest> {
    for (const provider of this.providers) {
      if (!provider.isConfigured()) {
        continue;
      }
      if (signal?.aborted) {
        this.logger.warn(`News lookup for ${instrument.symbol} cancelled before ${provider.providerName}`);
        break;
      }

      try {
        const items = (await provider.searchNews(instrument, maxItems, signal)).slice(0, maxItems);
        if (items.length > 0) {
          return { kind: 'items', provider: provider.providerName, items };
        }
        this.logger.info(`${provider.providerName} has no news for ${instrument.symbol}`);
      } catch (error) {
        this.logger.warn(
          `${provider.providerName} news for ${instrument.symbol} unavailable: ${describeError(error)}`
        );
      }
    }

    return NO_NEWS;
  }
}
