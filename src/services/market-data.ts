/**
 * Market Data Service - spot price with ordered fallback, and top of book
 *
 * Provider failures never reach the caller: a price that no provider could
 * supply is `undefined`, an order book that could not be read is an
 * `unavailable` snapshot.
 */

import { Instrument } from '../types/instrument';
import {
  OrderBookProvider,
  OrderBookSnapshot,
  PriceProvider
} from '../types/price';
import { Logger, describeError, noopLogger } from '../utils/logger';

export interface MarketDataServiceOptions {
  /** Tried in array order; the first success wins */
  priceProviders: PriceProvider[];
  orderBookProvider: OrderBookProvider;
  logger?: Logger;
  now?: () => Date;
}

export class MarketDataService {
  private readonly priceProviders: PriceProvider[];
  private readonly orderBookProvider: OrderBookProvider;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: MarketDataServiceOptions) {
    this.priceProviders = [...options.priceProviders];
    this.orderBookProvider = options.orderBookProvider;
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Fetch the USD spot price, falling back through the providers in order
   *
   * @returns The first provider's price that succeeds, or undefined when all fail
   */
  async fetchPrice(instrument: Instrument, signal?: AbortSignal): Promise<number | undefined> {
    for (const provider of this.priceProviders) {
      if (signal?.aborted) {
        this.logger.warn(`Price lookup for ${instrument.symbol} cancelled before ${provider.providerName}`);
        break;
      }

      try {
        const price = await provider.getSpotPrice(instrument, signal);
        this.logger.debug(`${instrument.symbol} price ${price} from ${provider.providerName}`);
        return price;
      } catch (error) {
        this.logger.warn(
          `${provider.providerName} price for ${instrument.symbol} unavailable: ${describeError(error)}`
        );
      }
    }

    return undefined;
  }

  /**
   * Fetch the best bid and ask
   *
   * @returns An `available` snapshot, or `unavailable` on any failure
   */
  async fetchOrderBook(instrument: Instrument, signal?: AbortSignal): Promise<OrderBookSnapshot> {
    try {
      const { bid, ask } = await this.orderBookProvider.getTopOfBook(instrument, signal);
      return { status: 'available', bid, ask, fetchedAt: this.now() };
    } catch (error) {
      const reason = describeError(error);
      this.logger.warn(
        `${this.orderBookProvider.providerName} order book for ${instrument.symbol} unavailable: ${reason}`
      );
      return { status: 'unavailable', reason, fetchedAt: this.now() };
    }
  }
}
