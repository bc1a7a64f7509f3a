/**
 * Coinbase Price Adapter - spot price and top of book from Coinbase Exchange
 *
 * REST endpoints:
 * - GET /products/{product}/ticker
 * - GET /products/{product}/book?level=1
 */

import { Instrument } from '../../types/instrument';
import { BookLevel, OrderBookProvider, PriceProvider } from '../../types/price';
import { payloadValidator } from '../../services/schema-validator';
import {
  CoinbaseBookOutput,
  CoinbaseBookSchema,
  CoinbaseTickerOutput,
  CoinbaseTickerSchema
} from '../../schemas/providers';
import { BasePriceAdapter, PriceAdapterConfig } from './base-price-adapter';

const validateTicker = payloadValidator.compile<CoinbaseTickerOutput>(CoinbaseTickerSchema);
const validateBook = payloadValidator.compile<CoinbaseBookOutput>(CoinbaseBookSchema);

/**
 * Coinbase Price Adapter implementation
 */
export class CoinbasePriceAdapter extends BasePriceAdapter implements PriceProvider, OrderBookProvider {
  readonly providerName = 'coinbase';

  constructor(config: PriceAdapterConfig) {
    super(config);
  }

  /**
   * Get the last trade price for an instrument
   */
  async getSpotPrice(instrument: Instrument, signal?: AbortSignal): Promise<number> {
    const { data } = await this.client.request({
      path: `/products/${encodeURIComponent(instrument.coinbaseProduct)}/ticker`,
      signal,
      validate: validateTicker
    });
    return this.parsePrice(data.price, 'ticker price');
  }

  /**
   * Get the best bid and ask with their sizes
   */
  async getTopOfBook(
    instrument: Instrument,
    signal?: AbortSignal
  ): Promise<{ bid: BookLevel; ask: BookLevel }> {
    const { data } = await this.client.request({
      path: `/products/${encodeURIComponent(instrument.coinbaseProduct)}/book`,
      params: { level: 1 },
      signal,
      validate: validateBook
    });

    const [bestBid] = data.bids;
    const [bestAsk] = data.asks;

    return {
      bid: {
        price: this.parsePrice(bestBid[0], 'bid price'),
        quantity: this.parseQuantity(bestBid[1], 'bid size')
      },
      ask: {
        price: this.parsePrice(bestAsk[0], 'ask price'),
        quantity: this.parseQuantity(bestAsk[1], 'ask size')
      }
    };
  }
}
