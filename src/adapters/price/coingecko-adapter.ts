/**
 * CoinGecko Price Adapter - fallback spot price and price history
 *
 * REST endpoints:
 * - GET /simple/price?ids={id}&vs_currencies=usd
 * - GET /coins/{id}/market_chart?vs_currency=usd&days={days}
 */

import { Instrument } from '../../types/instrument';
import { HistoryProvider, PricePoint, PriceProvider, PriceSeries } from '../../types/price';
import { payloadValidator } from '../../services/schema-validator';
import {
  CoinGeckoMarketChartOutput,
  CoinGeckoMarketChartSchema,
  CoinGeckoSimplePriceOutput,
  CoinGeckoSimplePriceSchema
} from '../../schemas/providers';
import { BasePriceAdapter, PriceAdapterConfig } from './base-price-adapter';

const validateSimplePrice = payloadValidator.compile<CoinGeckoSimplePriceOutput>(CoinGeckoSimplePriceSchema);
const validateMarketChart = payloadValidator.compile<CoinGeckoMarketChartOutput>(CoinGeckoMarketChartSchema);

/**
 * CoinGecko Price Adapter implementation
 */
export class CoinGeckoPriceAdapter extends BasePriceAdapter implements PriceProvider, HistoryProvider {
  readonly providerName = 'coingecko';

  constructor(config: PriceAdapterConfig) {
    super(config);
  }

  /**
   * Get the current USD price for an instrument
   */
  async getSpotPrice(instrument: Instrument, signal?: AbortSignal): Promise<number> {
    const { data } = await this.client.request({
      path: '/simple/price',
      params: { ids: instrument.coingeckoId, vs_currencies: 'usd' },
      signal,
      validate: validateSimplePrice
    });
    return this.parsePrice(data[instrument.coingeckoId]?.usd, `${instrument.coingeckoId}.usd`);
  }

  /**
   * Get `days` of USD prices in ascending time order
   *
   * Points with a non-finite timestamp or a non-positive price are dropped.
   */
  async getPriceHistory(instrument: Instrument, days: number, signal?: AbortSignal): Promise<PriceSeries> {
    const { data } = await this.client.request({
      path: `/coins/${encodeURIComponent(instrument.coingeckoId)}/market_chart`,
      params: { vs_currency: 'usd', days },
      signal,
      validate: validateMarketChart
    });

    const points: PricePoint[] = [];
    for (const [timestampMs, price] of data.prices) {
      if (Number.isFinite(timestampMs) && Number.isFinite(price) && price > 0) {
        points.push({ timestamp: new Date(timestampMs), price });
      }
    }

    return points.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }
}
