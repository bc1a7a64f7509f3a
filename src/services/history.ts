/**
 * History Service - price history and the analysis derived from it
 */

import { Instrument } from '../types/instrument';
import { HistoryProvider, PriceSeries } from '../types/price';
import { SeriesAnalysis } from '../types/indicator';
import { Logger, describeError, noopLogger } from '../utils/logger';
import {
  classifyRsi,
  classifyTrend,
  latest,
  movingAverage,
  relativeStrengthIndex,
  suggestedLevels
} from './indicators';

export interface HistoryServiceOptions {
  provider: HistoryProvider;
  smaWindow: number;
  rsiWindow: number;
  logger?: Logger;
}

export class HistoryService {
  private readonly provider: HistoryProvider;
  private readonly smaWindow: number;
  private readonly rsiWindow: number;
  private readonly logger: Logger;

  constructor(options: HistoryServiceOptions) {
    this.provider = options.provider;
    this.smaWindow = options.smaWindow;
    this.rsiWindow = options.rsiWindow;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Fetch `days` of prices in ascending order
   *
   * @returns An empty series when the provider fails
   */
  async fetchHistory(instrument: Instrument, days: number = 3, signal?: AbortSignal): Promise<PriceSeries> {
    try {
      return await this.provider.getPriceHistory(instrument, days, signal);
    } catch (error) {
      this.logger.warn(
        `${this.provider.providerName} history for ${instrument.symbol} unavailable: ${describeError(error)}`
      );
      return [];
    }
  }

  /**
   * Derive indicators, levels and classifications
   *
   * @param series - Price history in ascending order
   * @param currentPrice - Spot price used for the trend; absent gives trend N/A
   */
  analyze(series: PriceSeries, currentPrice: number | undefined): SeriesAnalysis {
    const prices = series.map((point) => point.price);
    const smaSeries = movingAverage(prices, this.smaWindow);
    const rsiSeries = relativeStrengthIndex(prices, this.rsiWindow);
    const sma = latest(smaSeries);
    const rsi = latest(rsiSeries);

    return {
      smaSeries,
      rsiSeries,
      indicators: { sma, rsi },
      levels: suggestedLevels(prices),
      trend: classifyTrend(currentPrice, sma),
      rsiStatus: classifyRsi(rsi)
    };
  }
}
