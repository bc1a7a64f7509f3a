/**
 * Technical indicator types
 */

/**
 * A value per price point; undefined where the indicator is not yet defined
 */
export type IndicatorSeries = Array<number | undefined>;

export interface IndicatorSet {
  /** Latest 20-period simple moving average */
  sma?: number;
  /** Latest 14-period relative strength index */
  rsi?: number;
}

export interface SuggestedLevels {
  buy: number;
  sell: number;
}

export type TrendClassification = 'Bullish' | 'Bearish' | 'Neutral' | 'N/A';

export type RsiClassification = 'Oversold' | 'Overbought' | 'Neutral' | 'N/A';

/**
 * Everything derived from a price series for one report
 */
export interface SeriesAnalysis {
  smaSeries: IndicatorSeries;
  rsiSeries: IndicatorSeries;
  indicators: IndicatorSet;
  levels?: SuggestedLevels;
  trend: TrendClassification;
  rsiStatus: RsiClassification;
}
