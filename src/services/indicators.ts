/**
 * Technical indicators over a price series
 *
 * All series-valued functions return an array aligned with their input,
 * holding `undefined` wherever the indicator is not defined yet.
 */

import {
  IndicatorSeries,
  RsiClassification,
  SuggestedLevels,
  TrendClassification
} from '../types/indicator';

export const RSI_OVERSOLD = 30;
export const RSI_OVERBOUGHT = 70;

/**
 * Nearest value with 2 decimals, taken from the exact binary value
 * (0.285 is stored just below the tie and rounds to 0.28)
 */
export function roundToCents(value: number): number {
  return Number(value.toFixed(2));
}

/**
 * Trailing simple moving average
 *
 * SMA[i] = mean(prices[i - window + 1 .. i]); undefined for i < window - 1.
 */
export function movingAverage(prices: number[], window: number): IndicatorSeries {
  if (!Number.isInteger(window) || window < 1) {
    throw new RangeError(`Moving average window must be a positive integer, got ${window}`);
  }

  const result: IndicatorSeries = [];
  let sum = 0;

  for (let i = 0; i < prices.length; i++) {
    sum += prices[i];
    if (i >= window) {
      sum -= prices[i - window];
    }
    result.push(i >= window - 1 ? sum / window : undefined);
  }

  return result;
}

/**
 * Relative strength index from simple rolling means of gains and losses
 *
 * delta[i] = prices[i] - prices[i - 1]; gains and losses are averaged over the
 * last `window` deltas, so RSI[i] is defined from i = window onwards.
 *
 * RSI = 100 - 100 / (1 + meanGain / meanLoss)
 *
 * - meanLoss = 0 with meanGain > 0 gives 100 (the formula's limit).
 * - meanLoss = 0 with meanGain = 0 (flat window) is indeterminate and gives
 *   undefined; it is reported as absent rather than as a made-up value.
 */
export function relativeStrengthIndex(prices: number[], window: number): IndicatorSeries {
  if (!Number.isInteger(window) || window < 1) {
    throw new RangeError(`RSI window must be a positive integer, got ${window}`);
  }

  const result: IndicatorSeries = prices.length > 0 ? [undefined] : [];
  const gains: number[] = [];
  const losses: number[] = [];

  for (let i = 1; i < prices.length; i++) {
    const delta = prices[i] - prices[i - 1];
    gains.push(Math.max(delta, 0));
    losses.push(Math.max(-delta, 0));

    if (gains.length < window) {
      result.push(undefined);
      continue;
    }

    const meanGain = mean(gains.slice(-window));
    const meanLoss = mean(losses.slice(-window));
    result.push(rsiFromMeans(meanGain, meanLoss));
  }

  return result;
}

function rsiFromMeans(meanGain: number, meanLoss: number): number | undefined {
  if (meanLoss === 0) {
    return meanGain === 0 ? undefined : 100;
  }
  return 100 - 100 / (1 + meanGain / meanLoss);
}

function mean(values: number[]): number {
  return values.reduce((acc, value) => acc + value, 0) / values.length;
}

/**
 * Last element of an indicator series
 */
export function latest(series: IndicatorSeries): number | undefined {
  return series.length > 0 ? series[series.length - 1] : undefined;
}

/**
 * Buy 2% above the window low, sell 2% below the window high
 *
 * @returns undefined for an empty series
 */
export function suggestedLevels(prices: number[]): SuggestedLevels | undefined {
  if (prices.length === 0) {
    return undefined;
  }

  const low = Math.min(...prices);
  const high = Math.max(...prices);

  return {
    buy: roundToCents(low * 1.02),
    sell: roundToCents(high * 0.98)
  };
}

/**
 * Price relative to its moving average
 */
export function classifyTrend(price: number | undefined, sma: number | undefined): TrendClassification {
  if (price === undefined || sma === undefined) return 'N/A';
  if (price > sma) return 'Bullish';
  if (price < sma) return 'Bearish';
  return 'Neutral';
}

export function classifyRsi(rsi: number | undefined): RsiClassification {
  if (rsi === undefined) return 'N/A';
  if (rsi < RSI_OVERSOLD) return 'Oversold';
  if (rsi > RSI_OVERBOUGHT) return 'Overbought';
  return 'Neutral';
}
