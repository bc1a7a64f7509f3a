/**
 * Analysis report: the per-instrument unit of delivery
 */

import { Instrument } from './instrument';
import { OrderBookSnapshot } from './price';
import {
  IndicatorSet,
  RsiClassification,
  SuggestedLevels,
  TrendClassification
} from './indicator';
import { NewsDigest } from './news';

export interface AnalysisReport {
  instrument: Instrument;
  generatedAt: Date;
  /** Civil time zone the timestamp is rendered in */
  timeZone: string;
  price?: number;
  orderBook?: OrderBookSnapshot;
  indicators: IndicatorSet;
  levels?: SuggestedLevels;
  trend: TrendClassification;
  rsiStatus: RsiClassification;
  /** PNG bytes */
  chart?: Buffer;
  news?: NewsDigest;
}
