import * as fc from 'fast-check';
import { Instrument, TRACKED_INSTRUMENTS } from '../types/instrument';
import { PricePoint, PriceSeries } from '../types/price';
import { NewsItem } from '../types/news';

/**
 * Generator for one of the tracked instruments
 */
export const instrumentArb = (): fc.Arbitrary<Instrument> => fc.constantFrom(...TRACKED_INSTRUMENTS);

/**
 * Generator for a USD price
 */
export const priceArb = (): fc.Arbitrary<number> =>
  fc.double({ min: 0.0001, max: 1000000, noNaN: true, noDefaultInfinity: true });

/**
 * Generator for a list of prices
 */
export const priceListArb = (minLength = 0, maxLength = 120): fc.Arbitrary<number[]> =>
  fc.array(priceArb(), { minLength, maxLength });

/**
 * Generator for an hourly price series in ascending order
 */
export const priceSeriesArb = (minLength = 0, maxLength = 72): fc.Arbitrary<PriceSeries> =>
  fc.tuple(
    fc.integer({ min: Date.UTC(2023, 0, 1), max: Date.UTC(2026, 0, 1) }),
    priceListArb(minLength, maxLength)
  ).map(([start, prices]) =>
    prices.map((price, i): PricePoint => ({ timestamp: new Date(start + i * 3600000), price }))
  );

/**
 * Generator for an indicator window length
 */
export const windowArb = (): fc.Arbitrary<number> => fc.integer({ min: 1, max: 30 });

/**
 * Generator for a normalized news item
 */
export const newsItemArb = (): fc.Arbitrary<NewsItem> =>
  fc.record({
    title: fc.string({ minLength: 1, maxLength: 80 }).filter((s) => s.trim() === s && s.length > 0),
    source: fc.constantFrom('CoinDesk', 'Decrypt', 'The Block', 'Unknown source'),
    url: fc.webUrl()
  });

/**
 * Generator for an instant, to the millisecond, between 2023 and 2026
 */
export const instantArb = (): fc.Arbitrary<Date> =>
  fc.integer({ min: Date.UTC(2023, 0, 1), max: Date.UTC(2026, 0, 1) }).map((ms) => new Date(ms));
