/**
 * Price and order book types
 */

import { Instrument } from './instrument';

/**
 * A single (timestamp, price) observation in USD
 */
export interface PricePoint {
  timestamp: Date;
  price: number;
}

/**
 * Price observations in ascending time order
 */
export type PriceSeries = PricePoint[];

/**
 * One side of the top of the book
 */
export interface BookLevel {
  price: number;
  quantity: number;
}

/**
 * Best bid/ask as reported by the order book provider
 */
export interface AvailableOrderBook {
  status: 'available';
  bid: BookLevel;
  ask: BookLevel;
  fetchedAt: Date;
}

/**
 * The order book could not be read; says nothing about liquidity
 */
export interface UnavailableOrderBook {
  status: 'unavailable';
  reason: string;
  fetchedAt: Date;
}

export type OrderBookSnapshot = AvailableOrderBook | UnavailableOrderBook;

/**
 * A source of spot prices, tried in priority order by the market data service
 */
export interface PriceProvider {
  readonly providerName: string;
  /** Rejects on any failure; the caller decides how to degrade */
  getSpotPrice(instrument: Instrument, signal?: AbortSignal): Promise<number>;
}

/**
 * A source of top-of-book quotes
 */
export interface OrderBookProvider {
  readonly providerName: string;
  getTopOfBook(instrument: Instrument, signal?: AbortSignal): Promise<{ bid: BookLevel; ask: BookLevel }>;
}

/**
 * A source of historical prices
 */
export interface HistoryProvider {
  readonly providerName: string;
  getPriceHistory(instrument: Instrument, days: number, signal?: AbortSignal): Promise<PriceSeries>;
}
