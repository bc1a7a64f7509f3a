/**
 * Instrument definitions
 *
 * An instrument is a tracked cryptocurrency together with the identifiers
 * each upstream provider uses for it.
 */

/**
 * A tracked cryptocurrency
 */
export interface Instrument {
  /** Canonical identifier, e.g. "bitcoin" */
  readonly id: string;
  /** Display symbol, e.g. "BTC" */
  readonly symbol: string;
  /** Coinbase Exchange product id, e.g. "BTC-USD" */
  readonly coinbaseProduct: string;
  /** CoinGecko coin id, e.g. "bitcoin" */
  readonly coingeckoId: string;
}

/**
 * Instruments analysed on every tick, in delivery order
 */
export const TRACKED_INSTRUMENTS: readonly Instrument[] = Object.freeze([
  { id: 'bitcoin', symbol: 'BTC', coinbaseProduct: 'BTC-USD', coingeckoId: 'bitcoin' },
  { id: 'ethereum', symbol: 'ETH', coinbaseProduct: 'ETH-USD', coingeckoId: 'ethereum' },
  { id: 'ripple', symbol: 'XRP', coinbaseProduct: 'XRP-USD', coingeckoId: 'ripple' }
]);
