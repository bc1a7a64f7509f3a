/**
 * Price Adapters - exports all price adapter implementations
 */

export { BasePriceAdapter, PriceAdapterConfig, InvalidPriceError } from './base-price-adapter';
export { CoinbasePriceAdapter } from './coinbase-adapter';
export { CoinGeckoPriceAdapter } from './coingecko-adapter';
