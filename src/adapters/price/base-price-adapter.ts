/**
 * Base Price Adapter - common plumbing for market data providers
 *
 * - One RESTClient per provider, bound to its base URL and timeout
 * - Numeric coercion of string-encoded prices
 * - Rejection of values that cannot be a USD price
 */

import { RESTClient } from '../rest-client';

/**
 * Configuration for a price adapter
 */
export interface PriceAdapterConfig {
  apiEndpoint: string;
  timeoutMs: number;
}

/**
 * Error thrown when a provider answers with something that is not a usable price
 */
export class InvalidPriceError extends Error {
  constructor(
    public readonly providerName: string,
    public readonly field: string,
    public readonly value: unknown
  ) {
    super(`${providerName} returned an invalid ${field}: ${String(value)}`);
    this.name = 'InvalidPriceError';
  }
}

/**
 * Abstract base class for price adapters
 */
export abstract class BasePriceAdapter {
  abstract readonly providerName: string;

  protected readonly config: PriceAdapterConfig;
  private restClient?: RESTClient;

  constructor(config: PriceAdapterConfig) {
    this.config = config;
  }

  /**
   * REST client, created on first use so subclasses can set providerName
   */
  protected get client(): RESTClient {
    if (!this.restClient) {
      this.restClient = new RESTClient({
        providerName: this.providerName,
        baseUrl: this.config.apiEndpoint,
        timeoutMs: this.config.timeoutMs
      });
    }
    return this.restClient;
  }

  /**
   * Convert a value to a number
   */
  protected toNumber(value: number | string): number {
    return typeof value === 'string' ? parseFloat(value) : value;
  }

  /**
   * Parse a price, which must be finite and strictly positive
   */
  protected parsePrice(value: number | string | undefined, field: string): number {
    const price = value === undefined ? NaN : this.toNumber(value);
    if (!Number.isFinite(price) || price <= 0) {
      throw new InvalidPriceError(this.providerName, field, value);
    }
    return price;
  }

  /**
   * Parse a quantity, which must be finite and not negative
   */
  protected parseQuantity(value: number | string | undefined, field: string): number {
    const quantity = value === undefined ? NaN : this.toNumber(value);
    if (!Number.isFinite(quantity) || quantity < 0) {
      throw new InvalidPriceError(this.providerName, field, value);
    }
    return quantity;
  }
}
