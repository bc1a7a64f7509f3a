/**
 * REST Client for upstream providers
 *
 * Provides HTTP request functionality with:
 * - Per-request timeout
 * - Caller cancellation through an AbortSignal
 * - Error categorization
 * - Schema validation of the response body
 */

import { SchemaValidationResult, formatValidationErrors } from '../services/schema-validator';

/**
 * HTTP methods used against providers
 */
export type HttpMethod = 'GET' | 'POST';

/**
 * Why a request failed
 */
export type ErrorCategory =
  | 'TIMEOUT'
  | 'ABORTED'
  | 'NETWORK'
  | 'RATE_LIMITED'
  | 'HTTP_ERROR'
  | 'INVALID_RESPONSE';

/**
 * Configuration for a REST request
 */
export interface RESTRequestConfig<T> {
  method?: HttpMethod;
  path: string;
  params?: Record<string, string | number>;
  /** Sent as application/json */
  json?: unknown;
  /** Sent as multipart/form-data */
  form?: FormData;
  headers?: Record<string, string>;
  timeout?: number;
  signal?: AbortSignal;
  /** Narrows the parsed body; a failed validation is an INVALID_RESPONSE */
  validate: (data: unknown) => SchemaValidationResult<T>;
}

/**
 * Response from a REST request
 */
export interface RESTResponse<T> {
  data: T;
  status: number;
  latencyMs: number;
}

export interface RESTClientOptions {
  providerName: string;
  baseUrl: string;
  timeoutMs: number;
}

/**
 * Error thrown by REST client operations.
 * Messages never include the request URL, which may carry credentials.
 */
export class RESTClientError extends Error {
  constructor(
    message: string,
    public readonly providerName: string,
    public readonly category: ErrorCategory,
    public readonly statusCode?: number,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'RESTClientError';
  }
}

/**
 * REST Client bound to one provider's base URL
 */
export class RESTClient {
  readonly providerName: string;
  private readonly baseUrl: string;
  private readonly defaultTimeout: number;

  constructor(options: RESTClientOptions) {
    this.providerName = options.providerName;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.defaultTimeout = options.timeoutMs;
  }

  /**
   * Execute a request with timeout, cancellation and validation
   *
   * The timeout covers reading the body as well as the response headers.
   */
  async request<T>(config: RESTRequestConfig<T>): Promise<RESTResponse<T>> {
    const startTime = Date.now();
    const timeout = config.timeout ?? this.defaultTimeout;
    const url = this.buildUrl(config.path, config.params);

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);
    const onCallerAbort = () => controller.abort();
    if (config.signal?.aborted) {
      controller.abort();
    } else {
      config.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
      const response = await fetch(url, {
        method: config.method ?? 'GET',
        headers: this.buildHeaders(config),
        body: config.form ?? (config.json !== undefined ? JSON.stringify(config.json) : undefined),
        signal: controller.signal
      });
      const body = await this.readJson(response);

      if (!response.ok) {
        throw this.createErrorFromResponse(response.status, body);
      }

      const validation = config.validate(body);
      if (!validation.valid) {
        throw new RESTClientError(
          `Unexpected response from ${this.providerName}: ${formatValidationErrors(validation.errors)}`,
          this.providerName,
          'INVALID_RESPONSE',
          response.status
        );
      }

      return {
        data: validation.value,
        status: response.status,
        latencyMs: Date.now() - startTime
      };
    } catch (error) {
      if (error instanceof RESTClientError) {
        throw error;
      }
      throw this.categorizeError(error, Date.now() - startTime, timedOut, config.signal?.aborted ?? false);
    } finally {
      clearTimeout(timeoutId);
      config.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  /**
   * Build the full URL with query parameters
   */
  private buildUrl(path: string, params?: Record<string, string | number>): string {
    const url = new URL(`${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`);
    if (params) {
      for (const [key, value] of Object.entries(params)) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private buildHeaders(config: RESTRequestConfig<unknown>): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...config.headers
    };
    if (config.json !== undefined && config.form === undefined) {
      headers['Content-Type'] = 'application/json';
    }
    return headers;
  }

  /**
   * Read the body as JSON; a body that is not JSON reads as undefined.
   * Abort and network errors while reading propagate.
   */
  private async readJson(response: Response): Promise<unknown> {
    const text = await response.text();
    if (text.length === 0) {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch {
      return undefined;
    }
  }

  /**
   * Create an error from HTTP response
   */
  private createErrorFromResponse(status: number, body: unknown): RESTClientError {
    const category: ErrorCategory = status === 429 ? 'RATE_LIMITED' : 'HTTP_ERROR';
    return new RESTClientError(
      `${this.providerName} returned HTTP ${status}: ${this.extractErrorMessage(body)}`,
      this.providerName,
      category,
      status,
      body
    );
  }

  /**
   * Extract error message from response body
   */
  private extractErrorMessage(body: unknown): string {
    if (body && typeof body === 'object') {
      for (const field of ['message', 'error', 'description']) {
        const value: unknown = Reflect.get(body, field);
        if (typeof value === 'string') {
          return value;
        }
      }
    }
    return 'no error message';
  }

  /**
   * Categorize non-HTTP errors (timeout, cancellation, network)
   */
  private categorizeError(
    error: unknown,
    latencyMs: number,
    timedOut: boolean,
    callerAborted: boolean
  ): RESTClientError {
    if (timedOut) {
      return new RESTClientError(
        `${this.providerName} request timed out after ${latencyMs}ms`,
        this.providerName,
        'TIMEOUT',
        undefined,
        error
      );
    }
    if (callerAborted) {
      return new RESTClientError(
        `${this.providerName} request aborted by caller`,
        this.providerName,
        'ABORTED',
        undefined,
        error
      );
    }
    return new RESTClientError(
      `${this.providerName} network error: ${error instanceof Error ? error.message : 'Unknown error'}`,
      this.providerName,
      'NETWORK',
      undefined,
      error
    );
  }
}
