/**
 * Configuration Service - builds the AppConfig from the process environment
 *
 * Required values are validated up front so a misconfigured deployment fails
 * before the server or the scheduling loop start.
 */

import { AppConfig } from '../types/config';
import { EnvironmentOutput, EnvironmentSchema } from '../schemas/environment';
import { SchemaValidationError, SchemaValidator, formatValidationErrors } from './schema-validator';

/**
 * Error thrown when the environment does not describe a usable configuration
 */
export class ConfigurationError extends Error {
  constructor(public readonly errors: SchemaValidationError[]) {
    super(`Invalid configuration: ${formatValidationErrors(errors)}`);
    this.name = 'ConfigurationError';
  }
}

export const DEFAULT_ENDPOINTS = {
  coinbase: 'https://api.exchange.coinbase.com',
  coingecko: 'https://api.coingecko.com/api/v3',
  newsApi: 'https://newsapi.org/v2',
  gnews: 'https://gnews.io/api/v4',
  telegram: 'https://api.telegram.org'
} as const;

const ENV_KEYS = Object.keys(EnvironmentSchema.properties);

const validateEnvironment = new SchemaValidator({ coerceTypes: true, useDefaults: true })
  .compile<EnvironmentOutput>(EnvironmentSchema);

/**
 * Check that a string names a time zone known to the runtime's ICU data
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Load configuration from an environment map
 *
 * Empty strings count as unset.
 *
 * @throws ConfigurationError listing every invalid or missing field
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw: Record<string, unknown> = {};
  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      raw[key] = value.trim();
    }
  }

  const result = validateEnvironment(raw);
  if (!result.valid) {
    throw new ConfigurationError(result.errors);
  }

  const values = result.value;
  if (!isValidTimeZone(values.TIMEZONE)) {
    throw new ConfigurationError([{
      path: '/TIMEZONE',
      message: `unknown time zone "${values.TIMEZONE}"`,
      keyword: 'timezone',
      params: {}
    }]);
  }

  const config: AppConfig = {
    telegram: {
      token: values.TOKEN,
      chatId: values.CHAT_ID
    },
    news: {
      newsApiKey: values.NEWS_API_KEY,
      gnewsApiKey: values.GNEWS_API_KEY,
      maxItems: 3
    },
    server: {
      port: values.PORT
    },
    http: {
      timeoutMs: values.HTTP_TIMEOUT_MS
    },
    analysis: {
      historyDays: 3,
      smaWindow: 20,
      rsiWindow: 14,
      pipelineDeadlineMs: values.PIPELINE_DEADLINE_MS
    },
    schedule: {
      window: {
        timeZone: values.TIMEZONE,
        start: { hour: 6, minute: 0 },
        end: { hour: 21, minute: 30 }
      },
      wakeOffsetMs: 5000,
      minSleepMs: 60000
    },
    endpoints: { ...DEFAULT_ENDPOINTS },
    logLevel: values.LOG_LEVEL
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}
