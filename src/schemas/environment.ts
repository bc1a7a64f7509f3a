/**
 * JSON Schema for the process environment.
 * Values arrive as strings; numeric fields are coerced during validation.
 */

import { LogLevel } from '../utils/logger';

export interface EnvironmentOutput {
  TOKEN: string;
  CHAT_ID: number;
  NEWS_API_KEY?: string;
  GNEWS_API_KEY?: string;
  PORT: number;
  TIMEZONE: string;
  HTTP_TIMEOUT_MS: number;
  PIPELINE_DEADLINE_MS: number;
  LOG_LEVEL: LogLevel;
}

export const EnvironmentSchema = {
  type: 'object',
  required: ['TOKEN', 'CHAT_ID'],
  properties: {
    TOKEN: { type: 'string', minLength: 1 },
    CHAT_ID: { type: 'integer' },
    NEWS_API_KEY: { type: 'string', minLength: 1 },
    GNEWS_API_KEY: { type: 'string', minLength: 1 },
    PORT: { type: 'integer', minimum: 1, maximum: 65535, default: 8000 },
    TIMEZONE: { type: 'string', minLength: 1, default: 'America/Bogota' },
    HTTP_TIMEOUT_MS: { type: 'integer', minimum: 100, default: 8000 },
    PIPELINE_DEADLINE_MS: { type: 'integer', minimum: 1000, default: 45000 },
    LOG_LEVEL: { type: 'string', enum: ['debug', 'info', 'warn', 'error'], default: 'info' }
  }
} as const;
