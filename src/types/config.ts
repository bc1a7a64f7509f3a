/**
 * Application configuration, built once at startup and passed to every
 * component that needs it.
 */

import { LogLevel } from '../utils/logger';

/**
 * Wall-clock time of day in the schedule's time zone
 */
export interface TimeOfDay {
  hour: number;
  minute: number;
}

export interface ActiveWindow {
  timeZone: string;
  /** Inclusive */
  start: TimeOfDay;
  /** Inclusive at minute resolution: 21:30 covers 21:30:00-21:30:59 */
  end: TimeOfDay;
}

export interface ScheduleConfig {
  window: ActiveWindow;
  /** Delay past the top of the hour at which a tick fires */
  wakeOffsetMs: number;
  /** Floor on any computed sleep */
  minSleepMs: number;
}

export interface ProviderEndpoints {
  coinbase: string;
  coingecko: string;
  newsApi: string;
  gnews: string;
  telegram: string;
}

export interface AppConfig {
  telegram: {
    token: string;
    chatId: number;
  };
  news: {
    newsApiKey?: string;
    gnewsApiKey?: string;
    maxItems: number;
  };
  server: {
    port: number;
  };
  http: {
    /** Per outbound request */
    timeoutMs: number;
  };
  analysis: {
    historyDays: number;
    smaWindow: number;
    rsiWindow: number;
    /** Upper bound on data collection for one instrument */
    pipelineDeadlineMs: number;
  };
  schedule: ScheduleConfig;
  endpoints: ProviderEndpoints;
  logLevel: LogLevel;
}
