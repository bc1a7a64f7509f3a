/**
 * Service Factory - wires adapters and services from an AppConfig
 */

import { AppConfig } from '../types/config';
import { TRACKED_INSTRUMENTS } from '../types/instrument';
import { CoinbasePriceAdapter, CoinGeckoPriceAdapter } from '../adapters/price';
import { GNewsAdapter, NewsApiAdapter } from '../adapters/news';
import { TelegramAdapter } from '../adapters/messaging/telegram-adapter';
import { Logger } from '../utils/logger';
import { MarketDataService } from './market-data';
import { HistoryService } from './history';
import { NewsService } from './news';
import { ChartRenderer } from './chart-renderer';
import { AnalysisService } from './analysis';
import { Clock, Scheduler, systemClock } from './scheduler';

export interface ReportServices {
  analysis: AnalysisService;
  scheduler: Scheduler;
  messenger: TelegramAdapter;
}

export function createReportServices(config: AppConfig, logger: Logger, clock: Clock = systemClock): ReportServices {
  const timeoutMs = config.http.timeoutMs;

  const coinbase = new CoinbasePriceAdapter({ apiEndpoint: config.endpoints.coinbase, timeoutMs });
  const coingecko = new CoinGeckoPriceAdapter({ apiEndpoint: config.endpoints.coingecko, timeoutMs });

  const messenger = new TelegramAdapter({
    apiEndpoint: config.endpoints.telegram,
    token: config.telegram.token,
    chatId: config.telegram.chatId,
    timeoutMs
  });

  const news = new NewsService({
    providers: [
      new NewsApiAdapter({ apiEndpoint: config.endpoints.newsApi, apiKey: config.news.newsApiKey, timeoutMs }),
      new GNewsAdapter({ apiEndpoint: config.endpoints.gnews, apiKey: config.news.gnewsApiKey, timeoutMs })
    ],
    logger: logger.child('News')
  });
  if (!news.hasConfiguredProvider()) {
    logger.warn('No news API key configured; reports will carry the no-news notice');
  }

  const analysis = new AnalysisService({
    config,
    marketData: new MarketDataService({
      priceProviders: [coinbase, coingecko],
      orderBookProvider: coinbase,
      logger: logger.child('MarketData'),
      now: () => clock.now()
    }),
    history: new HistoryService({
      provider: coingecko,
      smaWindow: config.analysis.smaWindow,
      rsiWindow: config.analysis.rsiWindow,
      logger: logger.child('History')
    }),
    news,
    chartRenderer: new ChartRenderer({
      timeZone: config.schedule.window.timeZone,
      logger: logger.child('Chart')
    }),
    messenger,
    logger: logger.child('Analysis'),
    now: () => clock.now()
  });

  const scheduler = new Scheduler({
    config: config.schedule,
    instruments: TRACKED_INSTRUMENTS,
    pipeline: analysis,
    messenger,
    clock,
    logger: logger.child('Scheduler')
  });

  return { analysis, scheduler, messenger };
}
