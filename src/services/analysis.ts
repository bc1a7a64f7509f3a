/**
 * Analysis Service - the per-instrument report pipeline
 *
 * market data + history -> indicators -> chart + news -> report -> delivery
 *
 * Data collection runs under a per-instrument deadline. When it fires,
 * in-flight provider calls are aborted and degrade to absent values, so a
 * slow provider delays the report but never blocks it. Delivery is outside
 * the deadline.
 */

import { formatInTimeZone } from 'date-fns-tz';
import { AppConfig } from '../types/config';
import { Instrument } from '../types/instrument';
import { AnalysisReport } from '../types/report';
import { MessageSender } from '../types/messaging';
import { Logger, describeError, noopLogger } from '../utils/logger';
import { MarketDataService } from './market-data';
import { HistoryService } from './history';
import { NewsService } from './news';
import { ChartRenderer } from './chart-renderer';
import { formatReport } from './report-formatter';

export const NO_CHART_TEXT = '(No chart available)';

export interface AnalysisServiceOptions {
  config: Pick<AppConfig, 'analysis' | 'news' | 'schedule'>;
  marketData: MarketDataService;
  history: HistoryService;
  news: NewsService;
  chartRenderer: ChartRenderer;
  messenger: MessageSender;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Outcome of delivering one report
 */
export interface DeliveryResult {
  textDelivered: boolean;
  chartDelivered: boolean;
}

export class AnalysisService {
  private readonly config: AnalysisServiceOptions['config'];
  private readonly marketData: MarketDataService;
  private readonly history: HistoryService;
  private readonly news: NewsService;
  private readonly chartRenderer: ChartRenderer;
  private readonly messenger: MessageSender;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: AnalysisServiceOptions) {
    this.config = options.config;
    this.marketData = options.marketData;
    this.history = options.history;
    this.news = options.news;
    this.chartRenderer = options.chartRenderer;
    this.messenger = options.messenger;
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? (() => new Date());
  }

  private get timeZone(): string {
    return this.config.schedule.window.timeZone;
  }

  /**
   * Collect data for one instrument and build its report
   *
   * @param signal - Cancels the whole pipeline (process shutdown)
   */
  async analyzeInstrument(instrument: Instrument, signal?: AbortSignal): Promise<AnalysisReport> {
    const { historyDays, smaWindow, rsiWindow, pipelineDeadlineMs } = this.config.analysis;
    const generatedAt = this.now();

    const deadline = AbortSignal.timeout(pipelineDeadlineMs);
    const dataSignal = signal ? AbortSignal.any([signal, deadline]) : deadline;

    const [price, orderBook, series] = await Promise.all([
      this.marketData.fetchPrice(instrument, dataSignal),
      this.marketData.fetchOrderBook(instrument, dataSignal),
      this.history.fetchHistory(instrument, historyDays, dataSignal)
    ]);

    const analysis = this.history.analyze(series, price);

    const chart = this.chartRenderer.render(series, {
      label: instrument.symbol,
      lookbackHours: historyDays * 24,
      smaSeries: analysis.smaSeries,
      smaWindow,
      rsiSeries: analysis.rsiSeries,
      rsiWindow
    });

    const news = await this.news.fetchNews(instrument, this.config.news.maxItems, dataSignal);

    if (deadline.aborted) {
      this.logger.warn(`Data collection for ${instrument.symbol} hit the ${pipelineDeadlineMs}ms deadline`);
    }

    return {
      instrument,
      generatedAt,
      timeZone: this.timeZone,
      price,
      orderBook,
      indicators: analysis.indicators,
      levels: analysis.levels,
      trend: analysis.trend,
      rsiStatus: analysis.rsiStatus,
      chart,
      news
    };
  }

  /**
   * Send the report text, then the chart (or a no-chart notice)
   *
   * Failures are logged and not retried; a failed text does not stop the chart.
   */
  async deliver(report: AnalysisReport): Promise<DeliveryResult> {
    const symbol = report.instrument.symbol;
    const text = formatReport(report, {
      smaWindow: this.config.analysis.smaWindow,
      rsiWindow: this.config.analysis.rsiWindow
    });

    let textDelivered = false;
    try {
      await this.messenger.sendMessage(text);
      textDelivered = true;
    } catch (error) {
      this.logger.error(`Report for ${symbol} not delivered: ${describeError(error)}`);
    }

    let chartDelivered = false;
    try {
      if (report.chart) {
        await this.messenger.sendPhoto(report.chart, `${symbol} chart`);
        chartDelivered = true;
      } else {
        await this.messenger.sendMessage(NO_CHART_TEXT);
      }
    } catch (error) {
      this.logger.error(`Chart for ${symbol} not delivered: ${describeError(error)}`);
    }

    return { textDelivered, chartDelivered };
  }

  /**
   * Analyse and deliver one instrument
   */
  async run(instrument: Instrument, signal?: AbortSignal): Promise<DeliveryResult | undefined> {
    const report = await this.analyzeInstrument(instrument, signal);

    if (signal?.aborted) {
      this.logger.info(`Skipping delivery for ${instrument.symbol}: shutting down`);
      return undefined;
    }

    const result = await this.deliver(report);
    if (result.textDelivered) {
      const timestamp = formatInTimeZone(report.generatedAt, this.timeZone, 'yyyy-MM-dd HH:mm:ss');
      this.logger.info(`Report sent for ${instrument.symbol} at ${timestamp}`);
    }
    return result;
  }
}
