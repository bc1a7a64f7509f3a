/**
 * Report Formatter - renders an AnalysisReport as a Telegram Markdown message
 *
 * Pure and total: absent values render as "N/A" (or their line is left out
 * where a placeholder adds nothing), and the output is never empty.
 */

import { formatInTimeZone } from 'date-fns-tz';
import { AnalysisReport } from '../types/report';
import { NO_NEWS_TEXT, NewsDigest } from '../types/news';
import { OrderBookSnapshot } from '../types/price';

export const NOT_AVAILABLE = 'N/A';

export const DISCLAIMER = '_This analysis is educational and is not financial advice._';

export interface FormatOptions {
  smaWindow?: number;
  rsiWindow?: number;
}

const usdFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2
});

const quantityFormat = new Intl.NumberFormat('en-US', {
  maximumFractionDigits: 8,
  useGrouping: false
});

/**
 * "$65,000.12"; thousands separators, exactly two decimals
 */
export function formatUsd(value: number): string {
  return `$${usdFormat.format(value)}`;
}

export function formatQuantity(value: number): string {
  return quantityFormat.format(value);
}

/**
 * Escape the characters that carry meaning in Telegram's legacy Markdown
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

export function formatReport(report: AnalysisReport, options: FormatOptions = {}): string {
  const smaWindow = options.smaWindow ?? 20;
  const rsiWindow = options.rsiWindow ?? 14;
  const symbol = escapeMarkdown(report.instrument.symbol);
  const timestamp = formatTimestamp(report.generatedAt, report.timeZone);
  const { sma, rsi } = report.indicators;

  const lines: string[] = [
    `📊 *EDUCATIONAL ANALYSIS - ${symbol}*`,
    `⏱ ${timestamp} (${escapeMarkdown(report.timeZone)})`,
    '',
    `💵 *Price:* ${report.price !== undefined ? formatUsd(report.price) : NOT_AVAILABLE}`,
    ...formatOrderBook(report.orderBook),
    `📐 *SMA${smaWindow}:* ${sma !== undefined ? formatUsd(sma) : NOT_AVAILABLE}`,
    rsi !== undefined
      ? `📉 *RSI${rsiWindow}:* ${rsi.toFixed(2)} (${report.rsiStatus})`
      : `📉 *RSI${rsiWindow}:* ${NOT_AVAILABLE}`
  ];

  if (report.levels) {
    lines.push(
      `💡 *Educational suggestion:* Buy ~ ${formatUsd(report.levels.buy)} - Sell ~ ${formatUsd(report.levels.sell)}`
    );
  }

  lines.push(
    `📈 Approximate trend: ${report.trend}`,
    '',
    formatNews(report.news),
    '',
    DISCLAIMER
  );

  return lines.join('\n');
}

function formatTimestamp(date: Date, timeZone: string): string {
  try {
    return formatInTimeZone(date, timeZone, 'yyyy-MM-dd HH:mm:ss');
  } catch {
    return Number.isNaN(date.getTime()) ? NOT_AVAILABLE : date.toISOString();
  }
}

function formatOrderBook(book: OrderBookSnapshot | undefined): string[] {
  if (!book || book.status === 'unavailable') {
    return [`📗 *Bid/Ask:* ${NOT_AVAILABLE}`];
  }
  return [
    `🟢 *Bid:* ${formatUsd(book.bid.price)} (qty: ${formatQuantity(book.bid.quantity)})`,
    `🔴 *Ask:* ${formatUsd(book.ask.price)} (qty: ${formatQuantity(book.ask.quantity)})`
  ];
}

/**
 * News block, or the no-news sentinel text
 */
export function formatNews(news: NewsDigest | undefined): string {
  if (!news || news.kind === 'none' || news.items.length === 0) {
    return `📰 ${NO_NEWS_TEXT}`;
  }

  const entries = news.items.map(
    (item) => `• ${escapeMarkdown(item.title)} (${escapeMarkdown(item.source)})\n  ${escapeMarkdown(item.url)}`
  );
  return ['📰 *Relevant news:*', ...entries].join('\n');
}
