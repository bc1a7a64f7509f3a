import * as fc from 'fast-check';
import {
  DISCLAIMER,
  escapeMarkdown,
  formatNews,
  formatQuantity,
  formatReport,
  formatUsd
} from './report-formatter';
import { AnalysisReport } from '../types/report';
import { NO_NEWS } from '../types/news';
import { TRACKED_INSTRUMENTS } from '../types/instrument';
import { instrumentArb, newsItemArb, priceArb } from '../test/generators';

const [bitcoin, ethereum] = TRACKED_INSTRUMENTS;
const generatedAt = new Date('2024-05-01T15:00:00.000Z');

function baseReport(overrides: Partial<AnalysisReport> = {}): AnalysisReport {
  return {
    instrument: bitcoin,
    generatedAt,
    timeZone: 'America/Bogota',
    indicators: {},
    trend: 'N/A',
    rsiStatus: 'N/A',
    ...overrides
  };
}

describe('Report formatter', () => {
  describe('formatUsd', () => {
    it('should use thousands separators and two decimals', () => {
      expect(formatUsd(65000.12)).toBe('$65,000.12');
      expect(formatUsd(0.5)).toBe('$0.50');
      expect(formatUsd(1234567.891)).toBe('$1,234,567.89');
    });
  });

  describe('formatQuantity', () => {
    it('should print up to eight decimals without grouping', () => {
      expect(formatQuantity(1.2)).toBe('1.2');
      expect(formatQuantity(12000)).toBe('12000');
      expect(formatQuantity(0.123456789)).toBe('0.12345679');
    });
  });

  describe('escapeMarkdown', () => {
    it('should escape Markdown control characters', () => {
      expect(escapeMarkdown('a_b*c`d[e]')).toBe('a\\_b\\*c\\`d\\[e]');
    });
  });

  describe('formatReport', () => {
    it('should render a report with missing indicators', () => {
      const text = formatReport(baseReport({
        price: 65000.12,
        orderBook: {
          status: 'available',
          bid: { price: 65000, quantity: 1.2 },
          ask: { price: 65001, quantity: 0.8 },
          fetchedAt: generatedAt
        },
        levels: { buy: 65280, sell: 63602 },
        news: NO_NEWS
      }));

      expect(text).toBe([
        '📊 *EDUCATIONAL ANALYSIS - BTC*',
        '⏱ 2024-05-01 10:00:00 (America/Bogota)',
        '',
        '💵 *Price:* $65,000.12',
        '🟢 *Bid:* $65,000.00 (qty: 1.2)',
        '🔴 *Ask:* $65,001.00 (qty: 0.8)',
        '📐 *SMA20:* N/A',
        '📉 *RSI14:* N/A',
        '💡 *Educational suggestion:* Buy ~ $65,280.00 - Sell ~ $63,602.00',
        '📈 Approximate trend: N/A',
        '',
        '📰 No relevant news available.',
        '',
        DISCLAIMER
      ].join('\n'));
    });

    it('should render indicators, classifications and news', () => {
      const text = formatReport(
        baseReport({
          instrument: ethereum,
          price: 3100,
          orderBook: { status: 'unavailable', reason: 'timeout', fetchedAt: generatedAt },
          indicators: { sma: 3050.5, rsi: 55.123 },
          trend: 'Bullish',
          rsiStatus: 'Neutral',
          news: {
            kind: 'items',
            provider: 'gnews',
            items: [{ title: 'ETF_flows hit record', source: 'CoinDesk', url: 'https://news.test/etf' }]
          }
        }),
        { smaWindow: 20, rsiWindow: 14 }
      );

      expect(text.split('\n')).toEqual([
        '📊 *EDUCATIONAL ANALYSIS - ETH*',
        '⏱ 2024-05-01 10:00:00 (America/Bogota)',
        '',
        '💵 *Price:* $3,100.00',
        '📗 *Bid/Ask:* N/A',
        '📐 *SMA20:* $3,050.50',
        '📉 *RSI14:* 55.12 (Neutral)',
        '📈 Approximate trend: Bullish',
        '',
        '📰 *Relevant news:*',
        '• ETF\\_flows hit record (CoinDesk)',
        '  https://news.test/etf',
        '',
        DISCLAIMER
      ]);
    });

    it('should render an entirely empty report without throwing', () => {
      const lines = formatReport(baseReport()).split('\n');

      expect(lines).toContain('💵 *Price:* N/A');
      expect(lines).toContain('📗 *Bid/Ask:* N/A');
      expect(lines).toContain('📰 No relevant news available.');
      expect(lines.some((line) => line.startsWith('💡'))).toBe(false);
    });

    it('should never produce an empty message or a NaN', () => {
      fc.assert(
        fc.property(
          instrumentArb(),
          fc.option(priceArb(), { nil: undefined }),
          fc.option(fc.double({ min: 0, max: 100, noNaN: true }), { nil: undefined }),
          (instrument, price, rsi) => {
            const text = formatReport(baseReport({ instrument, price, indicators: { rsi } }));
            expect(text.length).toBeGreaterThan(0);
            expect(text).not.toContain('NaN');
            expect(text.endsWith(DISCLAIMER)).toBe(true);
          }
        ),
        { numRuns: 100 }
      );
    });
  });

  describe('formatNews', () => {
    it('should render one title line and one URL line per item', () => {
      fc.assert(
        fc.property(fc.array(newsItemArb(), { minLength: 1, maxLength: 3 }), (items) => {
          const lines = formatNews({ kind: 'items', provider: 'newsapi', items }).split('\n');
          expect(lines[0]).toBe('📰 *Relevant news:*');
          expect(lines).toHaveLength(1 + items.length * 2);
          items.forEach((item, i) => {
            expect(lines[1 + i * 2]).toBe(`• ${escapeMarkdown(item.title)} (${escapeMarkdown(item.source)})`);
          });
        }),
        { numRuns: 100 }
      );
    });

    it('should treat an empty item list as no news', () => {
      expect(formatNews({ kind: 'items', provider: 'newsapi', items: [] })).toBe('📰 No relevant news available.');
    });
  });
});
