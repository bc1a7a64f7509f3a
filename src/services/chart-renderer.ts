/**
 * Chart Renderer - PNG chart of a price series
 *
 * Draws the price line, the SMA overlay and an RSI line on a 0-100 scale with
 * overbought/oversold guides. Rendering is best effort: an empty series or any
 * drawing error yields undefined, never an exception.
 */

import { createCanvas } from '@napi-rs/canvas';
import { formatInTimeZone } from 'date-fns-tz';
import { PriceSeries } from '../types/price';
import { IndicatorSeries } from '../types/indicator';
import { Logger, describeError, noopLogger } from '../utils/logger';
import {
  CHART_COLORS,
  PlotArea,
  ValueScale,
  drawBackground,
  drawGuideLine,
  drawLegend,
  drawPriceGrid,
  drawSeriesLine,
  drawTimeGrid,
  drawTitle,
  priceScale
} from './chart-drawing';
import { RSI_OVERBOUGHT, RSI_OVERSOLD } from './indicators';

export interface ChartOptions {
  /** Shown in the title, e.g. "BTC" */
  label: string;
  lookbackHours: number;
  smaSeries?: IndicatorSeries;
  smaWindow?: number;
  rsiSeries?: IndicatorSeries;
  rsiWindow?: number;
}

export interface ChartRendererOptions {
  timeZone: string;
  width?: number;
  height?: number;
  logger?: Logger;
}

const RSI_SCALE: ValueScale = { min: 0, max: 100 };

const compactPrice = new Intl.NumberFormat('en-US', { maximumFractionDigits: 2, minimumFractionDigits: 2 });

export class ChartRenderer {
  private readonly timeZone: string;
  private readonly width: number;
  private readonly height: number;
  private readonly logger: Logger;

  constructor(options: ChartRendererOptions) {
    this.timeZone = options.timeZone;
    this.width = options.width ?? 800;
    this.height = options.height ?? 400;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Render the chart
   *
   * @returns PNG bytes, or undefined for an empty series or a rendering failure
   */
  render(series: PriceSeries, options: ChartOptions): Buffer | undefined {
    if (series.length === 0) {
      return undefined;
    }

    try {
      return this.draw(series, options);
    } catch (error) {
      this.logger.warn(`Chart for ${options.label} not rendered: ${describeError(error)}`);
      return undefined;
    }
  }

  private draw(series: PriceSeries, options: ChartOptions): Buffer {
    const canvas = createCanvas(this.width, this.height);
    const ctx = canvas.getContext('2d');
    const area: PlotArea = {
      width: this.width,
      height: this.height,
      padding: { top: 40, right: 48, bottom: 36, left: 84 }
    };

    const prices = series.map((point) => point.price);
    const smaSeries = hasValues(options.smaSeries) ? options.smaSeries : undefined;
    const rsiSeries = hasValues(options.rsiSeries) ? options.rsiSeries : undefined;

    const scaleInputs = smaSeries
      ? prices.concat(smaSeries.filter((value): value is number => value !== undefined))
      : prices;
    const scale = priceScale(scaleInputs);

    drawBackground(ctx, area);
    drawTitle(ctx, area, `${options.label} - last ${options.lookbackHours}h`);
    drawPriceGrid(ctx, area, scale, (value) => `$${compactPrice.format(value)}`);
    drawTimeGrid(
      ctx,
      area,
      series.map((point) => formatInTimeZone(point.timestamp, this.timeZone, 'MMM d HH:mm'))
    );

    const legend: Array<{ label: string; color: string }> = [{ label: 'Price', color: CHART_COLORS.price }];

    if (rsiSeries) {
      drawGuideLine(ctx, area, RSI_SCALE, RSI_OVERBOUGHT, CHART_COLORS.overbought, `RSI ${RSI_OVERBOUGHT}`);
      drawGuideLine(ctx, area, RSI_SCALE, RSI_OVERSOLD, CHART_COLORS.oversold, `RSI ${RSI_OVERSOLD}`);
      drawSeriesLine(ctx, area, RSI_SCALE, rsiSeries, {
        color: CHART_COLORS.rsi,
        width: 1,
        dash: [6, 4],
        alpha: 0.5
      });
      legend.push({ label: `RSI${options.rsiWindow ?? ''}`, color: CHART_COLORS.rsi });
    }

    drawSeriesLine(ctx, area, scale, prices, { color: CHART_COLORS.price, width: 1.5 });

    if (smaSeries) {
      drawSeriesLine(ctx, area, scale, smaSeries, { color: CHART_COLORS.sma, width: 1.2 });
      legend.push({ label: `SMA${options.smaWindow ?? ''}`, color: CHART_COLORS.sma });
    }

    drawLegend(ctx, area, legend);

    return canvas.toBuffer('image/png');
  }
}

function hasValues(series: IndicatorSeries | undefined): series is IndicatorSeries {
  return series !== undefined && series.some((value) => value !== undefined);
}
