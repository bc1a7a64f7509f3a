/**
 * Canvas drawing primitives for report charts
 */

import { SKRSContext2D } from '@napi-rs/canvas';
import { IndicatorSeries } from '../types/indicator';

export interface ChartPadding {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

/**
 * Plot area geometry shared by every drawing call
 */
export interface PlotArea {
  width: number;
  height: number;
  padding: ChartPadding;
}

export interface ValueScale {
  min: number;
  max: number;
}

export const CHART_COLORS = {
  background: '#ffffff',
  grid: 'rgba(0, 0, 0, 0.08)',
  text: '#222222',
  price: '#1f4fd1',
  sma: '#f28c28',
  rsi: '#2e9e44',
  overbought: '#d62728',
  oversold: '#7b3fb5'
} as const;

export function plotWidth(area: PlotArea): number {
  return area.width - area.padding.left - area.padding.right;
}

export function plotHeight(area: PlotArea): number {
  return area.height - area.padding.top - area.padding.bottom;
}

/**
 * Price scale with a small margin so the line never touches the frame
 */
export function priceScale(values: number[]): ValueScale {
  const min = Math.min(...values);
  const max = Math.max(...values);
  const margin = max > min ? (max - min) * 0.05 : Math.max(Math.abs(max) * 0.01, 1);
  return { min: min - margin, max: max + margin };
}

export function xForIndex(area: PlotArea, index: number, count: number): number {
  if (count <= 1) {
    return area.padding.left + plotWidth(area) / 2;
  }
  return area.padding.left + (plotWidth(area) * index) / (count - 1);
}

export function yForValue(area: PlotArea, scale: ValueScale, value: number): number {
  return area.padding.top + ((scale.max - value) / (scale.max - scale.min)) * plotHeight(area);
}

export function drawBackground(ctx: SKRSContext2D, area: PlotArea) {
  ctx.fillStyle = CHART_COLORS.background;
  ctx.fillRect(0, 0, area.width, area.height);
}

export function drawTitle(ctx: SKRSContext2D, area: PlotArea, title: string) {
  ctx.fillStyle = CHART_COLORS.text;
  ctx.font = 'bold 16px sans-serif';
  ctx.textAlign = 'center'; ctx.textBaseline = 'middle';
  ctx.fillText(title, area.width / 2, area.padding.top / 2);
}

/**
 * Horizontal grid with price labels in the left gutter
 */
export function drawPriceGrid(ctx: SKRSContext2D, area: PlotArea, scale: ValueScale, formatPrice: (value: number) => string) {
  const numTicks = 5;

  ctx.strokeStyle = CHART_COLORS.grid; ctx.lineWidth = 1; ctx.setLineDash([]);
  ctx.font = '11px sans-serif'; ctx.fillStyle = CHART_COLORS.text;
  ctx.textAlign = 'right'; ctx.textBaseline = 'middle';

  for (let i = 0; i <= numTicks; i++) {
    const y = area.padding.top + (plotHeight(area) / numTicks) * i;
    ctx.beginPath(); ctx.moveTo(area.padding.left, y); ctx.lineTo(area.width - area.padding.right, y); ctx.stroke();

    const price = scale.max - ((scale.max - scale.min) / numTicks) * i;
    ctx.fillText(formatPrice(price), area.padding.left - 6, y);
  }
}

/**
 * Vertical grid with time labels under the plot
 */
export function drawTimeGrid(ctx: SKRSContext2D, area: PlotArea, labels: string[]) {
  if (labels.length === 0) return;

  const numLabels = Math.min(labels.length - 1, 6);
  ctx.strokeStyle = CHART_COLORS.grid; ctx.lineWidth = 1;
  ctx.font = '11px sans-serif'; ctx.fillStyle = CHART_COLORS.text;
  ctx.textAlign = 'center'; ctx.textBaseline = 'top';

  for (let i = 0; i <= numLabels; i++) {
    const index = numLabels === 0 ? 0 : Math.round((i / numLabels) * (labels.length - 1));
    const x = xForIndex(area, index, labels.length);
    ctx.beginPath(); ctx.moveTo(x, area.padding.top); ctx.lineTo(x, area.height - area.padding.bottom); ctx.stroke();
    ctx.fillText(labels[index], x, area.height - area.padding.bottom + 6);
  }
}

/**
 * Polyline through the defined values; gaps break the line
 */
export function drawSeriesLine(
  ctx: SKRSContext2D,
  area: PlotArea,
  scale: ValueScale,
  values: IndicatorSeries,
  style: { color: string; width: number; dash?: number[]; alpha?: number }
) {
  ctx.save();
  ctx.strokeStyle = style.color; ctx.lineWidth = style.width;
  ctx.setLineDash(style.dash ?? []); ctx.globalAlpha = style.alpha ?? 1;
  ctx.beginPath();

  let penDown = false;
  values.forEach((value, index) => {
    if (value === undefined) {
      penDown = false;
      return;
    }
    const x = xForIndex(area, index, values.length);
    const y = yForValue(area, scale, value);
    if (penDown) ctx.lineTo(x, y);
    else ctx.moveTo(x, y);
    penDown = true;
  });

  ctx.stroke();
  ctx.restore();
}

/**
 * Dotted horizontal guide with a label in the right gutter
 */
export function drawGuideLine(ctx: SKRSContext2D, area: PlotArea, scale: ValueScale, value: number, color: string, label: string) {
  const y = yForValue(area, scale, value);

  ctx.save();
  ctx.strokeStyle = color; ctx.lineWidth = 1; ctx.setLineDash([2, 3]);
  ctx.beginPath(); ctx.moveTo(area.padding.left, y); ctx.lineTo(area.width - area.padding.right, y); ctx.stroke();
  ctx.setLineDash([]);
  ctx.fillStyle = color; ctx.font = '10px sans-serif';
  ctx.textAlign = 'left'; ctx.textBaseline = 'middle';
  ctx.fillText(label, area.width - area.padding.right + 6, y);
  ctx.restore();
}

export function drawLegend(ctx: SKRSContext2D, area: PlotArea, entries: Array<{ label: string; color: string }>) {
  const x = area.padding.left + 10;
  let y = area.padding.top + 12;

  ctx.font = '11px sans-serif'; ctx.textAlign = 'left'; ctx.textBaseline = 'middle';
  for (const entry of entries) {
    ctx.fillStyle = entry.color;
    ctx.fillRect(x, y - 2, 16, 4);
    ctx.fillStyle = CHART_COLORS.text;
    ctx.fillText(entry.label, x + 22, y);
    y += 16;
  }
}
