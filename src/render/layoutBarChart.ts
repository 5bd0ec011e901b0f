/**
 * Frame layout for the bar chart.
 *
 * Turns one frame's state into the display list the engine sends to a
 * `DrawSurface`. Pure: no surface access, so a frame is fully laid out (and
 * validated) before the first primitive is drawn.
 *
 * @module layoutBarChart
 */

import type { Bar } from '../data/Bar';
import type { ThemeConfig } from '../themes/types';
import type { DrawCommand, FontWeight } from '../surface/types';
import { captionFallbackFontSize, captionFontSteps, defaultFontSizes, defaultLayout } from '../config/defaults';
import { formatThousands, generateTickValues, getUnits } from './axisTicks';

export interface BarChartLayoutInput {
  readonly title: string;
  readonly xAxisLabel: string;
  readonly dataSource: string;
  readonly caption: string;
  /** Bars to draw, top to bottom. Must be non-empty. */
  readonly bars: ReadonlyArray<Bar>;
  readonly colorOf: ReadonlyMap<string, string>;
  /** Fixed axis maximum; `null` derives it from `bars`. */
  readonly maxValue: number | null;
  readonly theme: ThemeConfig;
}

export interface BarChartLayout {
  readonly xmax: number;
  readonly units: number;
  readonly ticks: ReadonlyArray<number>;
  readonly barLabelFontSize: number;
  readonly captionFontSize: number;
  readonly commands: ReadonlyArray<DrawCommand>;
}

export function getCaptionFontSize(caption: string): number {
  for (const step of captionFontSteps) {
    if (caption.length <= step.maxLength) return step.size;
  }
  return captionFallbackFontSize;
}

export const getBarLabelFontSize = (numBars: number): number => Math.ceil(defaultLayout.barLabelScale / numBars);

export function computeXMax(bars: ReadonlyArray<Bar>, maxValue: number | null): number {
  if (maxValue !== null) return maxValue;
  let xmax = Number.NEGATIVE_INFINITY;
  for (const bar of bars) {
    if (bar.value > xmax) xmax = bar.value;
  }
  return xmax;
}

export function layoutBarChart(input: BarChartLayoutInput): BarChartLayout {
  const { title, xAxisLabel, dataSource, caption, bars, colorOf, theme } = input;
  const L = defaultLayout;
  const numBars = bars.length;
  const xmax = computeXMax(bars, input.maxValue);
  const units = getUnits(xmax);
  const ticks = generateTickValues(xmax, units);
  const barLabelFontSize = getBarLabelFontSize(numBars);
  const captionFontSize = getCaptionFontSize(caption);

  const commands: DrawCommand[] = [];
  const color = (c: string): void => {
    commands.push({ kind: 'color', color: c });
  };
  const font = (weight: FontWeight, size: number): void => {
    commands.push({ kind: 'font', font: { family: theme.fontFamily, weight, size } });
  };

  commands.push({ kind: 'background', color: theme.backgroundColor });
  commands.push({
    kind: 'scale',
    xMin: -L.xMarginRatio * xmax,
    xMax: L.xExtentRatio * xmax,
    yMin: -L.yMarginRatio * numBars,
    yMax: L.yExtentRatio * numBars,
  });

  color(theme.textColor);
  font('bold', defaultFontSizes.title);
  commands.push({ kind: 'text', x: L.titleX * xmax, y: L.titleY * numBars, text: title, anchor: 'middle' });

  color(theme.axisLabelColor);
  font('plain', defaultFontSizes.axisLabel);
  commands.push({ kind: 'text', x: 0, y: L.axisLabelY * numBars, text: xAxisLabel, anchor: 'start' });

  font('plain', defaultFontSizes.tickLabel);
  for (const tick of ticks) {
    color(theme.axisLabelColor);
    commands.push({ kind: 'text', x: tick, y: L.tickLabelY * numBars, text: formatThousands(tick), anchor: 'middle' });
    color(theme.gridLineColor);
    commands.push({ kind: 'line', x0: tick, y0: L.gridLineBottom, x1: tick, y1: numBars });
  }

  color(theme.annotationColor);
  font('bold', captionFontSize);
  commands.push({ kind: 'text', x: L.captionX * xmax, y: L.captionY * numBars, text: caption, anchor: 'end' });

  font('plain', defaultFontSizes.dataSource);
  commands.push({ kind: 'text', x: L.dataSourceX * xmax, y: L.dataSourceY * numBars, text: dataSource, anchor: 'end' });

  const gap = L.barLabelGapRatio * xmax;
  bars.forEach((bar, i) => {
    const row = numBars - i - 0.5;
    color(colorOf.get(bar.category) ?? theme.textColor);
    commands.push({ kind: 'rect', cx: 0.5 * bar.value, cy: row, halfWidth: 0.5 * bar.value, halfHeight: L.barHalfHeight });

    color(theme.textColor);
    font('bold', barLabelFontSize);
    commands.push({ kind: 'text', x: bar.value - gap, y: row, text: bar.name, anchor: 'end' });

    font('plain', barLabelFontSize);
    color(theme.valueLabelColor);
    commands.push({ kind: 'text', x: bar.value + gap, y: row, text: formatThousands(bar.value), anchor: 'start' });
  });

  return { xmax, units, ticks, barLabelFontSize, captionFontSize, commands };
}
