import type { FontSpec } from '../surface/types';

/**
 * 20-colour categorical palette (vega `category20`, with #d62728 replaced by #d64c4c).
 */
export const defaultPalette = [
  '#aec7e8', '#c5b0d5', '#c49c94', '#dbdb8d', '#17becf',
  '#9edae5', '#f7b6d2', '#c7c7c7', '#1f77b4', '#ff7f0e',
  '#ffbb78', '#98df8a', '#d64c4c', '#2ca02c', '#9467bd',
  '#8c564b', '#ff9896', '#e377c2', '#7f7f7f', '#bcbd22',
] as const;

/**
 * Layout constants, in chart units.
 * X positions are fractions of `xmax`, Y positions fractions of `numBars`.
 */
export const defaultLayout = {
  xMarginRatio: 0.01,
  xExtentRatio: 1.2,
  yMarginRatio: 0.01,
  yExtentRatio: 1.25,
  titleX: 0.6,
  titleY: 1.2,
  axisLabelY: 1.1,
  tickLabelY: 1.02,
  gridLineBottom: 0.1,
  captionX: 1.15,
  captionY: 0.2,
  dataSourceX: 1.14,
  dataSourceY: 0.1,
  barHalfHeight: 0.4,
  barLabelGapRatio: 0.01,
  // Bar label size is ceil(barLabelScale / numBars).
  barLabelScale: 140,
} as const;

export const defaultFontSizes = {
  title: 24,
  axisLabel: 16,
  tickLabel: 12,
  dataSource: 14,
} as const satisfies Record<string, FontSpec['size']>;

/**
 * Caption size shrinks as the caption grows: up to `maxLength` characters use `size`.
 */
export const captionFontSteps = [
  { maxLength: 4, size: 100 },
  { maxLength: 8, size: 60 },
] as const;

export const captionFallbackFontSize = 40;

export const defaultFrameDelayMs = 50;

export const defaultOptions = {
  theme: 'light',
} as const;
