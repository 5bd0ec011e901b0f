/**
 * bar-race - animated, sorted horizontal bar charts
 */

export const version = '1.0.0';

// Chart API
export { BarChart } from './BarChart';
export { Bar, compareBars } from './data/Bar';

// Errors
export { BarChartError } from './errors';
export type { BarChartErrorCode } from './errors';

// Options
export type {
  BarChartOptions,
  DatasetParseOptions,
  InvalidFramePolicy,
  LabelMode,
  PlaybackOptions,
} from './config/types';
export {
  captionFontSteps,
  defaultFontSizes,
  defaultFrameDelayMs,
  defaultLayout,
  defaultOptions,
  defaultPalette,
} from './config/defaults';
export { resolveOptions } from './config/OptionResolver';
export type { ResolvedBarChartOptions } from './config/OptionResolver';

// Themes
export type { ThemeConfig, ThemeName } from './themes/types';
export { darkTheme, lightTheme, getTheme } from './themes';

// Layout - Pure utilities
export { formatThousands, generateTickValues, getUnits } from './render/axisTicks';
export {
  computeXMax,
  getBarLabelFontSize,
  getCaptionFontSize,
  layoutBarChart,
} from './render/layoutBarChart';
export type { BarChartLayout, BarChartLayoutInput } from './render/layoutBarChart';
export { renderCommands } from './render/renderCommands';

// Surfaces
export type { DrawCommand, DrawCommandKind, DrawSurface, FontSpec, FontWeight, TextAnchor } from './surface/types';
export { createRecordingSurface } from './surface/createRecordingSurface';
export type { RecordingSurface, RecordingSurfaceOptions } from './surface/createRecordingSurface';
export { createCanvas2DSurface, toCssFont } from './surface/createCanvas2DSurface';
export type { Canvas2DContextLike, Canvas2DSurfaceOptions } from './surface/createCanvas2DSurface';
export { createSvgSurface, escapeXml, renderSvgDocument } from './surface/createSvgSurface';
export type { SvgSurfaceOptions } from './surface/createSvgSurface';
export { replayCommands } from './surface/replayCommands';
export type { PixelViewport, ReplayTarget, UserScale } from './surface/replayCommands';

// Data
export { parseDataset } from './data/parseDataset';
export type { Dataset, DatasetFrame, DatasetRow } from './data/parseDataset';

// Animation
export { drawFrame, playBarChartRace } from './animation/playBarChartRace';
export type { PlaybackResult } from './animation/playBarChartRace';
