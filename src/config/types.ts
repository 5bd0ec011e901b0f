import type { ThemeConfig, ThemeName } from '../themes/types';

/**
 * Options accepted by the `BarChart` constructor.
 */
export interface BarChartOptions {
  /**
   * Built-in theme name or a partial theme merged over the light theme.
   * Defaults to `'light'`.
   */
  readonly theme?: ThemeName | Partial<ThemeConfig>;
  /**
   * Category palette override. Categories take colours in first-seen order,
   * wrapping around when there are more categories than colours.
   */
  readonly palette?: ReadonlyArray<string>;
}

export type LabelMode = 'name' | 'name-and-region';

export interface DatasetParseOptions {
  /**
   * How a row's bar label is built. `'name-and-region'` yields `"name, region"`.
   * Defaults to `'name-and-region'`.
   */
  readonly labels?: LabelMode;
}

export type InvalidFramePolicy = 'abort' | 'skip';

export interface PlaybackOptions {
  /** Number of bars drawn per frame. */
  readonly numBars: number;
  /** Delay between presented frames. Default: 50ms. */
  readonly frameDelayMs?: number;
  /**
   * What to do when a frame fails validation.
   * - `'abort'` (default): rethrow and stop.
   * - `'skip'`: warn and continue with the next frame.
   */
  readonly onInvalidFrame?: InvalidFramePolicy;
}
