/**
 * Theme configuration types.
 */

export type ThemeName = 'light' | 'dark';

export interface ThemeConfig {
  readonly backgroundColor: string;
  readonly textColor: string;
  /** X-axis label and tick labels. */
  readonly axisLabelColor: string;
  readonly gridLineColor: string;
  /** Caption and data source acknowledgment. */
  readonly annotationColor: string;
  readonly valueLabelColor: string;
  readonly colorPalette: string[];
  readonly fontFamily: string;
}
