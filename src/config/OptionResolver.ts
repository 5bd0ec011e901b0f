import type { BarChartOptions } from './types';
import { defaultOptions, defaultPalette } from './defaults';
import { getTheme } from '../themes';
import type { ThemeConfig } from '../themes/types';

export interface ResolvedBarChartOptions {
  /** `theme.colorPalette` is never empty. */
  readonly theme: ThemeConfig;
}

const sanitizePalette = (palette: unknown): string[] => {
  if (!Array.isArray(palette)) return [];
  return palette
    .filter((c): c is string => typeof c === 'string')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
};

const resolveTheme = (themeInput: BarChartOptions['theme'] | null): ThemeConfig => {
  const base = getTheme(defaultOptions.theme);

  if (typeof themeInput === 'string') {
    const name = themeInput.trim().toLowerCase();
    return name === 'dark' ? getTheme('dark') : getTheme('light');
  }

  // runtime safety for JS callers
  if (themeInput == null || typeof themeInput !== 'object' || Array.isArray(themeInput)) {
    return base;
  }

  const input: Partial<Record<keyof ThemeConfig, unknown>> = themeInput;
  const takeString = (key: keyof ThemeConfig): string | undefined => {
    const v = input[key];
    if (typeof v !== 'string') return undefined;
    const trimmed = v.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  };

  const colorPaletteCandidate = sanitizePalette(input.colorPalette);

  return {
    backgroundColor: takeString('backgroundColor') ?? base.backgroundColor,
    textColor: takeString('textColor') ?? base.textColor,
    axisLabelColor: takeString('axisLabelColor') ?? base.axisLabelColor,
    gridLineColor: takeString('gridLineColor') ?? base.gridLineColor,
    annotationColor: takeString('annotationColor') ?? base.annotationColor,
    valueLabelColor: takeString('valueLabelColor') ?? base.valueLabelColor,
    colorPalette: colorPaletteCandidate.length > 0 ? colorPaletteCandidate : Array.from(base.colorPalette),
    fontFamily: takeString('fontFamily') ?? base.fontFamily,
  };
};

export function resolveOptions(userOptions: BarChartOptions = {}): ResolvedBarChartOptions {
  const baseTheme = resolveTheme(userOptions.theme);

  // An explicit palette wins over the theme's.
  const paletteOverride = sanitizePalette(userOptions.palette);
  const paletteFromTheme = sanitizePalette(baseTheme.colorPalette);
  const palette =
    paletteOverride.length > 0
      ? paletteOverride
      : paletteFromTheme.length > 0
        ? paletteFromTheme
        : Array.from(defaultPalette);

  return {
    theme: { ...baseTheme, colorPalette: palette },
  };
}
