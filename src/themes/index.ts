import { defaultPalette } from '../config/defaults';
import type { ThemeConfig, ThemeName } from './types';

export const lightTheme: ThemeConfig = {
  backgroundColor: '#ffffff',
  textColor: '#000000',
  axisLabelColor: '#808080',
  gridLineColor: '#e6e6e6',
  annotationColor: '#c0c0c0',
  valueLabelColor: '#404040',
  colorPalette: [...defaultPalette],
  fontFamily: 'sans-serif',
};

export const darkTheme: ThemeConfig = {
  backgroundColor: '#1a1a2e',
  textColor: '#e0e0e0',
  axisLabelColor: '#9a9a9a',
  gridLineColor: '#2e2e45',
  annotationColor: '#55556a',
  valueLabelColor: '#c8c8c8',
  colorPalette: [...defaultPalette],
  fontFamily: 'sans-serif',
};

export function getTheme(name: ThemeName): ThemeConfig {
  return name === 'dark' ? darkTheme : lightTheme;
}

export type { ThemeConfig, ThemeName } from './types';
