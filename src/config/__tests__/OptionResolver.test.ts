import { describe, it, expect } from 'vitest';
import { resolveOptions } from '../OptionResolver';
import { defaultPalette } from '../defaults';
import { darkTheme, lightTheme } from '../../themes';

describe('OptionResolver - theme', () => {
  it('defaults to the light theme and the 20-colour palette', () => {
    const resolved = resolveOptions();
    expect(resolved.theme.textColor).toBe(lightTheme.textColor);
    expect(resolved.theme.colorPalette).toEqual([...defaultPalette]);
    expect(resolved.theme.colorPalette.length).toBe(20);
  });

  it('keeps a single palette on the resolved theme', () => {
    expect(Object.keys(resolveOptions({ palette: ['#0a0a0a'] }))).toEqual(['theme']);
  });

  it('resolves theme names case-insensitively', () => {
    expect(resolveOptions({ theme: 'dark' }).theme.backgroundColor).toBe(darkTheme.backgroundColor);
    expect(resolveOptions({ theme: 'light' }).theme.backgroundColor).toBe(lightTheme.backgroundColor);
  });

  it('merges a partial theme over the light theme', () => {
    const resolved = resolveOptions({ theme: { textColor: ' #333333 ', fontFamily: '' } });
    expect(resolved.theme.textColor).toBe('#333333');
    expect(resolved.theme.fontFamily).toBe(lightTheme.fontFamily);
    expect(resolved.theme.gridLineColor).toBe(lightTheme.gridLineColor);
  });

  it('takes the palette from a partial theme', () => {
    const resolved = resolveOptions({ theme: { colorPalette: ['#010101', '#020202'] } });
    expect(resolved.theme.colorPalette).toEqual(['#010101', '#020202']);
  });
});

describe('OptionResolver - palette', () => {
  it('prefers an explicit palette over the theme', () => {
    const resolved = resolveOptions({ theme: { colorPalette: ['#010101'] }, palette: ['#0a0a0a'] });
    expect(resolved.theme.colorPalette).toEqual(['#0a0a0a']);
  });

  it('drops blank entries and falls back when nothing usable is left', () => {
    expect(resolveOptions({ palette: [' ', '#abcdef '] }).theme.colorPalette).toEqual(['#abcdef']);
    expect(resolveOptions({ palette: ['', '  '] }).theme.colorPalette).toEqual([...defaultPalette]);
  });
});
