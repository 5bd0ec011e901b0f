import { describe, it, expect } from 'vitest';
import {
  computeXMax,
  getBarLabelFontSize,
  getCaptionFontSize,
  layoutBarChart,
  type BarChartLayoutInput,
} from '../layoutBarChart';
import { Bar } from '../../data/Bar';
import { darkTheme, lightTheme } from '../../themes';
import type { DrawCommand } from '../../surface/types';

function createInput(overrides: Partial<BarChartLayoutInput> = {}): BarChartLayoutInput {
  return {
    title: 'Most populous cities',
    xAxisLabel: 'Population (thousands)',
    dataSource: 'Source: test fixture',
    caption: '2018',
    bars: [new Bar('Tokyo', 37468, 'East Asia'), new Bar('Delhi', 28514, 'South Asia')],
    colorOf: new Map([
      ['East Asia', '#aec7e8'],
      ['South Asia', '#c5b0d5'],
    ]),
    maxValue: null,
    theme: lightTheme,
    ...overrides,
  };
}

const textAt = (commands: ReadonlyArray<DrawCommand>, text: string) =>
  commands.find((c): c is Extract<DrawCommand, { kind: 'text' }> => c.kind === 'text' && c.text === text);

/** Font in effect when the command at `index` runs. */
const fontBefore = (commands: ReadonlyArray<DrawCommand>, index: number) => {
  for (let i = index; i >= 0; i--) {
    const c = commands[i];
    if (c.kind === 'font') return c.font;
  }
  return null;
};

describe('getCaptionFontSize', () => {
  it('shrinks as the caption grows', () => {
    expect(getCaptionFontSize('')).toBe(100);
    expect(getCaptionFontSize('1950')).toBe(100);
    expect(getCaptionFontSize('12345')).toBe(60);
    expect(getCaptionFontSize('Jan 2020')).toBe(60);
    expect(getCaptionFontSize('January 2020')).toBe(40);
  });
});

describe('getBarLabelFontSize', () => {
  it('scales inversely with the bar count', () => {
    expect(getBarLabelFontSize(1)).toBe(140);
    expect(getBarLabelFontSize(3)).toBe(47);
    expect(getBarLabelFontSize(10)).toBe(14);
    expect(getBarLabelFontSize(12)).toBe(12);
  });
});

describe('computeXMax', () => {
  it('takes the largest value, or the override', () => {
    const bars = [new Bar('a', 3, 'x'), new Bar('b', 8, 'x'), new Bar('c', 5, 'x')];
    expect(computeXMax(bars, null)).toBe(8);
    expect(computeXMax(bars, 20)).toBe(20);
  });
});

describe('layoutBarChart', () => {
  it('fills the theme background first', () => {
    expect(layoutBarChart(createInput()).commands[0]).toEqual({ kind: 'background', color: '#ffffff' });
    const dark = layoutBarChart(createInput({ theme: darkTheme }));
    expect(dark.commands[0]).toEqual({ kind: 'background', color: '#1a1a2e' });
  });

  it('sets the coordinate scale before drawing', () => {
    const { commands, xmax } = layoutBarChart(createInput());
    expect(xmax).toBe(37468);
    const scale = commands[1];
    expect(scale.kind).toBe('scale');
    if (scale.kind === 'scale') {
      expect(scale.xMin).toBeCloseTo(-374.68);
      expect(scale.xMax).toBeCloseTo(44961.6);
      expect(scale.yMin).toBeCloseTo(-0.02);
      expect(scale.yMax).toBeCloseTo(2.5);
    }
  });

  it('places the title and axis label', () => {
    const { commands } = layoutBarChart(createInput());
    const title = textAt(commands, 'Most populous cities');
    expect(title?.anchor).toBe('middle');
    expect(title?.x).toBeCloseTo(22480.8);
    expect(title?.y).toBeCloseTo(2.4);

    const axis = textAt(commands, 'Population (thousands)');
    expect(axis?.anchor).toBe('start');
    expect(axis?.x).toBe(0);
    expect(axis?.y).toBeCloseTo(2.2);
  });

  it('formats tick labels with thousands separators', () => {
    const { commands, units, ticks } = layoutBarChart(createInput());
    expect(units).toBe(5000);
    expect(ticks).toEqual([0, 5000, 10000, 15000, 20000, 25000, 30000, 35000]);
    expect(textAt(commands, '35,000')?.y).toBeCloseTo(2.04);
    const lines = commands.filter((c) => c.kind === 'line');
    expect(lines[1]).toEqual({ kind: 'line', x0: 5000, y0: 0.1, x1: 5000, y1: 2 });
  });

  it('sizes the caption by its length', () => {
    const short = layoutBarChart(createInput({ caption: '2018' }));
    expect(short.captionFontSize).toBe(100);
    const long = layoutBarChart(createInput({ caption: 'Week 12 of 2018' }));
    expect(long.captionFontSize).toBe(40);

    const index = long.commands.findIndex((c) => c.kind === 'text' && c.text === 'Week 12 of 2018');
    expect(fontBefore(long.commands, index)).toEqual({ family: 'sans-serif', weight: 'bold', size: 40 });
    const caption = long.commands[index];
    expect(caption).toMatchObject({ anchor: 'end' });
  });

  it('draws each bar with its category colour and labels', () => {
    const { commands, barLabelFontSize } = layoutBarChart(createInput());
    expect(barLabelFontSize).toBe(70);

    const rects = commands.flatMap((c, i) => (c.kind === 'rect' ? [{ rect: c, color: commands[i - 1] }] : []));
    expect(rects).toEqual([
      {
        rect: { kind: 'rect', cx: 18734, cy: 1.5, halfWidth: 18734, halfHeight: 0.4 },
        color: { kind: 'color', color: '#aec7e8' },
      },
      {
        rect: { kind: 'rect', cx: 14257, cy: 0.5, halfWidth: 14257, halfHeight: 0.4 },
        color: { kind: 'color', color: '#c5b0d5' },
      },
    ]);

    const name = textAt(commands, 'Delhi');
    expect(name?.anchor).toBe('end');
    expect(name?.x).toBeCloseTo(28514 - 374.68);
    const nameIndex = commands.findIndex((c) => c === name);
    expect(fontBefore(commands, nameIndex)).toEqual({ family: 'sans-serif', weight: 'bold', size: 70 });

    const value = textAt(commands, '28,514');
    expect(value?.anchor).toBe('start');
    expect(value?.x).toBeCloseTo(28514 + 374.68);
    expect(value?.y).toBe(0.5);
  });

  it('uses theme colours and font family', () => {
    const { commands } = layoutBarChart(
      createInput({ theme: { ...lightTheme, fontFamily: 'Inter', gridLineColor: '#eeeeee' } })
    );
    const lineIndex = commands.findIndex((c) => c.kind === 'line');
    expect(commands[lineIndex - 1]).toEqual({ kind: 'color', color: '#eeeeee' });
    const fonts = commands.flatMap((c) => (c.kind === 'font' ? [c.font.family] : []));
    expect(new Set(fonts)).toEqual(new Set(['Inter']));
  });
});
