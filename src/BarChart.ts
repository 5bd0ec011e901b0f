import { Bar, compareBars } from './data/Bar';
import { invalidArgument, isPositiveInteger } from './errors';
import { resolveOptions } from './config/OptionResolver';
import type { ResolvedBarChartOptions } from './config/OptionResolver';
import type { BarChartOptions } from './config/types';
import { layoutBarChart } from './render/layoutBarChart';
import type { BarChartLayout } from './render/layoutBarChart';
import { renderCommands } from './render/renderCommands';
import type { DrawSurface } from './surface/types';

const requireString = (operation: string, field: string, value: unknown): string => {
  if (typeof value !== 'string') throw invalidArgument(operation, `${field} is required`);
  return value;
};

/**
 * Sorted horizontal bar chart, redrawn once per animation frame.
 *
 * Frame state (bars, caption) is cleared by `reset()`. Category colours, the
 * chart's labels and the max-value override live as long as the instance, so
 * a category keeps its colour across every frame.
 */
export class BarChart {
  readonly title: string;
  readonly xAxisLabel: string;
  readonly dataSource: string;

  private readonly resolvedOptions: ResolvedBarChartOptions;
  private readonly colors = new Map<string, string>();
  private currentBars: Bar[] = [];
  private currentCaption = '';
  private fixedMaxValue: number | null = null;

  constructor(title: string, xAxisLabel: string, dataSource: string, options?: BarChartOptions) {
    this.title = requireString('BarChart', 'title', title);
    this.xAxisLabel = requireString('BarChart', 'x-axis label', xAxisLabel);
    this.dataSource = requireString('BarChart', 'data source', dataSource);
    this.resolvedOptions = resolveOptions(options);
    this.reset();
  }

  get caption(): string {
    return this.currentCaption;
  }

  /** Current frame's bars, in insertion order until `sortDescending()`. */
  get bars(): ReadonlyArray<Bar> {
    return this.currentBars;
  }

  /** Category colours in first-seen order. */
  get colorOf(): ReadonlyMap<string, string> {
    return this.colors;
  }

  get maxValue(): number | null {
    return this.fixedMaxValue;
  }

  get options(): ResolvedBarChartOptions {
    return this.resolvedOptions;
  }

  getColor(category: string): string | undefined {
    return this.colors.get(category);
  }

  /**
   * Fixes the x-axis maximum instead of deriving it from each frame.
   */
  setMaxValue(maxValue: number): void {
    if (!isPositiveInteger(maxValue)) {
      throw invalidArgument('setMaxValue', `maximum value must be a positive integer, got ${maxValue}`);
    }
    this.fixedMaxValue = maxValue;
  }

  clearMaxValue(): void {
    this.fixedMaxValue = null;
  }

  /**
   * Sets the large annotation drawn in the lower right (e.g. the frame's year).
   */
  setCaption(caption: string): void {
    this.currentCaption = requireString('setCaption', 'caption', caption);
  }

  add(name: string, value: number, category: string): void {
    requireString('add', 'name', name);
    requireString('add', 'category', category);
    if (!isPositiveInteger(value)) {
      throw invalidArgument('add', `value must be a positive integer, got ${value}`);
    }

    if (!this.colors.has(category)) {
      const palette = this.resolvedOptions.theme.colorPalette;
      this.colors.set(category, palette[this.colors.size % palette.length]);
    }
    this.currentBars.push(new Bar(name, value, category));
  }

  /**
   * Clears the frame's bars and caption.
   */
  reset(): void {
    this.currentBars = [];
    this.currentCaption = '';
  }

  /**
   * Stable sort, largest value first. Call after the frame's last `add()` and
   * before `draw()`: row 0 is drawn at the top.
   */
  sortDescending(): void {
    this.currentBars.sort(compareBars);
  }

  /**
   * Lays out the first `numBars` bars without drawing.
   * Returns `null` for an empty frame.
   */
  layout(numBars: number): BarChartLayout | null {
    if (this.currentBars.length === 0) return null;
    if (!isPositiveInteger(numBars) || numBars > this.currentBars.length) {
      throw invalidArgument(
        'draw',
        `numBars must be an integer in [1, ${this.currentBars.length}], got ${numBars}`
      );
    }

    return layoutBarChart({
      title: this.title,
      xAxisLabel: this.xAxisLabel,
      dataSource: this.dataSource,
      caption: this.currentCaption,
      bars: this.currentBars.slice(0, numBars),
      colorOf: this.colors,
      maxValue: this.fixedMaxValue,
      theme: this.resolvedOptions.theme,
    });
  }

  /**
   * Draws the first `numBars` bars of the current frame. An empty frame draws nothing.
   */
  draw(surface: DrawSurface, numBars: number): void {
    const layout = this.layout(numBars);
    if (!layout) return;
    renderCommands(surface, layout.commands);
  }
}
