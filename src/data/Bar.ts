import { BarChartError, invalidArgument } from '../errors';

/**
 * One bar of a frame. Instances are frozen.
 */
export class Bar {
  readonly name: string;
  readonly value: number;
  readonly category: string;

  constructor(name: string, value: number, category: string) {
    if (typeof name !== 'string') throw invalidArgument('Bar', 'name is required');
    if (typeof category !== 'string') throw invalidArgument('Bar', 'category is required');
    if (!Number.isSafeInteger(value) || value < 0) {
      throw invalidArgument('Bar', `value must be a non-negative safe integer, got ${value}`);
    }

    this.name = name;
    this.value = value;
    this.category = category;
    Object.freeze(this);
  }

  /**
   * Descending order by value: negative when this bar is larger.
   */
  compareTo(other: Bar | null | undefined): number {
    if (other == null) {
      throw new BarChartError('Bar.compareTo: other bar is required', 'NULL_ERROR', 'compareTo');
    }
    return compareBars(this, other);
  }
}

export const compareBars = (a: Bar, b: Bar): number => {
  if (a.value > b.value) return -1;
  if (a.value < b.value) return 1;
  return 0;
};
