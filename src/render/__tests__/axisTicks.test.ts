import { describe, it, expect } from 'vitest';
import { formatThousands, generateTickValues, getUnits } from '../axisTicks';

describe('getUnits', () => {
  it('picks spacing from the 1-2-5 progression', () => {
    expect(getUnits(75)).toBe(10);
    expect(getUnits(19)).toBe(5);
    expect(getUnits(1999)).toBe(500);
    expect(getUnits(37)).toBe(5);
  });

  it('keeps units of 1 for small maxima', () => {
    expect(getUnits(1)).toBe(1);
    expect(getUnits(7)).toBe(1);
  });

  it('grows by 5/2 after 2, 20, 200', () => {
    expect(getUnits(8)).toBe(2);
    expect(getUnits(16)).toBe(5);
    expect(getUnits(160)).toBe(50);
    expect(getUnits(1600)).toBe(500);
  });

  it('handles large magnitudes', () => {
    expect(getUnits(37_468_000)).toBe(5_000_000);
  });

  it('falls back to 1 for non-positive or non-finite maxima', () => {
    expect(getUnits(0)).toBe(1);
    expect(getUnits(-10)).toBe(1);
    expect(getUnits(Number.POSITIVE_INFINITY)).toBe(1);
  });
});

describe('generateTickValues', () => {
  it('lists ticks from 0 up to xmax', () => {
    expect(generateTickValues(75)).toEqual([0, 10, 20, 30, 40, 50, 60, 70]);
    expect(generateTickValues(37)).toEqual([0, 5, 10, 15, 20, 25, 30, 35]);
  });

  it('includes xmax when it falls on a tick', () => {
    expect(generateTickValues(20, 5)).toEqual([0, 5, 10, 15, 20]);
  });

  it('returns no ticks for invalid input', () => {
    expect(generateTickValues(-1)).toEqual([]);
    expect(generateTickValues(10, 0)).toEqual([]);
  });
});

describe('formatThousands', () => {
  it('inserts comma separators', () => {
    expect(formatThousands(0)).toBe('0');
    expect(formatThousands(999)).toBe('999');
    expect(formatThousands(1000)).toBe('1,000');
    expect(formatThousands(1234567)).toBe('1,234,567');
  });
});
