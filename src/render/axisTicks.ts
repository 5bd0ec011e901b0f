/**
 * Axis tick utilities.
 *
 * @module axisTicks
 */

// floor(xmax / units) must drop below this for the spacing to settle.
const MAX_TICK_QUOTIENT = 8;

const thousandsFormatter = new Intl.NumberFormat('en-US', {
  maximumFractionDigits: 0,
  useGrouping: true,
});

/**
 * Tick spacing from the 1-2-5 progression (1, 2, 5, 10, 20, 50, ...) so that
 * at most 8 ticks span `[0, xmax]`.
 *
 * `units % 9 === 2` holds exactly for 2, 20, 200, ... within the progression,
 * and those are the steps that grow by 5/2 rather than by 2.
 */
export function getUnits(xmax: number): number {
  if (!Number.isFinite(xmax) || xmax <= 0) return 1;

  let units = 1;
  while (Math.floor(xmax / units) >= MAX_TICK_QUOTIENT) {
    if (units % 9 === 2) {
      units = (units * 5) / 2;
    } else {
      units = units * 2;
    }
  }
  return units;
}

/**
 * Tick positions `0, units, 2*units, ...` not exceeding `xmax`.
 */
export function generateTickValues(xmax: number, units: number = getUnits(xmax)): number[] {
  const ticks: number[] = [];
  if (!Number.isFinite(xmax) || xmax < 0 || !(units > 0)) return ticks;
  for (let unit = 0; unit <= xmax; unit += units) {
    ticks.push(unit);
  }
  return ticks;
}

/**
 * Formats an integer with `,` thousands separators (e.g. `1234567` → `"1,234,567"`).
 */
export const formatThousands = (value: number): string => thousandsFormatter.format(value);
