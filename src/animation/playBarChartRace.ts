import type { BarChart } from '../BarChart';
import { defaultFrameDelayMs } from '../config/defaults';
import type { PlaybackOptions } from '../config/types';
import type { DatasetFrame } from '../data/parseDataset';
import { BarChartError, invalidArgument, isPositiveInteger } from '../errors';
import type { DrawSurface } from '../surface/types';

export interface PlaybackResult {
  readonly framesDrawn: number;
  readonly framesSkipped: number;
}

/**
 * Draws one frame: clear, populate, sort, draw, present.
 * The chart is reset afterwards whether or not the frame succeeded.
 */
export function drawFrame(chart: BarChart, frame: DatasetFrame, surface: DrawSurface, numBars: number): void {
  try {
    surface.clear();
    chart.setCaption(frame.caption);
    for (const row of frame.rows) {
      chart.add(row.name, row.value, row.category);
    }
    chart.sortDescending();
    chart.draw(surface, numBars);
    surface.show();
  } finally {
    chart.reset();
  }
}

/**
 * Plays `frames` through `chart` onto `surface`, pausing between frames.
 *
 * Every frame must hold at least `numBars` rows.
 */
export async function playBarChartRace(
  chart: BarChart,
  frames: Iterable<DatasetFrame>,
  surface: DrawSurface,
  options: PlaybackOptions
): Promise<PlaybackResult> {
  const { numBars } = options;
  if (!isPositiveInteger(numBars)) {
    throw invalidArgument('playBarChartRace', `numBars must be a positive integer, got ${numBars}`);
  }
  const frameDelayMs = options.frameDelayMs ?? defaultFrameDelayMs;
  if (!Number.isFinite(frameDelayMs) || frameDelayMs < 0) {
    throw invalidArgument('playBarChartRace', `frameDelayMs must be a non-negative number, got ${frameDelayMs}`);
  }
  const onInvalidFrame = options.onInvalidFrame ?? 'abort';

  let framesDrawn = 0;
  let framesSkipped = 0;
  let index = 0;

  for (const frame of frames) {
    try {
      drawFrame(chart, frame, surface, numBars);
      framesDrawn++;
    } catch (err) {
      if (onInvalidFrame !== 'skip' || !(err instanceof BarChartError)) throw err;
      framesSkipped++;
      console.warn(`playBarChartRace: skipping frame ${index} ("${frame.caption}"):`, err.message);
    }
    index++;
    await surface.pause(frameDelayMs);
  }

  return { framesDrawn, framesSkipped };
}
