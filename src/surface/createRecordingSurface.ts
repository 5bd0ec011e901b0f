import type { DrawCommand, DrawSurface } from './types';

export interface RecordingSurfaceOptions {
  /** Called by `show()` with the frame's commands. */
  readonly onShow?: (commands: ReadonlyArray<DrawCommand>) => void;
  /** Pacing implementation. Default: resolves immediately. */
  readonly pause?: (ms: number) => Promise<void>;
}

/**
 * A surface that keeps a display list instead of drawing.
 */
export interface RecordingSurface extends DrawSurface {
  /** Commands issued since the last `clear()`. */
  readonly commands: ReadonlyArray<DrawCommand>;
  /** Command lists of every presented frame, oldest first. */
  readonly frames: ReadonlyArray<ReadonlyArray<DrawCommand>>;
  /** Every delay passed to `pause()`, in call order. */
  readonly pauses: ReadonlyArray<number>;
}

export function createRecordingSurface(options?: RecordingSurfaceOptions): RecordingSurface {
  let commands: DrawCommand[] = [];
  const frames: Array<ReadonlyArray<DrawCommand>> = [];
  const pauses: number[] = [];

  const record = (command: DrawCommand): void => {
    commands.push(command);
  };

  return {
    get commands() {
      return commands;
    },
    get frames() {
      return frames;
    },
    get pauses() {
      return pauses;
    },
    background(color) {
      record({ kind: 'background', color });
    },
    setScale(xMin, xMax, yMin, yMax) {
      record({ kind: 'scale', xMin, xMax, yMin, yMax });
    },
    setPenColor(color) {
      record({ kind: 'color', color });
    },
    setFont(font) {
      record({ kind: 'font', font });
    },
    text(x, y, text, anchor) {
      record({ kind: 'text', x, y, text, anchor });
    },
    filledRectangle(cx, cy, halfWidth, halfHeight) {
      record({ kind: 'rect', cx, cy, halfWidth, halfHeight });
    },
    line(x0, y0, x1, y1) {
      record({ kind: 'line', x0, y0, x1, y1 });
    },
    clear() {
      commands = [];
    },
    show() {
      const frame = commands.slice();
      frames.push(frame);
      options?.onShow?.(frame);
    },
    pause(ms) {
      pauses.push(ms);
      return options?.pause ? options.pause(ms) : Promise.resolve();
    },
  };
}
