import { createRecordingSurface } from './createRecordingSurface';
import { replayCommands } from './replayCommands';
import type { DrawCommand, DrawSurface, FontSpec, TextAnchor } from './types';

/**
 * The subset of `CanvasRenderingContext2D` the surface draws with.
 * Browser contexts and Node canvas implementations both satisfy it.
 */
export interface Canvas2DContextLike {
  fillStyle: string | object;
  strokeStyle: string | object;
  font: string;
  textAlign: string;
  textBaseline: string;
  lineWidth: number;
  fillRect(x: number, y: number, width: number, height: number): void;
  fillText(text: string, x: number, y: number): void;
  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  stroke(): void;
}

export interface Canvas2DSurfaceOptions {
  /** Canvas width in pixels. */
  readonly width: number;
  /** Canvas height in pixels. */
  readonly height: number;
  /** Fill applied before each presented frame, under any `background()` the frame draws. Default: white. */
  readonly background?: string;
}

const ANCHOR_TO_ALIGN: Readonly<Record<TextAnchor, string>> = {
  start: 'left',
  middle: 'center',
  end: 'right',
};

export const toCssFont = (font: FontSpec): string =>
  `${font.weight === 'bold' ? 'bold ' : ''}${font.size}px ${font.family}`;

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Double-buffered surface over a 2D canvas context: commands are collected
 * between `clear()` and `show()`, then painted in one pass.
 */
export function createCanvas2DSurface(ctx: Canvas2DContextLike, options: Canvas2DSurfaceOptions): DrawSurface {
  const viewport = { width: options.width, height: options.height };
  const background = options.background ?? '#ffffff';

  const paint = (commands: ReadonlyArray<DrawCommand>): void => {
    ctx.fillStyle = background;
    ctx.fillRect(0, 0, viewport.width, viewport.height);

    replayCommands(commands, viewport, {
      background(color) {
        ctx.fillStyle = color;
        ctx.fillRect(0, 0, viewport.width, viewport.height);
      },
      text(x, y, text, anchor, color, font) {
        ctx.fillStyle = color;
        ctx.font = toCssFont(font);
        ctx.textAlign = ANCHOR_TO_ALIGN[anchor];
        ctx.textBaseline = 'middle';
        ctx.fillText(text, x, y);
      },
      rect(x, y, width, height, color) {
        ctx.fillStyle = color;
        ctx.fillRect(x, y, width, height);
      },
      line(x0, y0, x1, y1, color) {
        ctx.strokeStyle = color;
        ctx.lineWidth = 1;
        ctx.beginPath();
        ctx.moveTo(x0, y0);
        ctx.lineTo(x1, y1);
        ctx.stroke();
      },
    });
  };

  return createRecordingSurface({ onShow: paint, pause: sleep });
}
