/**
 * Replays a display list in pixel space.
 *
 * Tracks the scale, pen colour and font set by earlier commands and hands each
 * primitive to the target already converted to pixels (origin top-left, +y down).
 *
 * @module replayCommands
 */

import type { DrawCommand, FontSpec, TextAnchor } from './types';

export interface PixelViewport {
  readonly width: number;
  readonly height: number;
}

export interface ReplayTarget {
  background(color: string): void;
  text(x: number, y: number, text: string, anchor: TextAnchor, color: string, font: FontSpec): void;
  rect(x: number, y: number, width: number, height: number, color: string): void;
  line(x0: number, y0: number, x1: number, y1: number, color: string): void;
}

export type UserScale = Readonly<{ xMin: number; xMax: number; yMin: number; yMax: number }>;

export const DEFAULT_SCALE: UserScale = { xMin: 0, xMax: 1, yMin: 0, yMax: 1 };
export const DEFAULT_PEN_COLOR = '#000000';
export const DEFAULT_FONT: FontSpec = { family: 'sans-serif', weight: 'plain', size: 16 };

const span = (min: number, max: number): number => {
  const d = max - min;
  return Number.isFinite(d) && d !== 0 ? d : 1;
};

export const scaleXToPx = (x: number, scale: UserScale, viewport: PixelViewport): number =>
  ((x - scale.xMin) / span(scale.xMin, scale.xMax)) * viewport.width;

export const scaleYToPx = (y: number, scale: UserScale, viewport: PixelViewport): number =>
  viewport.height - ((y - scale.yMin) / span(scale.yMin, scale.yMax)) * viewport.height;

export function replayCommands(
  commands: ReadonlyArray<DrawCommand>,
  viewport: PixelViewport,
  target: ReplayTarget
): void {
  let scale = DEFAULT_SCALE;
  let color = DEFAULT_PEN_COLOR;
  let font = DEFAULT_FONT;

  const px = (x: number): number => scaleXToPx(x, scale, viewport);
  const py = (y: number): number => scaleYToPx(y, scale, viewport);

  for (const command of commands) {
    switch (command.kind) {
      case 'background':
        target.background(command.color);
        break;
      case 'scale':
        scale = command;
        break;
      case 'color':
        color = command.color;
        break;
      case 'font':
        font = command.font;
        break;
      case 'text':
        target.text(px(command.x), py(command.y), command.text, command.anchor, color, font);
        break;
      case 'rect': {
        const left = px(command.cx - command.halfWidth);
        const right = px(command.cx + command.halfWidth);
        const top = py(command.cy + command.halfHeight);
        const bottom = py(command.cy - command.halfHeight);
        target.rect(left, top, right - left, bottom - top, color);
        break;
      }
      case 'line':
        target.line(px(command.x0), py(command.y0), px(command.x1), py(command.y1), color);
        break;
    }
  }
}
