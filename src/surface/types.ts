/**
 * Drawing surface contract consumed by the chart engine.
 *
 * Coordinates are in user space set by `setScale` (x grows right, y grows up).
 */

export type TextAnchor = 'start' | 'middle' | 'end';

export type FontWeight = 'plain' | 'bold';

export interface FontSpec {
  readonly family: string;
  readonly weight: FontWeight;
  readonly size: number;
}

export interface DrawSurface {
  /** Fills the whole frame. */
  background(color: string): void;
  setScale(xMin: number, xMax: number, yMin: number, yMax: number): void;
  setPenColor(color: string): void;
  setFont(font: FontSpec): void;
  text(x: number, y: number, text: string, anchor: TextAnchor): void;
  /** Axis-aligned rectangle given its centre and half-extents. */
  filledRectangle(cx: number, cy: number, halfWidth: number, halfHeight: number): void;
  line(x0: number, y0: number, x1: number, y1: number): void;
  /** Starts a new frame. */
  clear(): void;
  /** Presents the frame drawn since the last `clear()`. */
  show(): void;
  /** Inter-frame pacing. */
  pause(ms: number): Promise<void>;
}

export type DrawCommand =
  | { readonly kind: 'background'; readonly color: string }
  | { readonly kind: 'scale'; readonly xMin: number; readonly xMax: number; readonly yMin: number; readonly yMax: number }
  | { readonly kind: 'color'; readonly color: string }
  | { readonly kind: 'font'; readonly font: FontSpec }
  | { readonly kind: 'text'; readonly x: number; readonly y: number; readonly text: string; readonly anchor: TextAnchor }
  | {
      readonly kind: 'rect';
      readonly cx: number;
      readonly cy: number;
      readonly halfWidth: number;
      readonly halfHeight: number;
    }
  | { readonly kind: 'line'; readonly x0: number; readonly y0: number; readonly x1: number; readonly y1: number };

export type DrawCommandKind = DrawCommand['kind'];
