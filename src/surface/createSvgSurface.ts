import { createRecordingSurface } from './createRecordingSurface';
import { replayCommands } from './replayCommands';
import type { DrawCommand, DrawSurface } from './types';

export interface SvgSurfaceOptions {
  readonly width: number;
  readonly height: number;
  /** Fill under each frame, before any `background()` the frame draws. Default: white. */
  readonly background?: string;
  /** Receives one complete SVG document per presented frame. */
  readonly onFrame: (svg: string) => void;
  /** Pacing implementation. Default: `setTimeout`. */
  readonly pause?: (ms: number) => Promise<void>;
}

const XML_ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export const escapeXml = (text: string): string => text.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);

/** Pixel coordinates rounded to 2 decimals. */
export const formatPx = (n: number): string => String(Math.round(n * 100) / 100);

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export function renderSvgDocument(
  commands: ReadonlyArray<DrawCommand>,
  width: number,
  height: number,
  background: string
): string {
  const parts: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect x="0" y="0" width="${width}" height="${height}" fill="${escapeXml(background)}"/>`,
  ];

  replayCommands(commands, { width, height }, {
    background(color) {
      parts.push(`<rect x="0" y="0" width="${width}" height="${height}" fill="${escapeXml(color)}"/>`);
    },
    text(x, y, text, anchor, color, font) {
      parts.push(
        `<text x="${formatPx(x)}" y="${formatPx(y)}" font-family="${escapeXml(font.family)}" ` +
          `font-size="${font.size}" font-weight="${font.weight === 'bold' ? 'bold' : 'normal'}" ` +
          `text-anchor="${anchor}" dominant-baseline="middle" fill="${escapeXml(color)}">${escapeXml(text)}</text>`
      );
    },
    rect(x, y, w, h, color) {
      parts.push(
        `<rect x="${formatPx(x)}" y="${formatPx(y)}" width="${formatPx(w)}" height="${formatPx(h)}" fill="${escapeXml(color)}"/>`
      );
    },
    line(x0, y0, x1, y1, color) {
      parts.push(
        `<line x1="${formatPx(x0)}" y1="${formatPx(y0)}" x2="${formatPx(x1)}" y2="${formatPx(y1)}" stroke="${escapeXml(color)}" stroke-width="1"/>`
      );
    },
  });

  parts.push('</svg>');
  return parts.join('');
}

/**
 * Surface that serialises each presented frame to SVG markup.
 */
export function createSvgSurface(options: SvgSurfaceOptions): DrawSurface {
  const background = options.background ?? '#ffffff';
  return createRecordingSurface({
    onShow: (commands) => options.onFrame(renderSvgDocument(commands, options.width, options.height, background)),
    pause: options.pause ?? sleep,
  });
}
