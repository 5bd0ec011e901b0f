import type { DrawCommand, DrawSurface } from '../surface/types';

/**
 * Sends a display list to a surface, one call per command.
 */
export function renderCommands(surface: DrawSurface, commands: ReadonlyArray<DrawCommand>): void {
  for (const command of commands) {
    switch (command.kind) {
      case 'background':
        surface.background(command.color);
        break;
      case 'scale':
        surface.setScale(command.xMin, command.xMax, command.yMin, command.yMax);
        break;
      case 'color':
        surface.setPenColor(command.color);
        break;
      case 'font':
        surface.setFont(command.font);
        break;
      case 'text':
        surface.text(command.x, command.y, command.text, command.anchor);
        break;
      case 'rect':
        surface.filledRectangle(command.cx, command.cy, command.halfWidth, command.halfHeight);
        break;
      case 'line':
        surface.line(command.x0, command.y0, command.x1, command.y1);
        break;
    }
  }
}
