/**
 * Terminal renderer
 */

import ansiEscapes from 'ansi-escapes';
import { Chalk, type ChalkInstance } from 'chalk';
import stringWidth from 'string-width';
import { colorsEqual } from './colors.js';
import type { WindowOptions } from './config.js';
import type { Cell, Grid, GridSize, Region } from './grid.js';
import type { Frame, Surface } from './types.js';

/**
 * The subset of a TTY write stream the renderer needs
 */
export interface OutputStream {
  write(chunk: string): unknown;
  columns?: number;
  rows?: number;
}

export interface TerminalSurfaceOptions {
  /** Use the alternate screen buffer and redraw only changed regions (default: true) */
  altScreen?: boolean;
  stream?: OutputStream;
  /** chalk color level; defaults to what the terminal supports */
  colorLevel?: 0 | 1 | 2 | 3;
}

export class TerminalSurface implements Surface {
  private readonly useAltScreen: boolean;
  private readonly stream: OutputStream;
  private readonly chalk: ChalkInstance;
  private lastFrameHeight = 0;

  constructor(options: TerminalSurfaceOptions = {}) {
    this.useAltScreen = options.altScreen ?? true;
    this.stream = options.stream ?? process.stdout;
    this.chalk = options.colorLevel === undefined ? new Chalk() : new Chalk({ level: options.colorLevel });
  }

  /**
   * Initialize the renderer
   */
  open(_window: WindowOptions): GridSize {
    if (this.useAltScreen) {
      this.stream.write(ansiEscapes.enterAlternativeScreen);
    }
    this.stream.write(ansiEscapes.cursorHide);
    this.lastFrameHeight = 0;
    return this.getSize();
  }

  /**
   * Cleanup the renderer
   */
  close(): void {
    this.stream.write(ansiEscapes.cursorShow);
    if (this.useAltScreen) {
      this.stream.write(ansiEscapes.exitAlternativeScreen);
    } else {
      this.stream.write('\n');
    }
  }

  /**
   * Render a frame
   */
  render(frame: Frame): void {
    const output = this.useAltScreen ? this.renderRegions(frame) : this.renderInline(frame.grid);
    if (output) {
      this.stream.write(output);
    }
  }

  /**
   * Get terminal size
   */
  getSize(): GridSize {
    return {
      width: this.stream.columns || 80,
      height: this.stream.rows || 24
    };
  }

  /**
   * Draw only changed regions on the alternate screen
   */
  private renderRegions(frame: Frame): string {
    const { grid } = frame;
    let output = '';
    let regions: Region[] = frame.regions;

    if (frame.full) {
      output += ansiEscapes.clearTerminal;
      regions = [];
      for (let y = 0; y < grid.height; y++) {
        regions.push({ x: 0, y, width: grid.width, height: 1 });
      }
    }

    for (const region of regions) {
      for (let y = region.y; y < region.y + region.height && y < grid.height; y++) {
        output += ansiEscapes.cursorTo(region.x, y);
        output += this.renderRun(grid, y, region.x, Math.min(grid.width, region.x + region.width));
      }
    }

    return output;
  }

  /**
   * Inline mode: erase the previous frame and print the whole grid
   */
  private renderInline(grid: Grid): string {
    const lines: string[] = [];
    for (let y = 0; y < grid.height; y++) {
      lines.push(this.renderRun(grid, y, 0, grid.width, false));
    }
    const output = ansiEscapes.eraseLines(this.lastFrameHeight) + lines.join('\n');
    this.lastFrameHeight = grid.height;
    return output;
  }

  /**
   * Styled text for cells [from, to) of row y. Glyphs that are not one column
   * wide are followed by a cursor move so the next cell lands in its column.
   */
  private renderRun(grid: Grid, y: number, from: number, to: number, resync: boolean = true): string {
    let output = '';
    let span = '';
    let spanCell: Cell | null = null;

    const flush = (): void => {
      if (spanCell && span) {
        output += this.style(spanCell)(span);
      }
      span = '';
      spanCell = null;
    };

    for (let x = from; x < to; x++) {
      const cell = grid.get(x, y);
      if (!cell) continue;

      if (resync && stringWidth(cell.char) !== 1) {
        flush();
        output += this.style(cell)(cell.char) + ansiEscapes.cursorTo(x + 1, y);
        continue;
      }

      if (spanCell && !sameStyle(spanCell, cell)) {
        flush();
      }
      spanCell ??= cell;
      span += cell.char;
    }
    flush();

    return output;
  }

  private style(cell: Cell): (text: string) => string {
    let styled = this.chalk;
    if (cell.fg.type === 'rgb') styled = styled.rgb(cell.fg.r, cell.fg.g, cell.fg.b);
    if (cell.bg.type === 'rgb') styled = styled.bgRgb(cell.bg.r, cell.bg.g, cell.bg.b);
    if (cell.bold) styled = styled.bold;
    if (cell.italic) styled = styled.italic;
    if (cell.underline) styled = styled.underline;
    if (cell.strikethrough) styled = styled.strikethrough;
    return styled;
  }
}

function sameStyle(a: Cell, b: Cell): boolean {
  return colorsEqual(a.fg, b.fg) && colorsEqual(a.bg, b.bg) &&
    a.bold === b.bold && a.italic === b.italic &&
    a.underline === b.underline && a.strikethrough === b.strikethrough;
}
