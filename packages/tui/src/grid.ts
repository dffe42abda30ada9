/**
 * Cell grid and the diff engine
 */

import { DEFAULT_COLOR, colorsEqual, type Color } from './colors.js';

export interface Cell {
  char: string;
  fg: Color;
  bg: Color;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  strikethrough: boolean;
}

export interface Region {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface GridSize {
  width: number;
  height: number;
}

export function blankCell(): Cell {
  return {
    char: ' ',
    fg: DEFAULT_COLOR,
    bg: DEFAULT_COLOR,
    bold: false,
    italic: false,
    underline: false,
    strikethrough: false
  };
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.char === b.char &&
    colorsEqual(a.fg, b.fg) &&
    colorsEqual(a.bg, b.bg) &&
    a.bold === b.bold &&
    a.italic === b.italic &&
    a.underline === b.underline &&
    a.strikethrough === b.strikethrough;
}

/**
 * Fixed-size grid of styled cells. Out-of-bounds reads return undefined and
 * out-of-bounds writes are ignored.
 */
export class Grid {
  readonly width: number;
  readonly height: number;
  private readonly rows: Cell[][];

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`grid dimensions must be positive integers, got ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.rows = Array.from({ length: height }, () =>
      Array.from({ length: width }, blankCell)
    );
  }

  inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) &&
      x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  get(x: number, y: number): Cell | undefined {
    if (!this.inBounds(x, y)) return undefined;
    return this.rows[y][x];
  }

  set(x: number, y: number, cell: Cell): void {
    if (!this.inBounds(x, y)) return;
    this.rows[y][x] = cell;
  }

  /**
   * Reset every cell to blank
   */
  clear(): void {
    for (let y = 0; y < this.height; y++) {
      this.clearLine(y);
    }
  }

  clearLine(y: number): void {
    this.clearRange(y, 0, this.width);
  }

  /**
   * Reset cells [from, to) on row y, clipped to the grid
   */
  clearRange(y: number, from: number, to: number): void {
    if (y < 0 || y >= this.height) return;
    const start = Math.max(0, from);
    const end = Math.min(this.width, to);
    for (let x = start; x < end; x++) {
      this.rows[y][x] = blankCell();
    }
  }

  /**
   * Characters of row y, trailing blanks included
   */
  lineText(y: number): string {
    const row = this.rows[y];
    return row ? row.map((cell) => cell.char).join('') : '';
  }

  /**
   * All rows with trailing spaces trimmed, joined by newlines
   */
  toString(): string {
    const lines: string[] = [];
    for (let y = 0; y < this.height; y++) {
      lines.push(this.lineText(y).trimEnd());
    }
    return lines.join('\n');
  }

  /**
   * Regions where `next` differs from this grid
   */
  diff(next: Grid): Region[] {
    return diffGrids(this, next);
  }
}

/**
 * Rectangles that changed between two grids.
 *
 * Grids of different size yield one region covering `next`. Otherwise every
 * region is one row high and spans a maximal run of differing cells.
 */
export function diffGrids(prev: Grid | null, next: Grid): Region[] {
  if (!prev || prev.width !== next.width || prev.height !== next.height) {
    return [{ x: 0, y: 0, width: next.width, height: next.height }];
  }

  const regions: Region[] = [];
  for (let y = 0; y < next.height; y++) {
    let runStart = -1;
    for (let x = 0; x < next.width; x++) {
      const changed = !sameCell(prev.get(x, y), next.get(x, y));
      if (changed && runStart === -1) {
        runStart = x;
      } else if (!changed && runStart !== -1) {
        regions.push({ x: runStart, y, width: x - runStart, height: 1 });
        runStart = -1;
      }
    }
    if (runStart !== -1) {
      regions.push({ x: runStart, y, width: next.width - runStart, height: 1 });
    }
  }
  return regions;
}

function sameCell(a: Cell | undefined, b: Cell | undefined): boolean {
  if (!a || !b) return a === b;
  return cellsEqual(a, b);
}
