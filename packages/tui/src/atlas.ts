/**
 * Glyph atlas
 *
 * Slices a bitmap font sheet into per-character cell bitmaps. The descriptor
 * lists the characters of the sheet, one line per row of cells and one tab
 * between cells.
 */

import { AtlasError } from './errors.js';

/**
 * Decoded image, 3 bytes (R, G, B) per pixel, row-major
 */
export interface Bitmap {
  width: number;
  height: number;
  pixels: Uint8Array;
}

// 4x6 digits 0-F followed by a filled block for anything else
const HEX_FONT = [
  ' #    # ##  ##   #  ###  ## ###  #   #   #  ##   #  ##  ### ### ### ',
  '# #  ##   #   # #   #   #     # # # # # # # # # # # # # #   #   ### ',
  '# # # #   #  #  ### ##  ##   #   #   ## # # ##  #   # # ### ### ### ',
  '# #   #  #    #  #    # # #  #  # #   # ### # # # # # # #   #   ### ',
  ' #    # ### ##   #  ##   #   #   #  ##  # # ##   #  ##  ### #   ### ',
  '                                                                    '
];

const HEX_GLYPH_WIDTH = 4;
const HEX_GLYPH_HEIGHT = 6;
const PLACEHOLDER_COLUMNS = 3;
const PLACEHOLDER_ROWS = 4;
const MIN_PLACEHOLDER_WIDTH = 12;
const MIN_PLACEHOLDER_HEIGHT = 24;

export class GlyphAtlas {
  private readonly glyphs = new Map<string, Uint8Array>();
  private cellX = 0;
  private cellY = 0;

  get cellWidth(): number {
    return this.cellX;
  }

  get cellHeight(): number {
    return this.cellY;
  }

  get size(): number {
    return this.glyphs.size;
  }

  /**
   * Add the glyphs of a sheet. `suffix` is appended to every character name,
   * so one sheet can be loaded under aliases.
   */
  load(bitmap: Bitmap, descriptor: string, suffix: string = ''): void {
    if (bitmap.pixels.length < bitmap.width * bitmap.height * 3) {
      throw new AtlasError(
        `bitmap has ${bitmap.pixels.length} bytes, expected ${bitmap.width * bitmap.height * 3}`
      );
    }

    const rows = descriptor.replaceAll('\r\n', '\n').split('\n');
    const columns = (rows[0] ?? '').split('\t').length;

    if (bitmap.width % columns !== 0 || bitmap.height % rows.length !== 0) {
      throw new AtlasError(
        `${bitmap.width}x${bitmap.height} bitmap does not divide into ${columns}x${rows.length} cells`
      );
    }

    const cellX = bitmap.width / columns;
    const cellY = bitmap.height / rows.length;

    if (this.glyphs.size > 0 && (cellX !== this.cellX || cellY !== this.cellY)) {
      throw new AtlasError(
        `only same cell sized fonts can be merged (${this.cellX}x${this.cellY}, got ${cellX}x${cellY})`
      );
    }
    this.cellX = cellX;
    this.cellY = cellY;

    rows.forEach((line, row) => {
      trimTabs(line).split('\t').forEach((name, column) => {
        if (!name || column >= columns) return;
        this.glyphs.set(name + suffix, sliceCell(bitmap, column * cellX, row * cellY, cellX, cellY));
      });
    });
  }

  /**
   * Cell bitmap for a character. Unknown characters get a placeholder showing
   * their code point when cells are large enough, otherwise null.
   */
  glyph(char: string): Uint8Array | null {
    const known = this.glyphs.get(char);
    if (known) return known;

    if (this.glyphs.size === 0 || this.cellX < MIN_PLACEHOLDER_WIDTH || this.cellY < MIN_PLACEHOLDER_HEIGHT) {
      return null;
    }

    const placeholder = this.placeholder(codeLabel(char));
    this.glyphs.set(char, placeholder);
    return placeholder;
  }

  /**
   * Up to 12 hex digits laid out column by column, 3 columns of 4
   */
  private placeholder(label: string): Uint8Array {
    const pixels = new Uint8Array(this.cellX * this.cellY * 3);
    let index = 0;

    for (let boxX = 0; boxX < PLACEHOLDER_COLUMNS; boxX++) {
      for (let boxY = 0; boxY < PLACEHOLDER_ROWS; boxY++) {
        const digit = label[index++];
        if (digit === undefined) continue;

        for (let y = 0; y < HEX_GLYPH_HEIGHT; y++) {
          for (let x = 0; x < HEX_GLYPH_WIDTH; x++) {
            if (!hexPixel(digit, x, y)) continue;
            const pos = boxY * this.cellX * HEX_GLYPH_HEIGHT + boxX * HEX_GLYPH_WIDTH + y * this.cellX + x;
            pixels.fill(255, pos * 3, pos * 3 + 3);
          }
        }
      }
    }

    return pixels;
  }
}

function trimTabs(line: string): string {
  return line.replace(/^\t+|\t+$/g, '');
}

function sliceCell(bitmap: Bitmap, left: number, top: number, width: number, height: number): Uint8Array {
  const cell = new Uint8Array(width * height * 3);
  for (let y = 0; y < height; y++) {
    const start = ((top + y) * bitmap.width + left) * 3;
    cell.set(bitmap.pixels.subarray(start, start + width * 3), y * width * 3);
  }
  return cell;
}

/**
 * Printable ASCII stands for itself; anything else is its code point in hex
 */
export function codeLabel(char: string): string {
  let label = '';
  for (const ch of char) {
    const code = ch.codePointAt(0) ?? 0;
    if (code >= 0x20 && code <= 0x7e) {
      label += ch;
    } else {
      label += code.toString(16).padStart(code > 0xffff ? 8 : 4, '0');
    }
  }
  return label;
}

export function hexPixel(digit: string, x: number, y: number): boolean {
  if (x >= HEX_GLYPH_WIDTH || y >= HEX_GLYPH_HEIGHT) return false;
  const value = Number.parseInt(digit, 16);
  const glyph = Number.isNaN(value) ? 16 : value;
  return HEX_FONT[y]?.charAt(glyph * HEX_GLYPH_WIDTH + x) === '#';
}
