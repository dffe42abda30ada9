/**
 * Cell colors and the ANSI palettes
 */

export interface DefaultColor {
  readonly type: 'default';
}

export interface RgbColor {
  readonly type: 'rgb';
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

/**
 * A color is either explicit RGB or the theme default, which is resolved by the
 * renderer and never at parse time.
 */
export type Color = DefaultColor | RgbColor;

export const DEFAULT_COLOR: DefaultColor = Object.freeze({ type: 'default' });

function channel(value: number): number {
  return Math.min(255, Math.max(0, Math.trunc(value)));
}

export function rgb(r: number, g: number, b: number): RgbColor {
  return { type: 'rgb', r: channel(r), g: channel(g), b: channel(b) };
}

export function isDefaultColor(color: Color): color is DefaultColor {
  return color.type === 'default';
}

export function colorsEqual(a: Color, b: Color): boolean {
  if (a.type === 'default' || b.type === 'default') {
    return a.type === b.type;
  }
  return a.r === b.r && a.g === b.g && a.b === b.b;
}

/**
 * Standard (0-7) and bright (8-15) colors
 */
const ANSI_16: readonly RgbColor[] = [
  rgb(0, 0, 0),
  rgb(128, 0, 0),
  rgb(0, 128, 0),
  rgb(128, 128, 0),
  rgb(0, 0, 128),
  rgb(128, 0, 128),
  rgb(0, 128, 128),
  rgb(192, 192, 192),
  rgb(128, 128, 128),
  rgb(255, 0, 0),
  rgb(0, 255, 0),
  rgb(255, 255, 0),
  rgb(0, 0, 255),
  rgb(255, 0, 255),
  rgb(0, 255, 255),
  rgb(255, 255, 255)
];

export function ansi16Color(code: number): Color {
  return ANSI_16[code] ?? DEFAULT_COLOR;
}

/**
 * 0-15 palette, 16-231 6x6x6 cube, 232-255 grayscale ramp
 */
export function ansi256Color(code: number): Color {
  if (!Number.isInteger(code) || code < 0 || code > 255) {
    return DEFAULT_COLOR;
  }
  if (code < 16) {
    return ansi16Color(code);
  }
  if (code <= 231) {
    const index = code - 16;
    return rgb(Math.floor(index / 36) * 51, Math.floor((index % 36) / 6) * 51, (index % 6) * 51);
  }
  const gray = (code - 232) * 10 + 8;
  return rgb(gray, gray, gray);
}
