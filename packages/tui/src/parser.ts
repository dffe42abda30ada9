/**
 * ANSI parser
 *
 * Turns the string returned by a view into a Grid. Understands SGR styling,
 * cursor positioning and erase sequences; everything else is ignored.
 */

import {
  DEFAULT_COLOR,
  ansi16Color,
  ansi256Color,
  rgb,
  type Color
} from './colors.js';
import { Grid, blankCell } from './grid.js';

const ESC = '\x1b';

/**
 * Escape sequences longer than this (in characters, after `ESC [`) are
 * abandoned and their contents dropped.
 */
export const MAX_SEQUENCE_LENGTH = 64;

const TAB_WIDTH = 8;

interface ParserState {
  cursorX: number;
  cursorY: number;
  fg: Color;
  bg: Color;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  strikethrough: boolean;
}

/**
 * Parse `text` into a fresh width x height grid
 */
export function parseAnsi(text: string, width: number, height: number): Grid {
  const grid = new Grid(width, height);
  new AnsiParser(grid).write(text);
  return grid;
}

export class AnsiParser {
  private readonly grid: Grid;
  private readonly state: ParserState = initialState();

  constructor(grid: Grid) {
    this.grid = grid;
  }

  get cursor(): { x: number; y: number } {
    return { x: this.state.cursorX, y: this.state.cursorY };
  }

  /**
   * Feed text through the parser. An escape sequence still open at the end of
   * `text` is discarded.
   */
  write(text: string): void {
    const chars = Array.from(text);
    let sequence: string | null = null;

    for (let i = 0; i < chars.length; i++) {
      const ch = chars[i];

      if (sequence !== null) {
        if (isFinalByte(ch)) {
          this.handleSequence(sequence, ch);
          sequence = null;
        } else if (sequence.length >= MAX_SEQUENCE_LENGTH) {
          sequence = null;
        } else {
          sequence += ch;
        }
        continue;
      }

      if (ch === ESC && chars[i + 1] === '[') {
        sequence = '';
        i++;
        continue;
      }

      this.handleChar(ch);
    }
  }

  private handleChar(ch: string): void {
    const s = this.state;

    switch (ch) {
      case '\n':
        s.cursorX = 0;
        s.cursorY++;
        break;
      case '\r':
        s.cursorX = 0;
        break;
      case '\t':
        s.cursorX = (Math.floor(s.cursorX / TAB_WIDTH) + 1) * TAB_WIDTH;
        break;
      default:
        if (isControl(ch)) return;
        this.grid.set(s.cursorX, s.cursorY, {
          char: ch,
          fg: s.fg,
          bg: s.bg,
          bold: s.bold,
          italic: s.italic,
          underline: s.underline,
          strikethrough: s.strikethrough
        });
        s.cursorX++;
    }

    // Soft wrap
    if (s.cursorX >= this.grid.width) {
      s.cursorX = 0;
      s.cursorY++;
    }
  }

  private handleSequence(params: string, command: string): void {
    switch (command) {
      case 'm':
        this.handleSGR(params);
        break;
      case 'H':
      case 'f':
        this.handleCursorPosition(params);
        break;
      case 'A':
        this.state.cursorY = Math.max(0, this.state.cursorY - moveCount(params));
        break;
      case 'B':
        this.state.cursorY += moveCount(params);
        break;
      case 'C':
        this.state.cursorX += moveCount(params);
        break;
      case 'D':
        this.state.cursorX = Math.max(0, this.state.cursorX - moveCount(params));
        break;
      case 'J':
        this.handleEraseDisplay(eraseMode(params));
        break;
      case 'K':
        this.handleEraseLine(eraseMode(params));
        break;
    }
  }

  private handleSGR(params: string): void {
    const codes = parseParams(params);
    const s = this.state;

    for (let i = 0; i < codes.length; i++) {
      const code = codes[i];

      switch (code) {
        case 0:
          s.fg = DEFAULT_COLOR;
          s.bg = DEFAULT_COLOR;
          s.bold = false;
          s.italic = false;
          s.underline = false;
          s.strikethrough = false;
          break;
        case 1:
          s.bold = true;
          break;
        case 3:
          s.italic = true;
          break;
        case 4:
          s.underline = true;
          break;
        case 9:
          s.strikethrough = true;
          break;
        case 22:
          s.bold = false;
          break;
        case 23:
          s.italic = false;
          break;
        case 24:
          s.underline = false;
          break;
        case 29:
          s.strikethrough = false;
          break;
        case 38:
        case 48: {
          const extended = readExtendedColor(codes, i + 1);
          if (extended) {
            if (code === 38) s.fg = extended.color;
            else s.bg = extended.color;
            i += extended.consumed;
          }
          break;
        }
        case 39:
          s.fg = DEFAULT_COLOR;
          break;
        case 49:
          s.bg = DEFAULT_COLOR;
          break;
        default:
          if (code >= 30 && code <= 37) s.fg = ansi16Color(code - 30);
          else if (code >= 40 && code <= 47) s.bg = ansi16Color(code - 40);
          else if (code >= 90 && code <= 97) s.fg = ansi16Color(code - 90 + 8);
          else if (code >= 100 && code <= 107) s.bg = ansi16Color(code - 100 + 8);
      }
    }
  }

  private handleCursorPosition(params: string): void {
    const [row = 1, col = 1] = parseParams(params);
    this.state.cursorY = Math.max(0, row - 1);
    this.state.cursorX = Math.max(0, col - 1);
  }

  private handleEraseDisplay(mode: number): void {
    const { cursorX, cursorY } = this.state;
    switch (mode) {
      case 0:
        this.grid.clearRange(cursorY, cursorX, this.grid.width);
        for (let y = Math.max(0, cursorY + 1); y < this.grid.height; y++) {
          this.grid.clearLine(y);
        }
        break;
      case 1:
        for (let y = 0; y < Math.min(cursorY, this.grid.height); y++) {
          this.grid.clearLine(y);
        }
        this.grid.clearRange(cursorY, 0, cursorX + 1);
        break;
      case 2:
      case 3:
        this.grid.clear();
        break;
    }
  }

  private handleEraseLine(mode: number): void {
    const { cursorX, cursorY } = this.state;
    switch (mode) {
      case 0:
        this.grid.clearRange(cursorY, cursorX, this.grid.width);
        break;
      case 1:
        this.grid.clearRange(cursorY, 0, cursorX + 1);
        break;
      case 2:
        this.grid.clearLine(cursorY);
        break;
    }
  }
}

function initialState(): ParserState {
  const blank = blankCell();
  return {
    cursorX: 0,
    cursorY: 0,
    fg: blank.fg,
    bg: blank.bg,
    bold: blank.bold,
    italic: blank.italic,
    underline: blank.underline,
    strikethrough: blank.strikethrough
  };
}

function isFinalByte(ch: string): boolean {
  return (ch >= 'A' && ch <= 'Z') || (ch >= 'a' && ch <= 'z');
}

function isControl(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  return code < 0x20 || code === 0x7f;
}

/**
 * Semicolon separated numbers; empty fields read as 0 and garbage is skipped
 */
export function parseParams(params: string): number[] {
  if (params === '') return [0];
  const codes: number[] = [];
  for (const part of params.split(';')) {
    if (part === '') {
      codes.push(0);
      continue;
    }
    if (/^\d+$/.test(part)) {
      codes.push(Number.parseInt(part, 10));
    }
  }
  return codes;
}

function moveCount(params: string): number {
  const n = /^\d+$/.test(params) ? Number.parseInt(params, 10) : 0;
  return n > 0 ? n : 1;
}

function eraseMode(params: string): number {
  return /^\d+$/.test(params) ? Number.parseInt(params, 10) : 0;
}

/**
 * `5;n` or `2;r;g;b` following a 38/48 code
 */
function readExtendedColor(
  codes: number[],
  start: number
): { color: Color; consumed: number } | null {
  const mode = codes[start];
  if (mode === 5 && start + 1 < codes.length) {
    return { color: ansi256Color(codes[start + 1]), consumed: 2 };
  }
  if (mode === 2 && start + 3 < codes.length) {
    return {
      color: rgb(codes[start + 1], codes[start + 2], codes[start + 3]),
      consumed: 4
    };
  }
  return null;
}
