/**
 * Input handler for keyboard and mouse events
 */

import { runeKey, specialKey } from './keys.js';
import type { InputMsg, InputSink, InputSource, KeyType, MouseButton, MouseMsg } from './types.js';

type SpecialKey = Exclude<KeyType, 'runes'>;

const ESC = '\x1b';

// Any-motion tracking (1003) with SGR coordinates (1006)
const MOUSE_ON = '\x1b[?1003h\x1b[?1006h';
const MOUSE_OFF = '\x1b[?1003l\x1b[?1006l';

const CONTROL_KEYS: Record<number, SpecialKey> = {
  3: 'ctrl+c',
  4: 'ctrl+d',
  8: 'backspace',
  9: 'tab',
  10: 'enter',
  12: 'ctrl+l',
  13: 'enter',
  26: 'ctrl+z',
  127: 'backspace'
};

// CSI sequences ending in a letter: ESC [ A
const CSI_LETTER_KEYS: Record<string, SpecialKey> = {
  A: 'up',
  B: 'down',
  C: 'right',
  D: 'left',
  H: 'home',
  F: 'end',
  Z: 'shift+tab',
  P: 'f1',
  Q: 'f2',
  R: 'f3',
  S: 'f4'
};

// CSI sequences ending in '~': ESC [ 5 ~
const CSI_TILDE_KEYS: Record<number, SpecialKey> = {
  1: 'home',
  2: 'insert',
  3: 'delete',
  4: 'end',
  5: 'pgup',
  6: 'pgdown',
  7: 'home',
  8: 'end',
  11: 'f1',
  12: 'f2',
  13: 'f3',
  14: 'f4',
  15: 'f5',
  17: 'f6',
  18: 'f7',
  19: 'f8',
  20: 'f9',
  21: 'f10',
  23: 'f11',
  24: 'f12'
};

const WHEEL_BUTTONS: MouseButton[] = ['wheelUp', 'wheelDown', 'wheelLeft', 'wheelRight'];
const PLAIN_BUTTONS: MouseButton[] = ['left', 'middle', 'right', 'none'];

/**
 * Decode a chunk of terminal input into key and mouse messages.
 * Consecutive printable characters become one key message.
 */
export function parseInput(data: string): InputMsg[] {
  const events: InputMsg[] = [];
  let runes = '';

  const flushRunes = (): void => {
    if (runes) {
      events.push(runeKey(runes));
      runes = '';
    }
  };

  let i = 0;
  while (i < data.length) {
    const ch = String.fromCodePoint(data.codePointAt(i) ?? 0);
    const code = ch.codePointAt(0) ?? 0;

    if (ch === ESC) {
      flushRunes();
      const { event, length } = parseEscape(data, i);
      if (event) events.push(event);
      i += length;
      continue;
    }

    const control = CONTROL_KEYS[code];
    if (control) {
      flushRunes();
      events.push(specialKey(control));
      i += ch.length;
      continue;
    }

    if (code >= 32) {
      runes += ch;
    }
    i += ch.length;
  }

  flushRunes();
  return events;
}

/**
 * Parse the escape sequence starting at data[start]
 */
function parseEscape(data: string, start: number): { event: InputMsg | null; length: number } {
  const next = data[start + 1];

  if (next === undefined) {
    return { event: specialKey('esc'), length: 1 };
  }

  if (next === '[') {
    return parseCsi(data, start);
  }

  if (next === 'O' && start + 2 < data.length) {
    const key = CSI_LETTER_KEYS[data[start + 2] ?? ''];
    return { event: key ? specialKey(key) : null, length: 3 };
  }

  if (next === ESC) {
    return { event: specialKey('esc'), length: 1 };
  }

  // Alt + key (ESC + char)
  const ch = String.fromCodePoint(data.codePointAt(start + 1) ?? 0);
  const control = CONTROL_KEYS[ch.codePointAt(0) ?? 0];
  if (control) {
    return { event: specialKey(control, true), length: 1 + ch.length };
  }
  return { event: runeKey(ch, true), length: 1 + ch.length };
}

function parseCsi(data: string, start: number): { event: InputMsg | null; length: number } {
  let end = start + 2;
  while (end < data.length) {
    const code = data.charCodeAt(end);
    if (code >= 0x40 && code <= 0x7e) break;
    end++;
  }
  if (end >= data.length) {
    // Truncated sequence
    return { event: null, length: data.length - start };
  }

  const params = data.slice(start + 2, end);
  const final = data.charAt(end);
  const length = end - start + 1;

  if (params.startsWith('<') && (final === 'M' || final === 'm')) {
    return { event: parseSgrMouse(params.slice(1), final === 'M'), length };
  }

  const [first = '', modifier = ''] = params.split(';');
  const alt = hasAlt(modifier);

  if (final === '~') {
    const key = CSI_TILDE_KEYS[Number.parseInt(first, 10)];
    return { event: key ? specialKey(key, alt) : null, length };
  }

  const key = CSI_LETTER_KEYS[final];
  return { event: key ? specialKey(key, alt) : null, length };
}

/**
 * xterm modifier parameter is 1 + (shift | alt << 1 | ctrl << 2)
 */
function hasAlt(modifier: string): boolean {
  const value = Number.parseInt(modifier, 10);
  return Number.isFinite(value) && ((value - 1) & 2) !== 0;
}

/**
 * SGR mouse report: b;x;y with 1-based coordinates
 */
function parseSgrMouse(params: string, pressed: boolean): MouseMsg | null {
  const parts = params.split(';').map((part) => Number.parseInt(part, 10));
  const [code, column, row] = parts;
  if (code === undefined || column === undefined || row === undefined ||
      [code, column, row].some((value) => !Number.isFinite(value))) {
    return null;
  }

  const x = Math.max(0, column - 1);
  const y = Math.max(0, row - 1);

  if (code & 64) {
    return { type: 'mouse', x, y, action: 'wheel', button: WHEEL_BUTTONS[code & 3] ?? 'none' };
  }

  const button = PLAIN_BUTTONS[code & 3] ?? 'none';
  if (code & 32) {
    return { type: 'mouse', x, y, action: 'motion', button };
  }
  return { type: 'mouse', x, y, action: pressed ? 'press' : 'release', button };
}

/**
 * The subset of a TTY read stream the input source needs
 */
export interface InputStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: 'data', listener: (data: string) => void): unknown;
  on(event: 'end', listener: () => void): unknown;
  removeListener(event: 'data', listener: (data: string) => void): unknown;
  removeListener(event: 'end', listener: () => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface ResizeStream {
  columns?: number;
  rows?: number;
  write(chunk: string): unknown;
  on(event: 'resize', listener: () => void): unknown;
  removeListener(event: 'resize', listener: () => void): unknown;
}

export interface TerminalInputOptions {
  stdin?: InputStream;
  stdout?: ResizeStream;
  /** Report mouse presses, wheel and motion (default: false) */
  mouse?: boolean;
  /** Quit on SIGINT and SIGTERM (default: true) */
  handleSignals?: boolean;
}

export class TerminalInput implements InputSource {
  private readonly stdin: InputStream;
  private readonly stdout: ResizeStream;
  private readonly mouse: boolean;
  private readonly handleSignals: boolean;
  private sink: InputSink | null = null;

  constructor(options: TerminalInputOptions = {}) {
    this.stdin = options.stdin ?? process.stdin;
    this.stdout = options.stdout ?? process.stdout;
    this.mouse = options.mouse ?? false;
    this.handleSignals = options.handleSignals ?? true;
  }

  /**
   * Start listening to input
   */
  start(sink: InputSink): void {
    if (this.sink) return;
    this.sink = sink;

    // Set raw mode to capture keypresses
    if (this.stdin.isTTY) {
      this.stdin.setRawMode?.(true);
    }

    this.stdin.setEncoding('utf8');
    this.stdin.on('data', this.handleData);
    this.stdin.on('end', this.handleEnd);
    this.stdin.resume();
    this.stdout.on('resize', this.handleResize);

    if (this.handleSignals) {
      process.on('SIGINT', this.handleSignal);
      process.on('SIGTERM', this.handleSignal);
    }
    if (this.mouse) {
      this.stdout.write(MOUSE_ON);
    }
  }

  /**
   * Stop listening to input
   */
  stop(): void {
    if (!this.sink) return;
    this.sink = null;

    if (this.mouse) {
      this.stdout.write(MOUSE_OFF);
    }
    if (this.handleSignals) {
      process.removeListener('SIGINT', this.handleSignal);
      process.removeListener('SIGTERM', this.handleSignal);
    }

    this.stdout.removeListener('resize', this.handleResize);
    this.stdin.removeListener('data', this.handleData);
    this.stdin.removeListener('end', this.handleEnd);

    if (this.stdin.isTTY) {
      this.stdin.setRawMode?.(false);
    }
    this.stdin.pause();
  }

  /**
   * Handle raw input data
   */
  private handleData = (data: string): void => {
    const sink = this.sink;
    if (!sink) return;

    for (const msg of parseInput(data)) {
      if (msg.type === 'mouse' && msg.action === 'motion') {
        sink.motion(msg.x, msg.y);
      } else {
        sink.dispatch(msg);
      }
    }
  };

  private handleEnd = (): void => {
    this.sink?.quit();
  };

  private handleResize = (): void => {
    this.sink?.resize(this.stdout.columns || 80, this.stdout.rows || 24);
  };

  private handleSignal = (): void => {
    this.sink?.quit();
  };
}

