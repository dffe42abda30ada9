/**
 * Headless front end
 *
 * Keeps frames in memory instead of drawing them. Useful for tests and for
 * driving a program from another process.
 */

import type { WindowOptions } from './config.js';
import { Grid, type GridSize } from './grid.js';
import { runeKey, specialKey } from './keys.js';
import type {
  Frame,
  InputSink,
  InputSource,
  KeyType,
  MouseButton,
  Surface
} from './types.js';

export interface HeadlessSurfaceOptions {
  width: number;
  height: number;
  /** Throw from render() for the next n frames */
  failRenders?: number;
}

export class HeadlessSurface implements Surface {
  readonly frames: Frame[] = [];
  window: WindowOptions | null = null;
  isOpen = false;
  private readonly size: GridSize;
  private failRenders: number;
  private screen: Grid | null = null;

  constructor(options: HeadlessSurfaceOptions) {
    this.size = { width: options.width, height: options.height };
    this.failRenders = options.failRenders ?? 0;
  }

  open(window: WindowOptions): GridSize {
    this.window = window;
    this.isOpen = true;
    return { ...this.size };
  }

  render(frame: Frame): void {
    if (this.failRenders > 0) {
      this.failRenders--;
      throw new Error('surface unavailable');
    }
    this.frames.push(frame);
    this.screen = frame.grid;
  }

  close(): void {
    this.isOpen = false;
  }

  /**
   * The most recently drawn grid
   */
  get lastGrid(): Grid | null {
    return this.screen;
  }

  /**
   * Text of the most recently drawn grid, trailing blanks trimmed
   */
  text(): string {
    return this.screen ? this.screen.toString() : '';
  }

  failNextRenders(count: number): void {
    this.failRenders = count;
  }
}

/**
 * Input source driven by method calls
 */
export class HeadlessInput implements InputSource {
  private sink: InputSink | null = null;

  get started(): boolean {
    return this.sink !== null;
  }

  start(sink: InputSink): void {
    this.sink = sink;
  }

  stop(): void {
    this.sink = null;
  }

  type(text: string, alt: boolean = false): void {
    for (const ch of text) {
      this.sink?.dispatch(runeKey(ch, alt));
    }
  }

  press(key: Exclude<KeyType, 'runes'>, alt: boolean = false): void {
    this.sink?.dispatch(specialKey(key, alt));
  }

  click(x: number, y: number, button: MouseButton = 'left'): void {
    this.sink?.dispatch({ type: 'mouse', x, y, action: 'press', button });
    this.sink?.dispatch({ type: 'mouse', x, y, action: 'release', button });
  }

  move(x: number, y: number): void {
    this.sink?.motion(x, y);
  }

  resize(width: number, height: number): void {
    this.sink?.resize(width, height);
  }
}

/**
 * A surface/input pair for Program
 */
export function createHeadless(width: number, height: number): {
  surface: HeadlessSurface;
  input: HeadlessInput;
} {
  return {
    surface: new HeadlessSurface({ width, height }),
    input: new HeadlessInput()
  };
}
