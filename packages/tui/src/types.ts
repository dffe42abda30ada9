import type { WindowOptions } from './config.js';
import type { Grid, GridSize, Region } from './grid.js';

// ============================================================================
// Messages
// ============================================================================

/**
 * Special keys, or 'runes' for printable input
 */
export type KeyType =
  | 'runes'
  | 'enter'
  | 'backspace'
  | 'tab'
  | 'shift+tab'
  | 'esc'
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'home'
  | 'end'
  | 'pgup'
  | 'pgdown'
  | 'delete'
  | 'insert'
  | 'f1'
  | 'f2'
  | 'f3'
  | 'f4'
  | 'f5'
  | 'f6'
  | 'f7'
  | 'f8'
  | 'f9'
  | 'f10'
  | 'f11'
  | 'f12'
  | 'ctrl+c'
  | 'ctrl+d'
  | 'ctrl+l'
  | 'ctrl+z';

/**
 * Key message from keyboard input
 */
export interface KeyMsg {
  type: 'key';
  key: KeyType;
  /** Characters typed; empty for special keys */
  runes: string[];
  alt: boolean;
}

export type MouseAction = 'press' | 'release' | 'motion' | 'wheel';

export type MouseButton =
  | 'none'
  | 'left'
  | 'middle'
  | 'right'
  | 'wheelUp'
  | 'wheelDown'
  | 'wheelLeft'
  | 'wheelRight';

/**
 * Pointer message; coordinates are grid cells
 */
export interface MouseMsg {
  type: 'mouse';
  x: number;
  y: number;
  action: MouseAction;
  button: MouseButton;
}

/**
 * Resize message; dimensions are grid cells
 */
export interface ResizeMsg {
  type: 'resize';
  width: number;
  height: number;
}

/**
 * Quit message
 */
export interface QuitMsg {
  type: 'quit';
}

/**
 * Error message
 */
export interface ErrorMsg {
  type: 'error';
  error: Error;
}

export type BuiltinMsg = KeyMsg | MouseMsg | ResizeMsg | QuitMsg | ErrorMsg;

/**
 * Application messages are their own discriminated union on `type`
 */
export interface CustomMsg {
  type: string;
}

/**
 * Everything update() can receive
 */
export type Message<Custom extends CustomMsg = never> = BuiltinMsg | Custom;

/**
 * Messages produced by keyboard and pointer devices
 */
export type InputMsg = KeyMsg | MouseMsg;

// ============================================================================
// Commands
// ============================================================================

/**
 * Command is a possibly async operation that may produce a message.
 * The signal aborts when the program shuts down; long waits should honour it.
 */
export type Cmd<Msg> = (signal: AbortSignal) => Msg | null | Promise<Msg | null>;

/**
 * Batch runs its commands concurrently; their messages arrive in any order
 */
export interface BatchCmd<Msg> {
  readonly type: 'batch';
  readonly cmds: ReadonlyArray<Command<Msg> | null | undefined>;
}

/**
 * Every produces a message each interval until the program stops
 */
export interface EveryCmd<Msg> {
  readonly type: 'every';
  readonly intervalMs: number;
  readonly fn: (time: Date) => Msg;
}

export type Command<Msg> = Cmd<Msg> | BatchCmd<Msg> | EveryCmd<Msg>;

// ============================================================================
// Application
// ============================================================================

export type UpdateResult<Model, Msg> = [Model, (Command<Msg> | null)?];

/**
 * Init function returns the initial model and optional command
 */
export type Init<Model, Msg> = () => UpdateResult<Model, Msg>;

/**
 * Update function handles messages and returns updated model + optional command
 */
export type Update<Model, Msg> = (model: Model, msg: Msg) => UpdateResult<Model, Msg>;

/**
 * View function renders the current model to a string, which may carry ANSI
 * styling and cursor sequences
 */
export type View<Model> = (model: Model) => string;

export interface App<Model, Custom extends CustomMsg = never> {
  init: Init<Model, Message<Custom>>;
  update: Update<Model, Message<Custom>>;
  view: View<Model>;
}

// ============================================================================
// Front end boundary
// ============================================================================

/**
 * One rendered frame. `full` is set when the whole grid must be redrawn.
 */
export interface Frame {
  grid: Grid;
  regions: Region[];
  full: boolean;
}

/**
 * Where frames are drawn
 */
export interface Surface {
  /** Acquire the output and report its size in cells */
  open(window: WindowOptions): GridSize;
  /** Draw a frame. Throwing marks the frame as failed. */
  render(frame: Frame): void;
  close(): void;
}

/**
 * Receives events from an input source
 */
export interface InputSink {
  /** Enqueue without waiting; dropped when the channel is full */
  dispatch(msg: InputMsg): void;
  /** Pointer moved to cell (x, y); coalesced until the next tick */
  motion(x: number, y: number): void;
  /** Surface now measures width x height cells */
  resize(width: number, height: number): void;
  /** External termination request (signals, closed input) */
  quit(): void;
}

export interface InputSource {
  start(sink: InputSink): void;
  stop(): void;
}
