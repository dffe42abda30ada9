/**
 * Program - The main event loop
 * Implements The Elm Architecture pattern
 *
 * Producers (input, commands, timers, send()) only enqueue onto the message
 * channel. A redraw tick drains the channel, applies update() to each message
 * in order, then renders the view as a grid diff. Ticks run synchronously and
 * never nest, so update() calls are strictly serialized.
 */

import { MessageChannel } from './channel.js';
import {
  resolveProgramOptions,
  type ProgramOptions,
  type ProgramOptionsInput,
  type WindowOptions
} from './config.js';
import { RenderError, TransitionError, getErrorMessage, type TransitionPhase } from './errors.js';
import { CommandExecutor } from './executor.js';
import { diffGrids, type Grid, type GridSize, type Region } from './grid.js';
import { Logger } from './logger.js';
import { parseAnsi } from './parser.js';
import type {
  App,
  CustomMsg,
  InputMsg,
  InputSink,
  InputSource,
  Message,
  Surface,
  UpdateResult
} from './types.js';

export type ProgramStatus = 'idle' | 'starting' | 'running' | 'terminating' | 'terminated';

export interface Frontend {
  surface: Surface;
  input?: InputSource;
}

type Guarded<T> = { ok: true; value: T } | { ok: false; error: TransitionError };

export class Program<Model, Custom extends CustomMsg = never> implements InputSink {
  private readonly app: App<Model, Custom>;
  private readonly surface: Surface;
  private readonly input: InputSource | undefined;
  private readonly optionsInput: ProgramOptionsInput;
  private readonly logger: Logger;
  private readonly controller = new AbortController();

  private phase: ProgramStatus = 'idle';
  private fps = 0;
  private channel: MessageChannel<Message<Custom>> | null = null;
  private executor: CommandExecutor<Message<Custom>> | null = null;
  private unsubscribe: (() => void) | null = null;
  private requestExit: (() => void) | null = null;

  private state: { model: Model } | null = null;
  private size: GridSize = { width: 0, height: 0 };
  private lastView = '';
  private lastGrid: Grid | null = null;
  private lastRender = 0;
  private dirty = false;

  private redrawHandle: NodeJS.Immediate | null = null;
  private frameTimer: NodeJS.Timeout | null = null;
  private ticking = false;

  private pendingMotion: { x: number; y: number } | null = null;
  private lastCell: { x: number; y: number } | null = null;

  constructor(
    app: App<Model, Custom>,
    frontend: Frontend,
    options: ProgramOptionsInput = {},
    logger: Logger = Logger.fromEnv()
  ) {
    this.app = app;
    this.surface = frontend.surface;
    this.input = frontend.input;
    this.optionsInput = options;
    this.logger = logger;
  }

  get status(): ProgramStatus {
    return this.phase;
  }

  /**
   * Run the program until it quits. Resolves with the final model.
   *
   * Rejects with a ConfigurationError before anything is acquired when the
   * options are invalid, and with a TransitionError when init() faults.
   */
  async run(): Promise<Model> {
    if (this.phase !== 'idle') {
      throw new Error('Program has already been started');
    }

    const options = resolveProgramOptions(this.optionsInput);
    this.phase = 'starting';
    this.fps = options.fps;
    this.logger.info('Starting program');
    this.logger.debug('Configuration', options);

    const channel = new MessageChannel<Message<Custom>>(options.channelCapacity);
    const executor = new CommandExecutor<Message<Custom>>(
      channel,
      this.controller.signal,
      this.logger.child('executor')
    );
    this.channel = channel;
    this.executor = executor;
    const exit = new Promise<void>((resolve) => {
      this.requestExit = resolve;
    });

    try {
      this.size = this.surface.open(windowOptions(options));
    } catch (error) {
      this.phase = 'terminated';
      channel.close();
      throw new RenderError(`failed to open surface: ${getErrorMessage(error)}`, { cause: error });
    }
    this.logger.debug(`Surface opened: ${this.size.width}x${this.size.height} cells`);

    this.unsubscribe = channel.onMessage(() => this.scheduleRedraw());
    this.input?.start(this);
    this.phase = 'running';

    const initial = this.guard('init', () => this.app.init());
    if (!initial.ok) {
      this.beginTermination();
      await this.finish();
      throw initial.error;
    }

    const [model, cmd] = initial.value;
    this.state = { model };
    if (cmd) {
      this.logger.debug('Executing initial command');
      executor.execute(cmd);
    }

    if (this.controller.signal.aborted) {
      this.beginTermination();
    } else {
      this.scheduleRedraw();
    }

    this.logger.info('Event loop running');
    await exit;
    await this.finish();
    this.logger.info('Program exited');
    return (this.state ?? { model }).model;
  }

  /**
   * Send a message to update(). Waits for room in the channel; resolves false
   * if the program stops first.
   */
  send(msg: Message<Custom>): Promise<boolean> {
    if (!this.channel) {
      return Promise.resolve(false);
    }
    return this.channel.send(msg, this.controller.signal);
  }

  /**
   * Ask the program to stop. Safe to call more than once.
   */
  quit(): void {
    if (this.controller.signal.aborted) return;
    this.logger.debug('Termination requested');
    this.controller.abort();
    if (this.phase === 'running') {
      this.beginTermination();
    }
  }

  dispatch(msg: InputMsg): void {
    this.post(msg);
  }

  motion(x: number, y: number): void {
    if (this.lastCell && this.lastCell.x === x && this.lastCell.y === y) {
      return;
    }
    this.lastCell = { x, y };
    const alreadyPending = this.pendingMotion !== null;
    this.pendingMotion = { x, y };
    if (!alreadyPending) {
      this.scheduleRedraw();
    }
  }

  resize(width: number, height: number): void {
    this.logger.debug(`Surface resized: ${width}x${height} cells`);
    this.size = { width, height };
    this.post({ type: 'resize', width, height });
  }

  /**
   * Non-blocking enqueue for device events
   */
  private post(msg: Message<Custom>): void {
    if (!this.channel || this.phase !== 'running') return;
    if (!this.channel.trySend(msg)) {
      this.logger.warn(`Message channel full, dropping ${msg.type} event`);
    }
  }

  private scheduleRedraw(): void {
    if (this.redrawHandle || this.phase !== 'running') return;
    this.redrawHandle = setImmediate(() => {
      this.redrawHandle = null;
      this.tick();
    });
  }

  private armFrameTimer(delayMs: number): void {
    if (this.frameTimer) return;
    this.frameTimer = setTimeout(() => {
      this.frameTimer = null;
      this.tick();
    }, Math.ceil(delayMs));
  }

  /**
   * One update/render cycle
   */
  private tick(): void {
    if (this.phase !== 'running' || !this.channel) return;
    if (this.ticking) {
      this.scheduleRedraw();
      return;
    }

    this.ticking = true;
    try {
      this.runTick(this.channel);
    } finally {
      this.ticking = false;
    }
  }

  private runTick(channel: MessageChannel<Message<Custom>>): void {
    let processed = 0;

    const motion = this.pendingMotion;
    if (motion) {
      this.pendingMotion = null;
      processed++;
      const applied = this.apply({ type: 'mouse', x: motion.x, y: motion.y, action: 'motion', button: 'none' });
      if (!applied || this.phase !== 'running') {
        return;
      }
    }

    const messages = channel.drain();
    if (messages.some((msg) => msg.type === 'quit')) {
      this.logger.info('Quit message received, exiting');
      this.quit();
      return;
    }

    for (const msg of messages) {
      processed++;
      if (!this.apply(msg) || this.phase !== 'running') return;
    }

    if (processed > 0) {
      this.dirty = true;
    }

    if (this.fps > 0) {
      const minFrameTime = 1000 / this.fps;
      const elapsed = Date.now() - this.lastRender;
      if (elapsed < minFrameTime) {
        if (this.dirty) {
          this.armFrameTimer(minFrameTime - elapsed);
        }
        return;
      }
    }

    if (this.phase !== 'running') return;
    this.render();

    if (this.pendingMotion) {
      this.scheduleRedraw();
    }
  }

  /**
   * Apply update() to one message. Returns false when it faulted and the
   * program is terminating.
   */
  private apply(msg: Message<Custom>): boolean {
    const state = this.state;
    if (!state) return false;

    const result = this.guard('update', () => this.app.update(state.model, msg));
    if (!result.ok) {
      this.quit();
      return false;
    }

    const [model, cmd]: UpdateResult<Model, Message<Custom>> = result.value;
    this.state = { model };
    if (cmd) {
      this.executor?.execute(cmd);
    }
    return true;
  }

  private render(): void {
    const state = this.state;
    if (!state) return;

    const viewResult = this.guard('view', () => this.app.view(state.model));
    const view = viewResult.ok ? viewResult.value : '';

    try {
      if (viewResult.ok && view === this.lastView && this.lastView !== '' && !this.dirty) {
        return;
      }
      this.draw(view);
    } finally {
      if (!viewResult.ok) {
        this.quit();
      }
    }
  }

  private draw(view: string): void {
    const { width, height } = this.size;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      const failure = new RenderError(`surface is ${width}x${height} cells, skipping render`);
      this.logger.error(failure.message);
      return;
    }

    let grid: Grid;
    let regions: Region[];
    const full = !this.lastGrid || this.lastGrid.width !== width || this.lastGrid.height !== height;
    try {
      grid = parseAnsi(view, width, height);
      regions = diffGrids(this.lastGrid, grid);
      this.surface.render({ grid, regions, full });
    } catch (error) {
      const failure = new RenderError(`render failed: ${getErrorMessage(error)}`, { cause: error });
      this.logger.error(failure.message);
      return;
    }

    this.logger.debug(`Rendered frame (${full ? 'full' : `${regions.length} regions`})`);
    this.lastView = view;
    this.lastGrid = grid;
    this.lastRender = Date.now();
    this.dirty = false;
  }

  /**
   * Run init/update/view, converting a throw into a TransitionError result
   */
  private guard<T>(phase: TransitionPhase, fn: () => T): Guarded<T> {
    try {
      return { ok: true, value: fn() };
    } catch (cause) {
      const error = new TransitionError(phase, cause);
      this.logger.error(`Fault in ${phase}(), shutting down: ${getErrorMessage(cause)}`, {
        stack: cause instanceof Error ? cause.stack : undefined
      });
      return { ok: false, error };
    }
  }

  /**
   * running -> terminating. Stops producers and wakes run().
   */
  private beginTermination(): void {
    if (this.phase === 'terminating' || this.phase === 'terminated') return;
    this.phase = 'terminating';
    this.controller.abort();

    if (this.redrawHandle) {
      clearImmediate(this.redrawHandle);
      this.redrawHandle = null;
    }
    if (this.frameTimer) {
      clearTimeout(this.frameTimer);
      this.frameTimer = null;
    }

    this.input?.stop();
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.channel?.close();
    this.requestExit?.();
  }

  /**
   * terminating -> terminated, once the executor has drained
   */
  private async finish(): Promise<void> {
    await this.executor?.shutdown();
    try {
      this.surface.close();
    } catch (error) {
      this.logger.error(`Failed to close surface: ${getErrorMessage(error)}`);
    }
    this.phase = 'terminated';
  }
}

function windowOptions(options: ProgramOptions): WindowOptions {
  return {
    title: options.title,
    initialWidth: options.initialWidth,
    initialHeight: options.initialHeight,
    fontFamily: options.fontFamily,
    fontSize: options.fontSize
  };
}
