/**
 * Command executor
 *
 * Runs commands concurrently and feeds their messages into the program's
 * channel. Every spawned task is tracked so shutdown() can wait for all of
 * them; recurring timers are kept in a registry so they can be cancelled.
 */

import { setInterval as interval } from 'node:timers/promises';
import type { MessageChannel } from './channel.js';
import { CommandError } from './errors.js';
import type { Logger } from './logger.js';
import type { BatchCmd, Cmd, Command, ErrorMsg, EveryCmd } from './types.js';

interface TimerRegistration {
  id: number;
  controller: AbortController;
}

export class CommandExecutor<Msg> {
  private readonly channel: MessageChannel<Msg | ErrorMsg>;
  private readonly signal: AbortSignal;
  private readonly logger: Logger;
  private readonly tasks = new Set<Promise<void>>();
  private readonly timers = new Map<number, TimerRegistration>();
  private nextTimerId = 1;
  private shuttingDown = false;
  private stopped = false;

  constructor(channel: MessageChannel<Msg | ErrorMsg>, signal: AbortSignal, logger: Logger) {
    this.channel = channel;
    this.signal = signal;
    this.logger = logger;
  }

  /**
   * Outstanding tasks, timers included
   */
  get pending(): number {
    return this.tasks.size;
  }

  get activeTimers(): number {
    return this.timers.size;
  }

  /**
   * Run a command in the background. Null and undefined are ignored.
   */
  execute(cmd: Command<Msg> | null | undefined): void {
    if (!cmd) return;
    if (this.stopped) {
      this.logger.debug('Executor stopped, ignoring command');
      return;
    }
    this.track(this.dispatch(cmd));
  }

  /**
   * Non-blocking enqueue. Returns false when the message was dropped because
   * the channel is full, the program was cancelled, or shutdown finished.
   */
  deliver(msg: Msg | ErrorMsg): boolean {
    if (this.stopped || this.signal.aborted) {
      this.logger.debug('Executor cancelled, dropping message');
      return false;
    }
    if (!this.channel.trySend(msg)) {
      this.logger.warn('Message channel full, dropping message');
      return false;
    }
    return true;
  }

  /**
   * Cancel every timer, then wait for all tasks, including batch fan-outs
   * spawned while waiting. Nothing is delivered after this resolves.
   */
  async shutdown(): Promise<void> {
    if (this.stopped) return;
    this.shuttingDown = true;

    for (const timer of this.timers.values()) {
      timer.controller.abort();
    }

    while (this.tasks.size > 0) {
      await Promise.allSettled([...this.tasks]);
    }

    this.stopped = true;
    this.logger.debug('Executor shut down');
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch((error: unknown) => {
        this.logger.error('Executor task failed', error);
      })
      .finally(() => {
        this.tasks.delete(tracked);
      });
    this.tasks.add(tracked);
  }

  private async dispatch(cmd: Command<Msg>): Promise<void> {
    if (typeof cmd === 'function') {
      await this.runCmd(cmd);
      return;
    }

    switch (cmd.type) {
      case 'batch':
        this.runBatch(cmd);
        return;
      case 'every':
        await this.runTimer(cmd);
        return;
    }
  }

  private async runCmd(cmd: Cmd<Msg>): Promise<void> {
    let msg: Msg | null;
    try {
      msg = await cmd(this.signal);
    } catch (error) {
      if (this.signal.aborted) {
        this.logger.debug('Command ended after cancellation', error);
        return;
      }
      this.logger.debug('Command failed', error);
      this.deliver(errorMsg(error));
      return;
    }

    if (msg !== null && msg !== undefined) {
      this.deliver(msg);
    }
  }

  private runBatch(cmd: BatchCmd<Msg>): void {
    for (const sub of cmd.cmds) {
      this.execute(sub);
    }
  }

  private async runTimer(cmd: EveryCmd<Msg>): Promise<void> {
    if (this.shuttingDown) {
      this.logger.debug('Executor shutting down, not starting timer');
      return;
    }

    const registration: TimerRegistration = {
      id: this.nextTimerId++,
      controller: new AbortController()
    };
    const { signal } = registration.controller;
    const cancel = (): void => registration.controller.abort();
    this.signal.addEventListener('abort', cancel, { once: true });
    if (this.signal.aborted) cancel();
    this.timers.set(registration.id, registration);
    this.logger.debug(`Timer ${registration.id} started`, { intervalMs: cmd.intervalMs });

    try {
      for await (const _ of interval(cmd.intervalMs, undefined, { signal })) {
        let msg: Msg;
        try {
          msg = cmd.fn(new Date());
        } catch (error) {
          this.deliver(errorMsg(error));
          continue;
        }
        this.deliver(msg);
      }
    } catch (error) {
      if (!signal.aborted) throw error;
    } finally {
      this.signal.removeEventListener('abort', cancel);
      this.timers.delete(registration.id);
      this.logger.debug(`Timer ${registration.id} stopped`);
    }
  }
}

function errorMsg(error: unknown): ErrorMsg {
  return { type: 'error', error: new CommandError(error) };
}
