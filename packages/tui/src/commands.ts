/**
 * Command helpers
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { BatchCmd, Cmd, Command, EveryCmd, QuitMsg } from './types.js';

/**
 * Create a batch command that runs multiple commands concurrently.
 * Null entries are skipped.
 */
export function batch<Msg>(...cmds: Array<Command<Msg> | null | undefined>): BatchCmd<Msg> {
  return {
    type: 'batch',
    cmds
  };
}

/**
 * Quit command - returns a quit message
 */
export function quit(): Cmd<QuitMsg> {
  return () => ({ type: 'quit' });
}

/**
 * Tick command - fires once after a delay
 */
export function tick<Msg>(delayMs: number, fn: (time: Date) => Msg): Cmd<Msg> {
  return async (signal) => {
    await sleep(delayMs, undefined, { signal });
    return fn(new Date());
  };
}

/**
 * Every - creates a recurring command at the specified interval.
 * Runs until the program shuts down.
 */
export function every<Msg>(intervalMs: number, fn: (time: Date) => Msg): EveryCmd<Msg> {
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new RangeError(`every() interval must be positive, got ${intervalMs}`);
  }
  return {
    type: 'every',
    intervalMs,
    fn
  };
}

/**
 * Sequence commands - run commands one after another; the first message wins
 */
export function sequence<Msg>(...cmds: Cmd<Msg>[]): Cmd<Msg> {
  return async (signal) => {
    for (const cmd of cmds) {
      if (signal.aborted) return null;
      const result = await cmd(signal);
      if (result !== null) return result;
    }
    return null;
  };
}

/**
 * Map - transform the result of a command
 */
export function map<MsgA, MsgB>(cmd: Cmd<MsgA>, fn: (msg: MsgA) => MsgB): Cmd<MsgB> {
  return async (signal) => {
    const result = await cmd(signal);
    if (result === null) return null;
    return fn(result);
  };
}
