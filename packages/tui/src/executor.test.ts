/**
 * Command executor tests
 *
 * Timers here are real: the executor waits on node:timers/promises, which
 * fake timers do not drive.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { describe, it, expect } from 'vitest';
import { MessageChannel } from './channel.js';
import { batch, every, tick } from './commands.js';
import { CommandError } from './errors.js';
import { CommandExecutor } from './executor.js';
import { Logger } from './logger.js';
import type { Cmd, ErrorMsg } from './types.js';

type Msg = { type: 'n'; n: number };

function setup(capacity: number = 100) {
  const channel = new MessageChannel<Msg | ErrorMsg>(capacity);
  const controller = new AbortController();
  const executor = new CommandExecutor<Msg>(channel, controller.signal, Logger.silent());
  return { channel, controller, executor };
}

function counted(n: number, calls: number[]): Cmd<Msg> {
  return () => {
    calls.push(n);
    return { type: 'n', n };
  };
}

function numbers(messages: Array<Msg | ErrorMsg>): number[] {
  return messages.flatMap((msg) => (msg.type === 'n' ? [msg.n] : [])).sort((a, b) => a - b);
}

describe('CommandExecutor', () => {
  it('should run every command of a batch exactly once', async () => {
    const { channel, executor } = setup();
    const calls: number[] = [];

    executor.execute(batch(counted(1, calls), counted(2, calls), counted(3, calls)));
    await executor.shutdown();

    expect(calls.sort()).toEqual([1, 2, 3]);
    expect(numbers(channel.drain())).toEqual([1, 2, 3]);
  });

  it('should flatten nested batches', async () => {
    const { channel, executor } = setup();
    const calls: number[] = [];

    executor.execute(batch(counted(1, calls), batch(counted(2, calls), batch(counted(3, calls)))));
    await executor.shutdown();

    expect(calls.sort()).toEqual([1, 2, 3]);
    expect(numbers(channel.drain())).toEqual([1, 2, 3]);
  });

  it('should skip null commands and null results', async () => {
    const { channel, executor } = setup();
    const calls: number[] = [];

    executor.execute(null);
    executor.execute(undefined);
    executor.execute(batch<Msg>(null, undefined, () => null, counted(7, calls)));
    await executor.shutdown();

    expect(channel.drain()).toEqual([{ type: 'n', n: 7 }]);
  });

  it('should wait for asynchronous commands', async () => {
    const { channel, executor } = setup();

    executor.execute(async () => {
      await sleep(20);
      return { type: 'n', n: 1 };
    });
    expect(executor.pending).toBe(1);
    await executor.shutdown();

    expect(executor.pending).toBe(0);
    expect(channel.drain()).toEqual([{ type: 'n', n: 1 }]);
  });

  it('should turn a throwing command into an error message', async () => {
    const { channel, executor } = setup();

    executor.execute(() => {
      throw new Error('boom');
    });
    executor.execute(async () => {
      throw new Error('async boom');
    });
    await executor.shutdown();

    const messages = channel.drain();
    expect(messages).toHaveLength(2);
    for (const msg of messages) {
      expect(msg.type).toBe('error');
      if (msg.type === 'error') {
        expect(msg.error).toBeInstanceOf(CommandError);
      }
    }
    expect(messages.map((msg) => (msg.type === 'error' ? msg.error.message : '')).sort()).toEqual([
      'command failed: async boom',
      'command failed: boom'
    ]);
  });

  it('should drop messages that arrive after cancellation', async () => {
    const { channel, controller, executor } = setup();

    executor.execute(async () => {
      await sleep(20);
      return { type: 'n', n: 1 };
    });
    controller.abort();
    await executor.shutdown();

    expect(channel.size).toBe(0);
  });

  it('should cut a pending tick short on cancellation', async () => {
    const { channel, controller, executor } = setup();

    executor.execute(tick<Msg>(10_000, () => ({ type: 'n', n: 1 })));
    const started = Date.now();
    controller.abort();
    await executor.shutdown();

    expect(Date.now() - started).toBeLessThan(1000);
    expect(channel.size).toBe(0);
  });

  it('should drop messages when the channel is full', async () => {
    const { channel, executor } = setup(1);
    const calls: number[] = [];

    executor.execute(batch(counted(1, calls), counted(2, calls), counted(3, calls)));
    await executor.shutdown();

    expect(calls).toHaveLength(3);
    expect(channel.size).toBe(1);
  });

  it('should deliver every tick until shutdown, then stay silent', async () => {
    const { channel, controller, executor } = setup(1000);
    let fired = 0;

    executor.execute(every<Msg>(10, () => ({ type: 'n', n: ++fired })));
    expect(executor.activeTimers).toBe(1);

    await sleep(200);
    controller.abort();
    await executor.shutdown();

    expect(executor.activeTimers).toBe(0);
    const delivered = channel.drain().length;
    expect(delivered).toBeGreaterThanOrEqual(5);
    const firedAtShutdown = fired;

    await sleep(50);
    expect(channel.size).toBe(0);
    expect(fired).toBe(firedAtShutdown);
  });

  it('should report a throwing timer callback and keep ticking', async () => {
    const { channel, controller, executor } = setup(1000);
    let calls = 0;

    executor.execute(every<Msg>(10, () => {
      calls++;
      if (calls === 1) throw new Error('first tick');
      return { type: 'n', n: calls };
    }));

    await sleep(100);
    controller.abort();
    await executor.shutdown();

    const messages = channel.drain();
    expect(messages[0]).toMatchObject({ type: 'error' });
    expect(messages.length).toBeGreaterThan(1);
  });

  it('should ignore commands after shutdown', async () => {
    const { channel, executor } = setup();
    await executor.shutdown();

    const calls: number[] = [];
    executor.execute(counted(1, calls));
    executor.execute(every<Msg>(10, () => ({ type: 'n', n: 0 })));

    expect(calls).toEqual([]);
    expect(executor.pending).toBe(0);
    expect(executor.activeTimers).toBe(0);
    expect(channel.size).toBe(0);
  });
});
