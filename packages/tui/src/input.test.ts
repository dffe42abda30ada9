/**
 * Terminal input tests
 */

import { EventEmitter } from 'node:events';
import { describe, it, expect } from 'vitest';
import { TerminalInput, parseInput } from './input.js';
import { runeKey, specialKey } from './keys.js';
import type { InputMsg, InputSink } from './types.js';

class FakeStdin extends EventEmitter {
  isTTY = true;
  readonly rawMode: boolean[] = [];
  paused = true;

  setRawMode(mode: boolean): this {
    this.rawMode.push(mode);
    return this;
  }

  setEncoding(_encoding: BufferEncoding): this {
    return this;
  }

  resume(): this {
    this.paused = false;
    return this;
  }

  pause(): this {
    this.paused = true;
    return this;
  }
}

class FakeStdout extends EventEmitter {
  columns = 100;
  rows = 40;
  readonly written: string[] = [];

  write(chunk: string): boolean {
    this.written.push(chunk);
    return true;
  }
}

class RecordingSink implements InputSink {
  readonly messages: InputMsg[] = [];
  readonly motions: Array<[number, number]> = [];
  readonly sizes: Array<[number, number]> = [];
  quits = 0;

  dispatch(msg: InputMsg): void {
    this.messages.push(msg);
  }

  motion(x: number, y: number): void {
    this.motions.push([x, y]);
  }

  resize(width: number, height: number): void {
    this.sizes.push([width, height]);
  }

  quit(): void {
    this.quits++;
  }
}

describe('parseInput', () => {
  it('should group printable characters', () => {
    expect(parseInput('abc')).toEqual([runeKey('abc')]);
    expect(parseInput('a😀')).toEqual([{ type: 'key', key: 'runes', runes: ['a', '😀'], alt: false }]);
  });

  it('should decode control keys', () => {
    expect(parseInput('\x03')).toEqual([specialKey('ctrl+c')]);
    expect(parseInput('\x04\x0c\x1a')).toEqual([
      specialKey('ctrl+d'),
      specialKey('ctrl+l'),
      specialKey('ctrl+z')
    ]);
    expect(parseInput('\r')).toEqual([specialKey('enter')]);
    expect(parseInput('\x7f')).toEqual([specialKey('backspace')]);
    expect(parseInput('\t')).toEqual([specialKey('tab')]);
  });

  it('should split mixed chunks in order', () => {
    expect(parseInput('ab\rc')).toEqual([runeKey('ab'), specialKey('enter'), runeKey('c')]);
    expect(parseInput('a\x1b[Bb')).toEqual([runeKey('a'), specialKey('down'), runeKey('b')]);
  });

  it('should decode CSI and SS3 keys', () => {
    expect(parseInput('\x1b[A\x1b[C')).toEqual([specialKey('up'), specialKey('right')]);
    expect(parseInput('\x1b[H\x1b[4~')).toEqual([specialKey('home'), specialKey('end')]);
    expect(parseInput('\x1b[5~\x1b[6~')).toEqual([specialKey('pgup'), specialKey('pgdown')]);
    expect(parseInput('\x1b[2~\x1b[3~')).toEqual([specialKey('insert'), specialKey('delete')]);
    expect(parseInput('\x1bOP\x1b[15~\x1b[24~')).toEqual([
      specialKey('f1'),
      specialKey('f5'),
      specialKey('f12')
    ]);
    expect(parseInput('\x1b[Z')).toEqual([specialKey('shift+tab')]);
  });

  it('should read the alt modifier', () => {
    expect(parseInput('\x1b[1;3B')).toEqual([specialKey('down', true)]);
    expect(parseInput('\x1b[1;5B')).toEqual([specialKey('down')]);
    expect(parseInput('\x1bx')).toEqual([runeKey('x', true)]);
    expect(parseInput('\x1b\x7f')).toEqual([specialKey('backspace', true)]);
  });

  it('should decode a lone escape', () => {
    expect(parseInput('\x1b')).toEqual([specialKey('esc')]);
    expect(parseInput('\x1b\x1b')).toEqual([specialKey('esc'), specialKey('esc')]);
  });

  it('should drop unknown and truncated sequences', () => {
    expect(parseInput('\x1b[99~')).toEqual([]);
    expect(parseInput('a\x1b[1;')).toEqual([runeKey('a')]);
  });

  it('should decode SGR mouse reports with zero-based cells', () => {
    expect(parseInput('\x1b[<0;5;3M\x1b[<0;5;3m')).toEqual([
      { type: 'mouse', x: 4, y: 2, action: 'press', button: 'left' },
      { type: 'mouse', x: 4, y: 2, action: 'release', button: 'left' }
    ]);
    expect(parseInput('\x1b[<2;1;1M')).toEqual([
      { type: 'mouse', x: 0, y: 0, action: 'press', button: 'right' }
    ]);
    expect(parseInput('\x1b[<64;1;1M\x1b[<65;1;1M')).toEqual([
      { type: 'mouse', x: 0, y: 0, action: 'wheel', button: 'wheelUp' },
      { type: 'mouse', x: 0, y: 0, action: 'wheel', button: 'wheelDown' }
    ]);
    expect(parseInput('\x1b[<35;10;2M\x1b[<32;2;2M')).toEqual([
      { type: 'mouse', x: 9, y: 1, action: 'motion', button: 'none' },
      { type: 'mouse', x: 1, y: 1, action: 'motion', button: 'left' }
    ]);
  });
});

describe('TerminalInput', () => {
  function setup(mouse: boolean = false) {
    const stdin = new FakeStdin();
    const stdout = new FakeStdout();
    const sink = new RecordingSink();
    const input = new TerminalInput({ stdin, stdout, mouse, handleSignals: false });
    return { stdin, stdout, sink, input };
  }

  it('should put the terminal in raw mode while started', () => {
    const { stdin, sink, input } = setup();
    input.start(sink);
    expect(stdin.rawMode).toEqual([true]);
    expect(stdin.paused).toBe(false);

    input.stop();
    expect(stdin.rawMode).toEqual([true, false]);
    expect(stdin.paused).toBe(true);
    expect(stdin.listenerCount('data')).toBe(0);
  });

  it('should forward keys, clicks and motion to the sink', () => {
    const { stdin, sink, input } = setup();
    input.start(sink);

    stdin.emit('data', 'q\x1b[<0;3;4M\x1b[<35;3;4M');

    expect(sink.messages).toEqual([
      runeKey('q'),
      { type: 'mouse', x: 2, y: 3, action: 'press', button: 'left' }
    ]);
    expect(sink.motions).toEqual([[2, 3]]);
  });

  it('should report terminal resizes', () => {
    const { stdout, sink, input } = setup();
    input.start(sink);

    stdout.columns = 120;
    stdout.emit('resize');
    expect(sink.sizes).toEqual([[120, 40]]);

    input.stop();
    stdout.emit('resize');
    expect(sink.sizes).toHaveLength(1);
  });

  it('should ask to quit when input ends', () => {
    const { stdin, sink, input } = setup();
    input.start(sink);
    stdin.emit('end');
    expect(sink.quits).toBe(1);
  });

  it('should toggle mouse reporting', () => {
    const { stdout, sink, input } = setup(true);
    input.start(sink);
    input.stop();
    expect(stdout.written).toEqual(['\x1b[?1003h\x1b[?1006h', '\x1b[?1003l\x1b[?1006l']);
  });

  it('should register signal handlers only while started', () => {
    const stdin = new FakeStdin();
    const stdout = new FakeStdout();
    const input = new TerminalInput({ stdin, stdout });
    const before = process.listenerCount('SIGTERM');

    input.start(new RecordingSink());
    expect(process.listenerCount('SIGTERM')).toBe(before + 1);
    input.stop();
    expect(process.listenerCount('SIGTERM')).toBe(before);
  });
});
