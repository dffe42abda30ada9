#!/usr/bin/env node
/**
 * Stopwatch example: tick() scheduling and custom messages
 */

import {
  Program,
  TerminalInput,
  TerminalSurface,
  quit,
  tick,
  type App
} from '../src/index.js';

interface Model {
  running: boolean;
  startedAt: number;
  elapsedMs: number;
}

type TickMsg = { type: 'tick'; time: Date };

const nextTick = () => tick<TickMsg>(100, (time) => ({ type: 'tick', time }));

function formatElapsed(ms: number): string {
  const hours = Math.floor(ms / 3_600_000);
  const minutes = Math.floor(ms / 60_000) % 60;
  const seconds = Math.floor(ms / 1000) % 60;
  const millis = ms % 1000;
  const pad = (value: number, width: number = 2) => value.toString().padStart(width, '0');
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}.${pad(millis, 3)}`;
}

const app: App<Model, TickMsg> = {
  init: () => [{ running: false, startedAt: 0, elapsedMs: 0 }],

  update: (model, msg) => {
    switch (msg.type) {
      case 'key':
        switch (msg.key) {
          case 'esc':
          case 'ctrl+c':
            return [model, quit()];
          case 'enter':
            if (model.running) {
              return [{ ...model, running: false }];
            }
            return [{ ...model, running: true, startedAt: Date.now() - model.elapsedMs }, nextTick()];
          case 'backspace':
            return [{ running: false, startedAt: 0, elapsedMs: 0 }];
          default:
            return [model];
        }

      case 'tick':
        if (!model.running) return [model];
        return [{ ...model, elapsedMs: msg.time.getTime() - model.startedAt }, nextTick()];

      default:
        return [model];
    }
  },

  view: (model) => `Timer Example
=============

Status: ${model.running ? '\x1b[32mRunning\x1b[0m' : '\x1b[31mStopped\x1b[0m'}

Elapsed Time: ${formatElapsed(model.elapsedMs)}

Controls:
  Enter      - Start/Stop
  Backspace  - Reset
  Esc        - Quit
`
};

const program = new Program(app, {
  surface: new TerminalSurface(),
  input: new TerminalInput()
}, { title: 'Timer Example' });

program.run().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
