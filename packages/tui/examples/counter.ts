#!/usr/bin/env node
/**
 * Simple counter example using @gridloop/tui
 */

import {
  Program,
  TerminalInput,
  TerminalSurface,
  keyString,
  quit,
  type App
} from '../src/index.js';

// Define the model (application state)
interface Model {
  count: number;
  clicks: number;
}

const app: App<Model> = {
  // Initialize the model
  init: () => [{ count: 0, clicks: 0 }],

  // Update function - handles state changes
  update: (model, msg) => {
    switch (msg.type) {
      case 'key':
        switch (keyString(msg)) {
          case 'q':
          case 'ctrl+c':
            return [model, quit()];
          case '+':
          case '=':
          case 'up':
            return [{ ...model, count: model.count + 1 }];
          case '-':
          case '_':
          case 'down':
            return [{ ...model, count: model.count - 1 }];
          case 'r':
            return [{ ...model, count: 0 }];
          default:
            return [model];
        }

      case 'mouse':
        if (msg.action === 'press') {
          return [{ ...model, clicks: model.clicks + 1 }];
        }
        return [model];

      default:
        return [model];
    }
  },

  // View function - renders the UI
  view: (model) => `
┌─────────────────────────────────────────┐
│           \x1b[1mCounter Example\x1b[0m               │
├─────────────────────────────────────────┤
│                                         │
│         Count: \x1b[36m${model.count.toString().padStart(4)}\x1b[0m                     │
│         Clicks: ${model.clicks.toString().padStart(3)}                     │
│                                         │
├─────────────────────────────────────────┤
│  Controls:                              │
│    +/=/↑  : Increment                   │
│    -/_/↓  : Decrement                   │
│    r      : Reset                       │
│    q      : Quit                        │
└─────────────────────────────────────────┘
  `.trim()
};

// Create and run the program
const program = new Program(app, {
  surface: new TerminalSurface(),
  input: new TerminalInput({ mouse: true })
}, { title: 'Counter Example' });

program.run().then(
  (model) => {
    console.log(`Final count: ${model.count}`);
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
