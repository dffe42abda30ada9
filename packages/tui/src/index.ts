/**
 * @gridloop/tui - Elm-architecture UI runtime for TypeScript/Node.js
 *
 * Views are strings with ANSI styling; the runtime parses them into a cell
 * grid, diffs it against the previous frame and hands the changed regions to
 * a surface.
 */

export { Program, type Frontend, type ProgramStatus } from './program.js';
export { TerminalSurface, type OutputStream, type TerminalSurfaceOptions } from './renderer.js';
export {
  TerminalInput,
  parseInput,
  type InputStream,
  type ResizeStream,
  type TerminalInputOptions
} from './input.js';
export {
  HeadlessSurface,
  HeadlessInput,
  createHeadless,
  type HeadlessSurfaceOptions
} from './headless.js';
export { MessageChannel } from './channel.js';
export { CommandExecutor } from './executor.js';
export { AnsiParser, parseAnsi, MAX_SEQUENCE_LENGTH } from './parser.js';
export { GlyphAtlas, type Bitmap } from './atlas.js';
export { Logger, type LogLevel, type LoggerOptions } from './logger.js';
export {
  resolveProgramOptions,
  ProgramOptionsSchema,
  type ProgramOptions,
  type ProgramOptionsInput,
  type WindowOptions
} from './config.js';
export * from './grid.js';
export * from './colors.js';
export * from './errors.js';
export * from './keys.js';
export * from './commands.js';
export * from './types.js';
