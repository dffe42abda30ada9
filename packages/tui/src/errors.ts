/**
 * Error types raised by the runtime
 */

export type ErrorCode =
  | 'CONFIGURATION'
  | 'RENDER'
  | 'COMMAND'
  | 'TRANSITION'
  | 'ATLAS';

/**
 * Base class for every error the runtime raises itself
 */
export class GridloopError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Invalid startup options. Raised before any resource is acquired.
 */
export class ConfigurationError extends GridloopError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIGURATION', `invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * A single frame could not be drawn
 */
export class RenderError extends GridloopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RENDER', message, options);
  }
}

/**
 * A command body threw or rejected
 */
export class CommandError extends GridloopError {
  constructor(cause: unknown) {
    super('COMMAND', `command failed: ${getErrorMessage(cause)}`, { cause });
  }
}

export type TransitionPhase = 'init' | 'update' | 'view';

/**
 * A fault inside init, update or view
 */
export class TransitionError extends GridloopError {
  readonly phase: TransitionPhase;

  constructor(phase: TransitionPhase, cause: unknown) {
    super('TRANSITION', `${phase}() failed: ${getErrorMessage(cause)}`, { cause });
    this.phase = phase;
  }
}

export class AtlasError extends GridloopError {
  constructor(message: string) {
    super('ATLAS', message);
  }
}

/**
 * Safely extracts the message from an error object
 * Works with both Error objects and unknown types
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error && typeof error === 'object' && 'message' in error &&
      typeof error.message === 'string') {
    return error.message;
  }

  return String(error);
}
