/**
 * Structured Logger
 *
 * A logger handle is passed to the program and the executor explicitly.
 * Console lines go to stderr. An optional JSONL file mirrors every entry.
 */

import fs from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';
import { getErrorMessage } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

export interface LoggerOptions {
  /** Minimum level written to the console sink (default: info) */
  level?: LogLevel;
  /** Disables both sinks when false */
  enabled?: boolean;
  /** Console sink; receives one formatted line without the trailing newline */
  write?: (line: string) => void;
  /** Append entries as JSON lines to this file */
  logFile?: string;
  /** Prefix added to every message */
  scope?: string;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function writeStderr(line: string): void {
  process.stderr.write(line + '\n');
}

export class Logger {
  private level: LogLevel;
  private enabled: boolean;
  private readonly write: (line: string) => void;
  private readonly scope: string | undefined;
  private readonly parent: Logger | null;
  private fileStream: fs.WriteStream | null = null;

  constructor(options: LoggerOptions = {}, parent: Logger | null = null) {
    this.level = options.level ?? 'info';
    this.enabled = options.enabled ?? true;
    this.write = options.write ?? writeStderr;
    this.scope = options.scope;
    this.parent = parent;
    if (options.logFile) {
      this.openLogFile(options.logFile);
    }
  }

  /**
   * Build a logger from GRIDLOOP_LOG_LEVEL / GRIDLOOP_DEBUG
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env, options: LoggerOptions = {}): Logger {
    const requested = env.GRIDLOOP_LOG_LEVEL?.toLowerCase();
    let level: LogLevel = options.level ?? 'info';
    if (requested && isLogLevel(requested)) {
      level = requested;
    }
    if (env.GRIDLOOP_DEBUG) {
      level = 'debug';
    }
    return new Logger({ ...options, level });
  }

  static silent(): Logger {
    return new Logger({ enabled: false });
  }

  /**
   * A logger sharing this one's sinks with an extra message prefix. File
   * entries go through the parent, so closing the parent closes them too.
   */
  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      enabled: this.enabled,
      write: this.write,
      scope: this.scope ? `${this.scope}:${scope}` : scope
    }, this);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.enabled && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  close(): void {
    if (this.fileStream) {
      this.fileStream.end();
      this.fileStream = null;
    }
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.enabled) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: this.scope ? `[${this.scope}] ${message}` : message
    };
    if (data !== undefined) {
      entry.data = data;
    }

    this.appendToFile(entry);

    if (LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level]) {
      this.write(formatConsoleMessage(entry));
    }
  }

  private appendToFile(entry: LogEntry): void {
    if (this.parent) {
      this.parent.appendToFile(entry);
    } else if (this.fileStream) {
      this.fileStream.write(JSON.stringify(entry) + '\n');
    }
  }

  private openLogFile(logFile: string): void {
    try {
      fs.mkdirSync(path.dirname(logFile), { recursive: true });
    } catch (error) {
      this.dropLogFile(error);
      return;
    }

    const stream = fs.createWriteStream(logFile, { flags: 'a' });
    stream.on('error', (error) => {
      if (this.fileStream === stream) {
        this.fileStream = null;
        this.dropLogFile(error);
      }
    });
    this.fileStream = stream;
  }

  /**
   * Console-only from here on
   */
  private dropLogFile(error: unknown): void {
    if (!this.enabled) return;
    this.write(formatConsoleMessage({
      timestamp: new Date().toISOString(),
      level: 'error',
      message: `Log file disabled: ${getErrorMessage(error)}`
    }));
  }
}

export function formatConsoleMessage(entry: LogEntry): string {
  const tag = LEVEL_COLOR[entry.level](`[${entry.level.toUpperCase()}]`);
  const line = `${entry.timestamp} ${tag}: ${entry.message}`;
  return entry.data === undefined ? line : `${line} ${stringifyData(entry.data)}`;
}

function stringifyData(data: unknown): string {
  if (data instanceof Error) {
    return JSON.stringify({ name: data.name, message: data.message });
  }
  try {
    return JSON.stringify(data) ?? String(data);
  } catch {
    return String(data);
  }
}
