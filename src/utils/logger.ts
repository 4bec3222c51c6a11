/**
 * Line logger used by the store and the CLI.
 *
 * Writes `[timestamp] LEVEL message` lines to the console and, when a log
 * file is configured, appends them there as well.
 *
 * @module utils/logger
 */

import { appendFile } from 'fs/promises';
import { expandPath } from './platform.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Logger interface accepted by the store
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Logger returned by createLogger
 */
export interface LineLogger extends Logger {
  /** Resolves once every queued log file append has finished */
  flush(): Promise<void>;
}

/**
 * Options for createLogger
 */
export interface LoggerOptions {
  /** Lowest level that is written (default: 'info') */
  level?: LogLevel;

  /** Optional file that receives a copy of every line */
  logFile?: string;

  /** Receives formatted lines; defaults to console.log / console.error */
  sink?: (line: string, level: LogLevel) => void;

  /** Clock for timestamps */
  now?: () => Date;
}

/**
 * A logger that drops every message
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

function consoleSink(line: string, level: LogLevel): void {
  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Formats a single log line
 */
export function formatLogLine(level: LogLevel, message: string, at: Date): string {
  return `[${at.toISOString()}] ${level.toUpperCase()} ${message}`;
}

/**
 * Creates a logger.
 *
 * File appends are queued so lines keep their order. The first failed
 * append is reported on the console and file logging is then switched off.
 */
export function createLogger(options: LoggerOptions = {}): LineLogger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const sink = options.sink ?? consoleSink;
  const now = options.now ?? (() => new Date());
  let logFile = options.logFile ? expandPath(options.logFile) : null;
  let fileQueue: Promise<void> = Promise.resolve();

  const toFile = (line: string): void => {
    const target = logFile;
    if (!target) return;

    fileQueue = fileQueue
      .then(() => appendFile(target, line + '\n'))
      .catch((err: unknown) => {
        if (logFile === null) return;
        logFile = null;
        const reason = err instanceof Error ? err.message : String(err);
        console.error(`Log file ${target} disabled: ${reason}`);
      });
  };

  const write = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) return;

    const line = formatLogLine(level, message, now());
    sink(line, level);
    toFile(line);
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
    flush: () => fileQueue,
  };
}
