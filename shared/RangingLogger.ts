/**
 * Ranging Logger
 * Scoped electron-log loggers for every module, console + optional file output
 */

import * as path from 'path';
import log from 'electron-log/node';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';
export type LevelOption = LogLevel | false;

export interface LoggingOptions {
  consoleLevel: LevelOption;
  fileLevel: LevelOption;
  /** Directory for the log file; file output stays off without it */
  fileDir: string | null;
}

export interface RangingLog {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'];

export function parseLogLevel(value: string | undefined, fallback: LevelOption): LevelOption {
  if (value === undefined || value === '') return fallback;
  if (value === 'off' || value === 'false') return false;
  const match = LOG_LEVELS.find(level => level === value);
  return match ?? fallback;
}

function defaultOptions(): LoggingOptions {
  const isTest = process.env.NODE_ENV === 'test';
  return {
    consoleLevel: parseLogLevel(process.env.LOG_LEVEL, isTest ? 'warn' : 'info'),
    fileLevel: parseLogLevel(process.env.LOG_FILE_LEVEL, false),
    fileDir: process.env.LOG_DIR || null,
  };
}

let logFilePath = '';

export function configureLogging(options: LoggingOptions): void {
  log.transports.console.level = options.consoleLevel;
  log.transports.console.format = '[{h}:{i}:{s}.{ms}] [{level}] {scope} {text}';

  if (options.fileDir && options.fileLevel !== false) {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    logFilePath = path.join(options.fileDir, `uwb-ranging-${timestamp}.log`);
    log.transports.file.resolvePathFn = () => logFilePath;
    log.transports.file.level = options.fileLevel;
  } else {
    logFilePath = '';
    log.transports.file.level = false;
  }
}

export function getLogPath(): string {
  return logFilePath;
}

configureLogging(defaultOptions());

export function createLogger(scope: string): RangingLog {
  return log.scope(scope);
}

export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map(b => b.toString(16).toUpperCase().padStart(2, '0'))
    .join(' ');
}
