/**
 * Logger - Lightweight logging for scriptwrap
 *
 * Features:
 * - 5 log levels: silent, errors, warnings, info, debug
 * - Context objects appended as JSON
 * - Console output on stderr (stdout is left to command results)
 * - File output, or both via MultiLogger
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Matched types', { count: 12 });
 *
 *   const logger = createLogger('warnings', { logFile: 'scriptwrap.log' });
 */

import { createWriteStream, mkdirSync, writeFileSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';

export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

type LogMethod = keyof Logger;

/**
 * Log level priorities (higher = more verbose)
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

/**
 * Minimum priority at which each method produces output
 */
const METHOD_PRIORITY: Record<LogMethod, number> = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
};

const METHOD_LABEL: Record<LogMethod, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Format log message with optional context
 */
export function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${JSON.stringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Shared level gate; subclasses only decide where a line goes.
 */
abstract class LevelLogger implements Logger {
  private readonly priority: number;

  constructor(level: LogLevel) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  protected abstract write(label: string, line: string): void;

  private log(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    if (this.priority < METHOD_PRIORITY[method]) return;
    this.write(METHOD_LABEL[method], formatMessage(message, context));
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }
}

/**
 * Console Logger. Every level goes to stderr.
 */
export class ConsoleLogger extends LevelLogger {
  constructor(level: LogLevel = 'info') {
    super(level);
  }

  protected write(label: string, line: string): void {
    console.error(`[${label}] ${line}`);
  }
}

/**
 * File Logger. The file is truncated on construction and written through
 * an append stream with ISO timestamps.
 */
export class FileLogger extends LevelLogger {
  private readonly stream: WriteStream;
  readonly filePath: string;

  constructor(level: LogLevel, filePath: string) {
    super(level);
    this.filePath = resolve(filePath);
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, '');
    this.stream = createWriteStream(this.filePath, { flags: 'a' });
  }

  protected write(label: string, line: string): void {
    this.stream.write(`${new Date().toISOString()} [${label}] ${line}\n`);
  }

  /** Flush and close the write stream. */
  close(): Promise<void> {
    return new Promise((resolvePromise) => {
      this.stream.end(resolvePromise);
    });
  }
}

/**
 * Delegates every call to several loggers, each with its own level.
 */
export class MultiLogger implements Logger {
  private readonly loggers: Logger[];

  constructor(loggers: Logger[]) {
    this.loggers = loggers;
  }

  error(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  /** Close every FileLogger among the inner loggers. */
  async close(): Promise<void> {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) {
        await logger.close();
      }
    }
  }
}

/**
 * Create a Logger with the given console level.
 *
 * With `logFile`, returns a MultiLogger; the file side always logs at
 * 'debug' so the whole run can be inspected afterwards.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
  }

  return consoleLogger;
}

/**
 * Flush file output of a logger returned by createLogger.
 */
export async function closeLogger(logger: Logger): Promise<void> {
  if (logger instanceof MultiLogger || logger instanceof FileLogger) {
    await logger.close();
  }
}

/**
 * A logger that drops everything (library default)
 */
export const silentLogger: Logger = new ConsoleLogger('silent');
