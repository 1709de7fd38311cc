/**
 * Logger - leveled logging for luaprobe
 *
 * The analysis engine only ever receives a Logger; it never writes to the
 * console itself. The CLI decides where logs go.
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Analyzed chunk', { functions: 12 });
 *
 *   // Console plus a debug-level log file:
 *   const logger = createLogger('warnings', { logFile: 'out/luaprobe.log' });
 */

import { createWriteStream, mkdirSync, statSync, writeFileSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';

export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

type Method = keyof Logger;

/** Verbosity at which each method starts emitting */
const METHOD_PRIORITY: Record<Method, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 4,
};

const METHOD_TAG: Record<Method, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * JSON.stringify that tolerates cycles and bigint values (constant pools
 * carry 64-bit integers as bigint).
 */
function stringifyContext(context: LogContext): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(context, (_key, value: unknown) => {
    if (typeof value === 'bigint') return value.toString();
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) return '[Circular]';
      seen.add(value);
    }
    return value;
  });
}

export function formatLogLine(message: string, context?: LogContext): string {
  if (!context || Object.keys(context).length === 0) return message;
  return `${message} ${stringifyContext(context)}`;
}

/**
 * Shared threshold handling; subclasses only decide where a line goes.
 */
abstract class LeveledLogger implements Logger {
  private readonly priority: number;

  constructor(level: LogLevel) {
    this.priority = LOG_LEVELS.indexOf(level);
  }

  protected abstract emit(method: Method, message: string, context?: LogContext): void;

  private log(method: Method, message: string, context?: LogContext): void {
    if (this.priority < METHOD_PRIORITY[method]) return;
    this.emit(method, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }
}

/**
 * Writes every line to stderr; stdout is reserved for reports.
 */
export class ConsoleLogger extends LeveledLogger {
  constructor(level: LogLevel = 'info') {
    super(level);
  }

  protected emit(method: Method, message: string, context?: LogContext): void {
    console.error(formatLogLine(`[${METHOD_TAG[method]}] ${message}`, context));
  }
}

/**
 * Appends timestamped lines to a file, truncated when the logger is created.
 * Parent directories are created as needed.
 */
export class FileLogger extends LeveledLogger {
  private readonly stream: WriteStream;
  private streamError: Error | null = null;

  constructor(level: LogLevel, filePath: string) {
    super(level);
    const resolvedPath = resolve(filePath);

    mkdirSync(dirname(resolvedPath), { recursive: true });

    let isDirectory = false;
    try {
      isDirectory = statSync(resolvedPath).isDirectory();
    } catch {
      // not created yet
    }
    if (isDirectory) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    writeFileSync(resolvedPath, '');
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    this.stream.on('error', (err) => {
      this.streamError ??= err;
    });
  }

  protected emit(method: Method, message: string, context?: LogContext): void {
    const stamp = new Date().toISOString();
    this.stream.write(formatLogLine(`${stamp} [${METHOD_TAG[method]}] ${message}`, context) + '\n');
  }

  /** Flush and close; rejects with the first write error, if any. */
  close(): Promise<void> {
    return new Promise((resolvePromise, reject) => {
      this.stream.end(() => {
        if (this.streamError) reject(this.streamError);
        else resolvePromise();
      });
    });
  }
}

/**
 * Fans every call out to several loggers, each applying its own threshold.
 */
export class MultiLogger implements Logger {
  constructor(private readonly loggers: Logger[]) {}

  error(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  trace(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.trace(message, context);
  }

  async close(): Promise<void> {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) await logger.close();
    }
  }
}

/** Discards everything; the engine default. */
export const silentLogger: Logger = {
  error() {},
  warn() {},
  info() {},
  debug() {},
  trace() {},
};

/**
 * Console logger at `level`; with `logFile`, also a file logger that always
 * records at debug level.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
  }

  return consoleLogger;
}

/** Close a logger created by createLogger if it owns a file. */
export async function closeLogger(logger: Logger): Promise<void> {
  if (logger instanceof MultiLogger || logger instanceof FileLogger) {
    await logger.close();
  }
}
