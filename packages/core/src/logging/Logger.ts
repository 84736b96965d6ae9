/**
 * Logger - Lightweight logging for keel
 *
 * - Levels: silent, errors, warnings, info, debug
 * - Optional structured context appended as JSON
 * - Console output, a per-run log file, or both (MultiLogger)
 * - Scoped child loggers that tag every line with plugin/instance
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Loading configuration', { path: 'keel.yml' });
 *
 *   const scoped = withContext(logger, { plugin: 'series', instance: 'main' });
 *   scoped.debug('Instance configuration:');
 */

import { createWriteStream, writeFileSync, mkdirSync, accessSync, existsSync, statSync, constants, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';
import { LOG_LEVELS, type Logger, type LogLevel } from '@keel/types';

export type { Logger, LogLevel };

type LogContext = Record<string, unknown>;

/** Logger methods, each shown from the level of the same index in LOG_LEVELS on */
type LogMethod = 'error' | 'warn' | 'info' | 'debug';

const METHOD_PRIORITY: Record<LogMethod, number> = {
  error: LOG_LEVELS.indexOf('errors'),
  warn: LOG_LEVELS.indexOf('warnings'),
  info: LOG_LEVELS.indexOf('info'),
  debug: LOG_LEVELS.indexOf('debug'),
};

const PREFIX: Record<LogMethod, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * JSON.stringify that prints repeated objects as "[Circular]"
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) return '[Circular]';
      seen.add(value);
    }
    return value;
  });
}

/**
 * Message with its context appended as JSON, when there is any.
 */
export function formatMessage(message: string, context?: LogContext): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${safeStringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Level filtering shared by the console and file loggers. Subclasses only
 * decide where a line that passed the threshold goes.
 */
abstract class LevelLogger implements Logger {
  private readonly priority: number;

  constructor(logLevel: LogLevel) {
    this.priority = LOG_LEVELS.indexOf(logLevel);
  }

  protected abstract write(method: LogMethod, line: string): void;

  private log(method: LogMethod, message: string, context?: LogContext): void {
    if (this.priority < METHOD_PRIORITY[method]) return;
    this.write(method, formatMessage(`[${PREFIX[method]}] ${message}`, context));
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
}

/**
 * Writes through console.error / warn / info / debug.
 */
export class ConsoleLogger extends LevelLogger {
  constructor(logLevel: LogLevel = 'info') {
    super(logLevel);
  }

  protected write(method: LogMethod, line: string): void {
    console[method](line);
  }
}

/**
 * Writes ISO-timestamped lines to a file, truncated on construction.
 * Parent directories are created.
 *
 * Throws on construction when the directory is not writable or the path is
 * a directory.
 */
export class FileLogger extends LevelLogger {
  private readonly stream: WriteStream;
  private streamFailed = false;

  constructor(logLevel: LogLevel, filePath: string) {
    super(logLevel);
    const resolvedPath = resolve(filePath);

    const dir = dirname(resolvedPath);
    mkdirSync(dir, { recursive: true });

    try {
      accessSync(dir, constants.W_OK);
    } catch {
      throw new Error(`Cannot write log file: directory '${dir}' is not writable`);
    }

    if (existsSync(resolvedPath) && statSync(resolvedPath).isDirectory()) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    writeFileSync(resolvedPath, '');
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    this.stream.on('error', (err) => {
      // Reported once; the run goes on without the file
      if (this.streamFailed) return;
      this.streamFailed = true;
      console.error(`[ERROR] Log file write failed: ${err.message}`);
    });
  }

  protected write(_method: LogMethod, line: string): void {
    if (this.streamFailed) return;
    this.stream.write(`${new Date().toISOString()} ${line}\n`);
  }

  /** Resolves once everything written so far is flushed */
  close(): Promise<void> {
    return new Promise((resolve) => {
      this.stream.end(resolve);
    });
  }
}

/**
 * Sends every call to each inner logger; each applies its own level.
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

  /** Closes the file loggers among the inner loggers */
  async close(): Promise<void> {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) {
        await logger.close();
      }
    }
  }
}

/**
 * Child logger that merges a fixed context into every message.
 * Per-call context keys win over the scope's keys.
 */
export class ScopedLogger implements Logger {
  constructor(
    private readonly parent: Logger,
    private readonly scope: LogContext
  ) {}

  private merge(context?: LogContext): LogContext {
    return { ...this.scope, ...context };
  }

  error(message: string, context?: LogContext): void {
    this.parent.error(message, this.merge(context));
  }

  warn(message: string, context?: LogContext): void {
    this.parent.warn(message, this.merge(context));
  }

  info(message: string, context?: LogContext): void {
    this.parent.info(message, this.merge(context));
  }

  debug(message: string, context?: LogContext): void {
    this.parent.debug(message, this.merge(context));
  }
}

/**
 * Scope a logger to a plugin/instance (or any other fixed context).
 */
export function withContext(logger: Logger, scope: LogContext): Logger {
  return new ScopedLogger(logger, scope);
}

/**
 * Logger that drops everything. Default for library callers that pass none.
 */
export const silentLogger: Logger = new ConsoleLogger('silent');

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
