/**
 * Shared logger for the doc sample tester.
 *
 * Every level is written to stderr so stdout stays reserved for the run
 * summary the CLI prints. Lines look like:
 *
 *   [2026-01-01T00:00:00.000Z] [WARN] [doctester:extractor] Failed to read docs/a.mdx {"code":"EACCES"}
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const VALID_LOG_LEVELS: readonly string[] = Object.keys(LOG_LEVELS);

function isValidLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && VALID_LOG_LEVELS.includes(value);
}

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  /** Where formatted lines go. Defaults to console.error. */
  sink?: LogSink;
}

/**
 * JSON replacer that serializes Error objects (whose properties are non-enumerable).
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const obj: Record<string, unknown> = { message: value.message, name: value.name };
    if (value.stack) obj.stack = value.stack;
    if ('code' in value) obj.code = value.code;
    return obj;
  }
  return value;
}

const defaultSink: LogSink = (line) => console.error(line);

export class Logger {
  private level: LogLevel;
  private context: string;
  private sink: LogSink;

  constructor(context: string = 'doctester', options: LoggerOptions = {}) {
    this.context = context;
    const envLevel = process.env.LOG_LEVEL;
    this.level = options.level ?? (isValidLogLevel(envLevel) ? envLevel : 'info');
    this.sink = options.sink ?? defaultSink;
  }

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private emit(level: Exclude<LogLevel, 'silent'>, message: string, data?: unknown): void {
    if (!this.shouldLog(level)) return;
    const timestamp = new Date().toISOString();
    let line = `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (data !== undefined) {
      line += ` ${JSON.stringify(data, errorReplacer)}`;
    }
    this.sink(line);
  }

  debug(message: string, data?: unknown): void {
    this.emit('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.emit('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.emit('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.emit('error', message, data);
  }

  /**
   * Create a child logger whose context is `parent:child`.
   * The child shares the parent's level and sink at creation time.
   */
  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, { level: this.level, sink: this.sink });
  }

  setContext(context: string): void {
    this.context = context;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

/** Default logger instance */
export const logger = new Logger();
