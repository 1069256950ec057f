/**
 * Shared diagnostic logger for the sandbox packages.
 *
 * Every level is written to stderr: stdout belongs to the line-delimited
 * JSON protocol and must never carry a log line.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Receives one fully formatted line (without trailing newline). */
export type LogSink = (line: string) => void;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const VALID_LOG_LEVELS: readonly string[] = ['debug', 'info', 'warn', 'error'];

function isValidLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && VALID_LOG_LEVELS.includes(value);
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

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

function levelFromEnv(): LogLevel {
  const envLevel = process.env.SANDBOX_LOG_LEVEL ?? process.env.LOG_LEVEL;
  return isValidLogLevel(envLevel) ? envLevel : 'info';
}

export class Logger {
  private level: LogLevel;
  private context: string;
  private sink: LogSink;

  constructor(context: string = 'sandbox', sink: LogSink = stderrSink) {
    this.context = context;
    this.sink = sink;
    this.level = levelFromEnv();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const base = `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (data !== undefined) {
      return `${base} ${JSON.stringify(data, errorReplacer)}`;
    }
    return base;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (this.shouldLog(level)) {
      this.sink(this.formatMessage(level, message, data));
    }
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

  /**
   * Create a child logger with additional context. The child shares the
   * parent's level and sink at the time of creation.
   */
  child(context: string): Logger {
    const child = new Logger(`${this.context}:${context}`, this.sink);
    child.level = this.level;
    return child;
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

  /** Redirect output, e.g. to collect lines in tests. */
  setSink(sink: LogSink): void {
    this.sink = sink;
  }
}
