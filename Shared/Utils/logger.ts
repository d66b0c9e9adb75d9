/**
 * Shared logger for the code runner packages.
 * Every level goes to stderr so stdout stays free for the process's own output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

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

function formatFromEnv(value: string | undefined): LogFormat {
  return value === 'json' ? 'json' : 'text';
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

export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private readonly context: string;

  constructor(context: string = 'coderunner') {
    this.context = context;
    const envLevel = process.env.LOG_LEVEL;
    this.level = isValidLogLevel(envLevel) ? envLevel : 'info';
    this.format = formatFromEnv(process.env.LOG_FORMAT);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();

    if (this.format === 'json') {
      const entry: Record<string, unknown> = { time: timestamp, level, context: this.context, msg: message };
      if (data !== undefined) entry.data = data;
      return JSON.stringify(entry, errorReplacer);
    }

    const base = `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (data !== undefined) {
      return `${base} ${JSON.stringify(data, errorReplacer)}`;
    }
    return base;
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (this.shouldLog(level)) {
      console.error(this.formatMessage(level, message, data));
    }
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  /**
   * Create a child logger with additional context.
   * The child starts from the parent's current level and format.
   */
  child(context: string): Logger {
    const child = new Logger(`${this.context}:${context}`);
    child.level = this.level;
    child.format = this.format;
    return child;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setFormat(format: LogFormat): void {
    this.format = format;
  }

  getFormat(): LogFormat {
    return this.format;
  }
}
