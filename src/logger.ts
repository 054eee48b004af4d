// src/logger.ts
// Module-scoped console logger. One global level, overridable per instance.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LABELS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARN',
  error: 'ERROR',
};

export interface LoggerOptions {
  level?: LogLevel;
  timestamps?: boolean;
}

let globalLevel: LogLevel = 'info';
let globalTimestamps = true;

export class Logger {
  readonly module: string;
  private level: LogLevel | undefined;
  private timestamps: boolean | undefined;

  constructor(module: string, opts: LoggerOptions = {}) {
    this.module = module;
    this.level = opts.level;
    this.timestamps = opts.timestamps;
  }

  getLevel(): LogLevel {
    return this.level ?? globalLevel;
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>) {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  child(sub: string): Logger {
    return new Logger(`${this.module}:${sub}`, { level: this.level, timestamps: this.timestamps });
  }

  format(level: Exclude<LogLevel, 'silent'>, message: string, data?: unknown) {
    const ts = (this.timestamps ?? globalTimestamps) ? `${new Date().toISOString()} ` : '';
    let line = `${ts}${LABELS[level]} [${this.module}] ${message}`;
    if (data !== undefined) {
      line += typeof data === 'object' ? ` ${JSON.stringify(data)}` : ` ${String(data)}`;
    }
    return line;
  }

  debug(message: string, data?: unknown) {
    if (this.isEnabled('debug')) console.log(this.format('debug', message, data));
  }

  info(message: string, data?: unknown) {
    if (this.isEnabled('info')) console.log(this.format('info', message, data));
  }

  warn(message: string, data?: unknown) {
    if (this.isEnabled('warn')) console.warn(this.format('warn', message, data));
  }

  error(message: string, data?: unknown) {
    if (this.isEnabled('error')) console.error(this.format('error', message, data));
  }
}

export function setLogLevel(level: LogLevel) {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

export function setLogTimestamps(on: boolean) {
  globalTimestamps = on;
}

export function createLogger(module: string, opts?: LoggerOptions) {
  return new Logger(module, opts);
}

/** Parse a CLI value; null when it is not a level. */
export function parseLogLevel(value: string): LogLevel | null {
  const v = value.trim().toLowerCase();
  return isLogLevel(v) ? v : null;
}

function isLogLevel(v: string): v is LogLevel {
  return Object.hasOwn(LOG_LEVELS, v);
}
