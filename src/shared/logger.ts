import type { Writable } from 'node:stream';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  component?: string;
  scope?: string;
  destination?: Writable;
  sink?: (record: LogRecord) => void;
}

export interface LogMeta {
  [key: string]: unknown;
}

export interface LogRecord extends LogMeta {
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
  scope?: string;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly json: boolean;
  private readonly component?: string;
  private readonly scope?: string;
  private readonly stream: Writable;
  private readonly sink?: (record: LogRecord) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.json = Boolean(options.json);
    this.component = options.component;
    this.scope = options.scope;
    this.stream = options.destination ?? process.stderr;
    this.sink = options.sink;
  }

  child(overrides: LoggerOptions): Logger {
    return new Logger({
      level: overrides.level ?? this.level,
      json: overrides.json ?? this.json,
      component: overrides.component ?? this.component,
      scope: overrides.scope ?? this.scope,
      destination: overrides.destination ?? this.stream,
      sink: overrides.sink ?? this.sink,
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] <= LEVEL_PRIORITY[this.level];
  }

  log(level: LogLevel, message: string, meta?: LogMeta) {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const record: LogRecord = {
      timestamp,
      level,
      message,
      component: this.component,
      scope: this.scope,
    };
    const hasMeta = meta !== undefined && Object.keys(meta).length > 0;
    if (hasMeta) {
      Object.assign(record, meta);
    }

    if (this.json) {
      this.stream.write(JSON.stringify(record) + '\n');
    } else {
      const parts = [timestamp, level.toUpperCase()];
      const label = [this.component, this.scope].filter(Boolean).join(':');
      if (label) {
        parts.push(`[${label}]`);
      }
      parts.push('-', message);
      if (hasMeta) {
        parts.push(JSON.stringify(meta));
      }
      this.stream.write(parts.join(' ') + '\n');
    }

    if (this.sink) {
      this.sink({ ...record });
    }
  }

  info(message: string, meta?: LogMeta) {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: LogMeta) {
    this.log('error', message, meta);
  }

  debug(message: string, meta?: LogMeta) {
    this.log('debug', message, meta);
  }
}

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

export function normalizeLogLevel(input?: string | null): LogLevel {
  if (!input) {
    return 'info';
  }
  const normalized = input.trim().toLowerCase();
  if (
    normalized === 'error' ||
    normalized === 'warn' ||
    normalized === 'info' ||
    normalized === 'debug'
  ) {
    return normalized;
  }
  throw new Error(`Invalid log level: ${input}. Use error | warn | info | debug.`);
}
