import { getEnv } from '../config/env.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  msg: string;
  timestamp: string;
  service: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  service?: string;
  sink?: (level: LogLevel, line: string) => void;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

function serializeError(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

export class Logger {
  private level: LogLevel;
  private service: string;
  private sink: (level: LogLevel, line: string) => void;
  private context: Record<string, unknown> = {};

  constructor(opts: LoggerOptions = {}) {
    const env = getEnv();
    this.level = opts.level ?? env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug');
    this.service = opts.service ?? 'macro-runtime';
    this.sink = opts.sink ?? consoleSink;
  }

  child(bindings: Record<string, unknown>): Logger {
    const child = new Logger({ level: this.level, service: this.service, sink: this.sink });
    child.context = { ...this.context, ...bindings };
    return child;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.level];
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log('error', msg, data);
  }

  private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;

    const fields: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data ?? {})) {
      fields[key] = serializeError(value);
    }

    const entry: LogEntry = {
      level,
      msg,
      timestamp: new Date().toISOString(),
      service: this.service,
      ...this.context,
      ...fields,
    };

    this.sink(level, JSON.stringify(entry));
  }
}

let _defaultLogger: Logger | null = null;

export function getLogger(opts?: LoggerOptions): Logger {
  if (!_defaultLogger || opts) {
    _defaultLogger = new Logger(opts);
  }
  return _defaultLogger;
}
