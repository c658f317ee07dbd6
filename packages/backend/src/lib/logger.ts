import { config } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogMeta = Record<string, unknown>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(bindings: LogMeta): Logger;
}

function should_log(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[config.log_level];
}

function log(level: LogLevel, message: string, bindings: LogMeta, meta?: LogMeta): void {
  if (!should_log(level)) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...bindings,
    ...meta,
  };

  const output = JSON.stringify(entry);

  if (level === 'error') {
    console.error(output);
  } else {
    console.log(output);
  }
}

function create_logger(bindings: LogMeta): Logger {
  return {
    debug: (message, meta) => log('debug', message, bindings, meta),
    info: (message, meta) => log('info', message, bindings, meta),
    warn: (message, meta) => log('warn', message, bindings, meta),
    error: (message, meta) => log('error', message, bindings, meta),
    child: (extra) => create_logger({ ...bindings, ...extra }),
  };
}

export const logger = create_logger({});
