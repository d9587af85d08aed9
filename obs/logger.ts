import type { AppConfig } from '../config/config.js';

export type LogLevel = AppConfig['observability']['logLevel'];

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
}

export type LogSink = (line: string) => void;

// stdout carries the MCP stdio protocol, so every level goes to stderr.
const stderrSink: LogSink = (line) => {
  /* eslint-disable-next-line no-console */
  console.error(line);
};

const emit = (sink: LogSink, level: LogLevel, message: string, meta?: Record<string, unknown>) => {
  const base = {
    level,
    message,
    ts: new Date().toISOString(),
    ...meta,
  };
  sink(JSON.stringify(base));
};

export const createLogger = (config: Pick<AppConfig, 'observability'>, sink: LogSink = stderrSink): Logger => {
  const threshold = levelWeights[config.observability.logLevel];
  const shouldLog = (level: LogLevel) => levelWeights[level] >= threshold;
  return {
    debug: (message, meta) => {
      if (shouldLog('debug')) emit(sink, 'debug', message, meta);
    },
    info: (message, meta) => {
      if (shouldLog('info')) emit(sink, 'info', message, meta);
    },
    warn: (message, meta) => {
      if (shouldLog('warn')) emit(sink, 'warn', message, meta);
    },
    error: (message, meta) => emit(sink, 'error', message, meta),
  };
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
