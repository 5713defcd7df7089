import type { LogLevel } from '../../shared/config';

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  child: (bindings: LogMeta) => Logger;
}

export interface LogRecord extends LogMeta {
  level: LogLevel;
  message: string;
  ts: string;
}

export type LogSink = (record: LogRecord) => void;

const consoleSink: LogSink = (record) => {
  const payload = JSON.stringify(record);
  /* eslint-disable no-console */
  if (record.level === 'error') {
    console.error(payload);
  } else if (record.level === 'warn') {
    console.warn(payload);
  } else {
    console.log(payload);
  }
  /* eslint-enable no-console */
};

/** Flattens Error instances so they survive JSON.stringify. */
export const describeError = (error: unknown): LogMeta => {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { error: error.message, errorName: error.name, errorCode: code };
  }
  return { error: String(error) };
};

export interface LoggerOptions {
  logLevel: LogLevel;
  sink?: LogSink;
  bindings?: LogMeta;
}

export const createLogger = (options: LoggerOptions): Logger => {
  const threshold = levelWeights[options.logLevel];
  const sink = options.sink ?? consoleSink;
  const bindings = options.bindings ?? {};
  const shouldLog = (level: LogLevel) => levelWeights[level] >= threshold;

  const emit = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (level !== 'error' && !shouldLog(level)) return;
    sink({
      ...bindings,
      ...meta,
      level,
      message,
      ts: new Date().toISOString(),
    });
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
    child: (extra) => createLogger({ ...options, bindings: { ...bindings, ...extra } }),
  };
};

/** Collects records in memory instead of writing to the console. */
export const createMemoryLogger = (logLevel: LogLevel = 'debug') => {
  const records: LogRecord[] = [];
  const logger = createLogger({ logLevel, sink: (record) => records.push(record) });
  return { logger, records };
};
