/**
 * Leveled logging
 *
 * While the kiosk owns the terminal nothing may be written to the screen,
 * so log lines go to a sink: a JSON-lines file, the console (before the
 * terminal is locked), or nowhere.
 */

import { createWriteStream, type WriteStream } from 'fs';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type ActiveLevel = Exclude<LogLevel, 'silent'>;

const levelRank: Record<ActiveLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

export type LogFields = Record<string, unknown>;

export interface Logger {
  trace(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface LogRecord {
  ts: string;
  level: ActiveLevel;
  msg: string;
  fields: LogFields;
}

export type LogSink = (record: LogRecord) => void;

export interface LoggerOptions {
  level: LogLevel;
  sink: LogSink;
}

const prefix = '[keysplash]';

export function createLogger(options: LoggerOptions): Logger {
  if (options.level === 'silent') {
    return createNoopLogger();
  }

  const threshold = levelRank[options.level];
  const { sink } = options;

  function emit(level: ActiveLevel, msg: string, fields: LogFields = {}): void {
    if (levelRank[level] < threshold) return;
    sink({ ts: new Date().toISOString(), level, msg, fields });
  }

  return {
    trace: (message, fields) => emit('trace', message, fields),
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
  };
}

export function createNoopLogger(): Logger {
  return {
    trace() {},
    debug() {},
    info() {},
    warn() {},
    error() {},
  };
}

/**
 * Console sink for the phases where the terminal is still a normal terminal
 * (setup prompts, argument errors).
 */
export function consoleSink(record: LogRecord): void {
  const extra = Object.keys(record.fields).length > 0 ? [record.fields] : [];
  const line = `${prefix} ${record.msg}`;
  switch (record.level) {
    case 'error':
      console.error(line, ...extra);
      break;
    case 'warn':
      console.warn(line, ...extra);
      break;
    default:
      console.log(line, ...extra);
  }
}

/**
 * Append JSON lines to a file. The returned `close` flushes the stream.
 * After a write error the sink stops writing; `error` holds the cause.
 */
export function fileSink(path: string): { sink: LogSink; close: () => Promise<void>; readonly error: Error | null } {
  const stream: WriteStream = createWriteStream(path, { flags: 'a' });
  let failure: Error | null = null;
  stream.on('error', (err: Error) => {
    failure = err;
  });

  return {
    sink: (record) => {
      if (failure) return;
      stream.write(JSON.stringify({ ts: record.ts, level: record.level, msg: record.msg, ...record.fields }) + '\n');
    },
    close: () => (failure ? Promise.resolve() : new Promise<void>(resolve => stream.end(resolve))),
    get error() {
      return failure;
    },
  };
}

export function formatError(err: unknown): { name: string; message: string } {
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return { name: 'Error', message: String(err) };
}
