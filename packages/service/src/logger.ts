import type { LogLevel } from './config';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(fields: LogFields): Logger;
}

export type LogSink = (level: LogLevel, line: string) => void;

export type LoggerOpts = {
  service: string;
  level?: LogLevel;
  json?: boolean;
  sink?: LogSink;
  now?: () => Date;
};

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
};

function plainValue(v: unknown) {
  return typeof v === 'string' ? (/\s/.test(v) ? JSON.stringify(v) : v) : JSON.stringify(v);
}

/**
 * Leveled console logger. JSON mode prints one object per line
 * (`timestamp`, `level`, `service`, `message`, then the fields);
 * plain mode prints `timestamp LEVEL [service] message key=value ...`.
 */
export function createLogger(opts: LoggerOpts, bound: LogFields = {}): Logger {
  const min = RANK[opts.level ?? 'info'];
  const sink = opts.sink ?? consoleSink;
  const now = opts.now ?? (() => new Date());

  const emit = (level: LogLevel, message: string, fields: LogFields = {}) => {
    if (RANK[level] < min) return;
    const all = { ...bound, ...fields };
    const timestamp = now().toISOString();
    if (opts.json ?? true) {
      sink(level, JSON.stringify({ timestamp, level, service: opts.service, message, ...all }));
      return;
    }
    const extra = Object.entries(all).map(([k, v]) => ` ${k}=${plainValue(v)}`).join('');
    sink(level, `${timestamp} ${level.toUpperCase()} [${opts.service}] ${message}${extra}`);
  };

  return {
    debug: (m, f) => emit('debug', m, f),
    info: (m, f) => emit('info', m, f),
    warn: (m, f) => emit('warn', m, f),
    error: (m, f) => emit('error', m, f),
    child: fields => createLogger(opts, { ...bound, ...fields }),
  };
}
