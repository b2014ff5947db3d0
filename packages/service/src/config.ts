import { LIMITS } from '@hopnet/shared';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type ServiceConfig = {
  service: string;
  version: string;
  port: number;
  host: string;
  apiKey?: string;        // unset: /solve routes are open
  logLevel: LogLevel;
  logJson: boolean;
  maxMatrixSize: number;
  maxBodyMb: number;
  batchJobs: number;      // worker threads per batch request; 1 = inline
};

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  readonly variable: string;
  constructor(variable: string, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLevel(v: string): v is LogLevel {
  return LEVELS.some(l => l === v);
}

function str(env: Env, name: string): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}

function int(env: Env, name: string, def: number, lo: number, hi: number): number {
  const raw = str(env, name);
  if (raw === undefined) return def;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < lo || n > hi) {
    throw new ConfigError(name, `${name} must be an integer in [${lo}, ${hi}], got "${raw}"`);
  }
  return n;
}

function positive(env: Env, name: string, def: number): number {
  const raw = str(env, name);
  if (raw === undefined) return def;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) throw new ConfigError(name, `${name} must be a positive number, got "${raw}"`);
  return n;
}

function bool(env: Env, name: string, def: boolean): boolean {
  const raw = str(env, name)?.toLowerCase();
  if (raw === undefined) return def;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigError(name, `${name} must be a boolean, got "${raw}"`);
}

/** Typed service settings from environment variables (call dotenv first to pick up .env). */
export function loadConfig(env: Env = process.env): ServiceConfig {
  const level = (str(env, 'LOG_LEVEL') ?? 'info').toLowerCase();
  if (!isLevel(level)) throw new ConfigError('LOG_LEVEL', `LOG_LEVEL must be one of ${LEVELS.join(', ')}, got "${level}"`);

  return {
    service: 'hopnet-assignment-solver',
    version: '0.1.0',
    port: int(env, 'PORT', 5000, 0, 65535),
    host: str(env, 'HOST') ?? '0.0.0.0',
    apiKey: str(env, 'API_KEY'),
    logLevel: level,
    logJson: bool(env, 'LOG_JSON', true),
    maxMatrixSize: int(env, 'MAX_MATRIX_SIZE', LIMITS.MAX_MATRIX_SIZE, LIMITS.MIN_MATRIX_SIZE, LIMITS.MAX_MATRIX_SIZE),
    maxBodyMb: positive(env, 'MAX_BODY_MB', LIMITS.MAX_REQUEST_MB),
    batchJobs: int(env, 'BATCH_JOBS', 1, 1, 64),
  };
}
