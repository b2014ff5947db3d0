import type { SolverConfig, SolverOptions } from '@hopnet/shared';
import { DEFAULT_SOLVER_CONFIG } from '@hopnet/shared';

export class InvalidConfigError extends Error {
  readonly option: keyof SolverConfig;
  constructor(option: keyof SolverConfig, message: string) {
    super(message);
    this.name = 'InvalidConfigError';
    this.option = option;
  }
}

const POSITIVE = [
  'A', 'B', 'C', 'D', 'convergenceThreshold', 'stepSize', 'temperature', 'minTemperature',
] as const;

// mulberry32 keeps 32 bits of the seed
const MAX_SEED = 0xffffffff;

/** Merge caller options over the defaults and check every value. */
export function resolveConfig(opts: SolverOptions = {}): SolverConfig {
  const { onIteration: _hook, ...overrides } = opts;
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined));
  const cfg: SolverConfig = { ...DEFAULT_SOLVER_CONFIG, ...defined };

  for (const key of POSITIVE) {
    const v = cfg[key];
    if (typeof v !== 'number' || !Number.isFinite(v) || v <= 0) {
      throw new InvalidConfigError(key, `${key} must be a positive number, got ${String(v)}`);
    }
  }
  for (const key of ['maxIterations', 'maxSize'] as const) {
    if (!Number.isInteger(cfg[key]) || cfg[key] < 1) {
      throw new InvalidConfigError(key, `${key} must be a positive integer, got ${cfg[key]}`);
    }
  }
  if (!Number.isFinite(cfg.annealingRate) || cfg.annealingRate <= 0 || cfg.annealingRate > 1) {
    throw new InvalidConfigError('annealingRate', `annealingRate must be in (0, 1], got ${cfg.annealingRate}`);
  }
  if (cfg.minTemperature > cfg.temperature) {
    throw new InvalidConfigError('minTemperature', `minTemperature (${cfg.minTemperature}) exceeds temperature (${cfg.temperature})`);
  }
  if (!Number.isFinite(cfg.noise) || cfg.noise < 0) {
    throw new InvalidConfigError('noise', `noise must be a non-negative number, got ${cfg.noise}`);
  }
  if (!Number.isInteger(cfg.seed) || cfg.seed < 0 || cfg.seed > MAX_SEED) {
    throw new InvalidConfigError('seed', `seed must be an integer in [0, ${MAX_SEED}], got ${cfg.seed}`);
  }
  if (typeof cfg.normalizeCosts !== 'boolean') {
    throw new InvalidConfigError('normalizeCosts', `normalizeCosts must be a boolean, got ${String(cfg.normalizeCosts)}`);
  }
  return cfg;
}
