import type { SolverConfig } from './types';

export const DEFAULT_SOLVER_CONFIG: Readonly<SolverConfig> = Object.freeze({
  A: 1,
  B: 1,
  C: 1,
  D: 1,
  maxIterations: 1000,
  convergenceThreshold: 1e-3,
  stepSize: 0.05,
  temperature: 1,
  annealingRate: 0.995,
  minTemperature: 0.1,
  noise: 0.1,
  seed: 1,
  normalizeCosts: true,
  maxSize: 50,
});

export const LIMITS = {
  MIN_MATRIX_SIZE: 1,
  MAX_MATRIX_SIZE: 50,
  MIN_COST: 0,
  MAX_COST: 1e9,
  MAX_BATCH: 100,
  MAX_REQUEST_MB: 10,
} as const;
