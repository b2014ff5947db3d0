import type { CostMatrix, Grid, IterationSnapshot, RandomSource, SolverConfig } from '@hopnet/shared';
import { createGrid, mapGrid, maxAbsDiff } from '@hopnet/shared';
import { activation, inverseActivation } from './activation';
import { energy, gradient } from './energy';

/** Potentials U and activations V of one solve. Never shared across solves. */
export type NetworkState = {
  n: number;
  U: Grid;
  V: Grid;
  temperature: number;
};

export type InitOpts = {
  n: number;
  temperature: number;
  /** Width of the uniform perturbation added to every potential. */
  noise: number;
  rng: RandomSource;
};

/** Potentials start where V = 1/n, jittered to break symmetry. Draws n² values, row by row. */
export function initState({ n, temperature, noise, rng }: InitOpts): NetworkState {
  const base = n > 1 ? inverseActivation(1 / n, temperature) : 0;
  const U = mapGrid(createGrid(n), () => base + noise * (rng() - 0.5));
  return { n, U, V: activation(U, temperature), temperature };
}

/**
 * One synchronous sweep: every potential moves against the gradient taken
 * from the previous V, then the temperature anneals and V is recomputed.
 */
export function step(state: NetworkState, cost: CostMatrix, cfg: SolverConfig): NetworkState {
  const g = gradient(state.V, cost, cfg);
  const U = mapGrid(state.U, (u, i, j) => u - cfg.stepSize * g[i][j]);
  const temperature = Math.max(cfg.minTemperature, state.temperature * cfg.annealingRate);
  return { n: state.n, U, V: activation(U, temperature), temperature };
}

export type RelaxOpts = {
  cost: CostMatrix;
  config: SolverConfig;
  rng: RandomSource;
  onIteration?: (snap: IterationSnapshot) => void;
};

export type Relaxation = {
  V: Grid;
  iterations: number;
  converged: boolean;
  temperature: number;
};

/** Sweep until the largest cell change drops below the threshold or the iteration cap is hit. */
export function relax({ cost, config, rng, onIteration }: RelaxOpts): Relaxation {
  let state = initState({
    n: cost.length,
    temperature: config.temperature,
    noise: config.noise,
    rng,
  });

  let iterations = 0;
  let converged = false;
  while (iterations < config.maxIterations) {
    const next = step(state, cost, config);
    const maxDelta = maxAbsDiff(next.V, state.V);
    state = next;
    iterations++;

    onIteration?.({
      iteration: iterations,
      maxDelta,
      temperature: state.temperature,
      energy: energy(state.V, cost, config),
    });

    if (maxDelta < config.convergenceThreshold) {
      converged = true;
      break;
    }
  }

  return { V: state.V, iterations, converged, temperature: state.temperature };
}
