import type { CostMatrix, RandomSource, SolveResult, SolverOptions } from '@hopnet/shared';
import { assignmentCost, mapGrid, maxEntry, mulberry32 } from '@hopnet/shared';
import { resolveConfig } from './config';
import { validateCostMatrix } from './validate';
import { relax } from './network';
import { extractPermutation } from './extract';

/** Scale costs into [0, 1] by the largest entry; an all-zero matrix is returned as is. */
export function normalizeCosts(cost: CostMatrix): CostMatrix {
  const max = maxEntry(cost);
  if (!(max > 0)) return cost;
  return mapGrid(cost, c => c / max);
}

/**
 * Solve an assignment problem with the Hopfield network.
 *
 * The matrix and options are validated before any state exists. The network
 * always yields a permutation: if it stops at `maxIterations` or settles on a
 * fractional state, extraction repairs it. `totalCost` is summed over the
 * matrix as given, not the normalised one.
 *
 * `rng` seeds the initial perturbation; without it a mulberry32 stream is
 * built from `options.seed`.
 */
export function solve(costMatrix: CostMatrix, options: SolverOptions = {}, rng?: RandomSource): SolveResult {
  const config = resolveConfig(options);
  const cost = validateCostMatrix(costMatrix, config.maxSize);

  const relaxed = relax({
    cost: config.normalizeCosts ? normalizeCosts(cost) : cost,
    config,
    rng: rng ?? mulberry32(config.seed),
    onIteration: options.onIteration,
  });
  const { assignment, repaired } = extractPermutation(relaxed.V);

  return Object.freeze({
    assignment: Object.freeze(assignment),
    totalCost: assignmentCost(cost, assignment),
    iterations: relaxed.iterations,
    converged: relaxed.converged,
    repaired,
  });
}
