import type { CostMatrix, Grid } from '@hopnet/shared';
import { mapGrid } from '@hopnet/shared';

// Branches on the sign of z so Math.exp never overflows.
function logistic(x: number, temperature: number): number {
  const z = x / temperature;
  if (z >= 0) return 1 / (1 + Math.exp(-z));
  const e = Math.exp(z);
  return e / (1 + e);
}

/**
 * Neuron transfer function `1 / (1 + e^(-x/T))`.
 *
 * Accepts a single potential or a whole grid; the grid form maps the scalar
 * form over every cell, so a cell gets the same value either way.
 */
export function activation(x: number, temperature?: number): number;
export function activation(x: CostMatrix, temperature?: number): Grid;
export function activation(x: number | CostMatrix, temperature = 1): number | Grid {
  if (typeof x === 'number') return logistic(x, temperature);
  return mapGrid(x, v => logistic(v, temperature));
}

/** Potential whose activation is `v`, for v in (0, 1). */
export function inverseActivation(v: number, temperature = 1): number {
  return temperature * Math.log(v / (1 - v));
}
