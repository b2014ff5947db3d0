import type { CostMatrix, Grid, PenaltyWeights } from '@hopnet/shared';
import { rowSums, colSums, gridSum } from '@hopnet/shared';

/**
 * Network energy
 *
 *   (A/2)·Σ_i (row_i − 1)² + (B/2)·Σ_j (col_j − 1)² + (C/2)·(total − n)² + (D/2)·Σ cost·V
 */
export function energy(V: CostMatrix, cost: CostMatrix, w: PenaltyWeights): number {
  const n = V.length;
  const rows = rowSums(V);
  const cols = colSums(V);
  const total = gridSum(V);

  let rowTerm = 0, colTerm = 0, costTerm = 0;
  for (let i = 0; i < n; i++) {
    rowTerm += (rows[i] - 1) ** 2;
    colTerm += (cols[i] - 1) ** 2;
    for (let j = 0; j < n; j++) costTerm += cost[i][j] * V[i][j];
  }
  return (w.A / 2) * rowTerm + (w.B / 2) * colTerm + (w.C / 2) * (total - n) ** 2 + (w.D / 2) * costTerm;
}

/**
 * Descent direction for every potential, from one snapshot of V:
 * A·(row_i − 1) + B·(col_j − 1) + C·(total − n) + D·cost[i][j].
 * All sums are taken before any cell is visited.
 */
export function gradient(V: CostMatrix, cost: CostMatrix, w: PenaltyWeights): Grid {
  const n = V.length;
  const rows = rowSums(V);
  const cols = colSums(V);
  const global = w.C * (gridSum(V) - n);
  return cost.map((row, i) => row.map((c, j) =>
    w.A * (rows[i] - 1) + w.B * (cols[j] - 1) + global + w.D * c));
}
