import type { CostMatrix, Grid } from './types';

export function createGrid(n: number, fill = 0): Grid {
  return Array.from({ length: n }, () => new Array<number>(n).fill(fill));
}

/** Apply `f` to every cell, returning a new grid of the same shape. */
export function mapGrid(grid: CostMatrix, f: (v: number, i: number, j: number) => number): Grid {
  return grid.map((row, i) => row.map((v, j) => f(v, i, j)));
}

export function rowSums(grid: CostMatrix): number[] {
  return grid.map(row => row.reduce((s, v) => s + v, 0));
}

export function colSums(grid: CostMatrix): number[] {
  const n = grid.length;
  const out = new Array<number>(n).fill(0);
  for (const row of grid) for (let j = 0; j < n; j++) out[j] += row[j];
  return out;
}

export function gridSum(grid: CostMatrix): number {
  let s = 0;
  for (const row of grid) for (const v of row) s += v;
  return s;
}

export function maxEntry(grid: CostMatrix): number {
  let m = -Infinity;
  for (const row of grid) for (const v of row) if (v > m) m = v;
  return m;
}

/** Largest |a[i][j] - b[i][j]| over two grids of equal shape. */
export function maxAbsDiff(a: CostMatrix, b: CostMatrix): number {
  let d = 0;
  for (let i = 0; i < a.length; i++) {
    for (let j = 0; j < a[i].length; j++) {
      const x = Math.abs(a[i][j] - b[i][j]);
      if (x > d) d = x;
    }
  }
  return d;
}

export function isPermutation(assignment: readonly number[], n: number): boolean {
  if (assignment.length !== n) return false;
  const seen = new Array<boolean>(n).fill(false);
  for (const j of assignment) {
    if (!Number.isInteger(j) || j < 0 || j >= n || seen[j]) return false;
    seen[j] = true;
  }
  return true;
}

export function assignmentCost(cost: CostMatrix, assignment: readonly number[]): number {
  let total = 0;
  for (let i = 0; i < assignment.length; i++) total += cost[i][assignment[i]];
  return total;
}
