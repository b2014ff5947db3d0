import type { CostMatrix } from '@hopnet/shared';

export type Extraction = {
  assignment: number[];
  /** True when per-row winners collided and the repair pass ran. */
  repaired: boolean;
};

/** Column of the largest value in a row; ties go to the lowest index. */
export function argmaxRow(row: ReadonlyArray<number>): number {
  let best = 0;
  for (let j = 1; j < row.length; j++) if (row[j] > row[best]) best = j;
  return best;
}

function hasDuplicates(cols: number[]): boolean {
  return new Set(cols).size !== cols.length;
}

/**
 * Turn a fractional activation grid into a permutation.
 *
 * Winner-take-all per row first. If two rows pick the same column, rows are
 * reassigned most-confident first (confidence = row max, ties to the lower
 * row), each taking its best unclaimed column.
 */
export function extractPermutation(V: CostMatrix): Extraction {
  const n = V.length;
  const picks = V.map(argmaxRow);
  if (!hasDuplicates(picks)) return { assignment: picks, repaired: false };

  const confidence = V.map((row, i) => row[picks[i]]);
  const order = Array.from({ length: n }, (_, i) => i)
    .sort((a, b) => (confidence[b] - confidence[a]) || (a - b));

  const claimed = new Array<boolean>(n).fill(false);
  const assignment = new Array<number>(n).fill(-1);
  for (const i of order) {
    const row = V[i];
    const ranked = Array.from({ length: n }, (_, j) => j)
      .sort((a, b) => (row[b] - row[a]) || (a - b));
    let col = ranked.find(j => !claimed[j]);
    if (col === undefined) col = claimed.indexOf(false);
    claimed[col] = true;
    assignment[i] = col;
  }
  return { assignment, repaired: true };
}
