import type { CostMatrix } from '@hopnet/shared';

/** Hungarian algorithm (exact min-cost assignment) for a square cost matrix.
 *  Output: assignment[i] is the column chosen for row i.
 *  Used as the reference the network heuristic is measured against.
 */
export function hungarian(cost: CostMatrix): number[] {
  const n = cost.length;
  if (n === 0) return [];

  // Potentials and matching arrays (1-based indexing trick)
  const u = new Array<number>(n + 1).fill(0);
  const v = new Array<number>(n + 1).fill(0);
  const p = new Array<number>(n + 1).fill(0);
  const way = new Array<number>(n + 1).fill(0);

  for (let i = 1; i <= n; i++) {
    p[0] = i;
    const minv = new Array<number>(n + 1).fill(Infinity);
    const used = new Array<boolean>(n + 1).fill(false);
    let j0 = 0;

    do {
      used[j0] = true;
      const i0 = p[j0];
      let delta = Infinity;
      let j1 = 0;

      for (let j = 1; j <= n; j++) {
        if (used[j]) continue;
        const cur = cost[i0 - 1][j - 1] - u[i0] - v[j];
        if (cur < minv[j]) {
          minv[j] = cur;
          way[j] = j0;
        }
        if (minv[j] < delta) {
          delta = minv[j];
          j1 = j;
        }
      }

      for (let j = 0; j <= n; j++) {
        if (used[j]) {
          u[p[j]] += delta;
          v[j] -= delta;
        } else {
          minv[j] -= delta;
        }
      }
      j0 = j1;
    } while (p[j0] !== 0);

    // augment along the alternating path
    do {
      const j1 = way[j0];
      p[j0] = p[j1];
      j0 = j1;
    } while (j0 !== 0);
  }

  const res = new Array<number>(n).fill(-1);
  for (let j = 1; j <= n; j++) res[p[j] - 1] = j - 1;
  return res;
}
