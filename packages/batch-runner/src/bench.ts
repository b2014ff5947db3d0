import type { CostMatrix, SolverConfig } from '@hopnet/shared';
import { mulberry32, randInt, assignmentCost } from '@hopnet/shared';
import { solve, hungarian } from '@hopnet/solver';

export type BenchOpts = {
  sizes: number[];
  trials: number;              // random matrices per size
  seed: number;                // drives matrix generation
  maxCost?: number;            // costs drawn from 1..maxCost (default 100)
  options?: Partial<SolverConfig>;
};

export type BenchRow = {
  n: number;
  trials: number;
  avgGap: number;              // heuristic cost − optimal cost
  avgGapPct: number;           // gap as % of optimal
  optimalRate: number;         // share of trials hitting the optimum
  convergedRate: number;
  repairedRate: number;
  avgIterations: number;
};

export type BenchReport = { seed: number; rows: BenchRow[] };

export function randomMatrix(n: number, rng: () => number, maxCost = 100): CostMatrix {
  return Array.from({ length: n }, () => Array.from({ length: n }, () => randInt(rng, 1, maxCost)));
}

/** Compare the network against the exact Hungarian optimum on random matrices. */
export function runBench(opts: BenchOpts): BenchReport {
  const rng = mulberry32(opts.seed);
  const rows: BenchRow[] = [];

  for (const n of opts.sizes) {
    let gap = 0, gapPct = 0, optimal = 0, converged = 0, repaired = 0, iters = 0;

    for (let t = 0; t < opts.trials; t++) {
      const cost = randomMatrix(n, rng, opts.maxCost);
      const best = assignmentCost(cost, hungarian(cost));
      const res = solve(cost, opts.options);

      const g = res.totalCost - best;
      gap += g;
      gapPct += best > 0 ? (g / best) * 100 : 0;
      if (g === 0) optimal++;
      if (res.converged) converged++;
      if (res.repaired) repaired++;
      iters += res.iterations;
    }

    const k = Math.max(1, opts.trials);
    rows.push({
      n,
      trials: opts.trials,
      avgGap: gap / k,
      avgGapPct: gapPct / k,
      optimalRate: optimal / k,
      convergedRate: converged / k,
      repairedRate: repaired / k,
      avgIterations: iters / k,
    });
  }

  return { seed: opts.seed, rows };
}

export function formatBenchRow(r: BenchRow) {
  return `${String(r.n).padStart(3)}  ${String(r.trials).padStart(6)}  ${r.avgGapPct.toFixed(2).padStart(7)}  ${(r.optimalRate * 100).toFixed(0).padStart(6)}%  ${(r.convergedRate * 100).toFixed(0).padStart(5)}%  ${r.avgIterations.toFixed(1).padStart(7)}`;
}

export function formatBench(report: BenchReport): string[] {
  return [
    '  n  trials     gap%  optimal    conv    iters',
    ...report.rows.map(formatBenchRow),
  ];
}
