// packages/batch-runner/src/cli.ts
import { solve } from '@hopnet/solver';
import type { IterationSnapshot, SolverConfig } from '@hopnet/shared';
import { getBool, getFlag, getNumber, getNumberList, positional } from './cliFlags';
import { loadMatrix, loadProblems, writeJson } from './loadProblems';
import { runBatch } from './batch';
import { runBench, formatBench } from './bench';

/** Flags that take no value. */
const BOOL_FLAGS = ['trace', 'raw-costs'] as const;

/** Solver knobs shared by every mode. */
function solverOptions(args: string[], withSeed = true): Partial<SolverConfig> {
  const opts: Partial<SolverConfig> = {};
  if (withSeed && getFlag(args, 'seed') !== undefined) opts.seed = getNumber(args, 'seed', 1);
  if (getFlag(args, 'max-iter') !== undefined) opts.maxIterations = getNumber(args, 'max-iter', 1000);
  if (getFlag(args, 'threshold') !== undefined) opts.convergenceThreshold = getNumber(args, 'threshold', 1e-3);
  if (getFlag(args, 'step') !== undefined) opts.stepSize = getNumber(args, 'step', 0.05);
  if (getFlag(args, 'temperature') !== undefined) opts.temperature = getNumber(args, 'temperature', 1);
  if (getBool(args, 'raw-costs')) opts.normalizeCosts = false;
  return opts;
}

function traceLine(s: IterationSnapshot) {
  return `iter ${String(s.iteration).padStart(5)}  maxΔ=${s.maxDelta.toExponential(3)}  T=${s.temperature.toFixed(4)}  E=${s.energy.toFixed(4)}`;
}

async function main() {
  const [,, mode, ...rest] = process.argv;

  if (mode === 'solve') {
    const file = positional(rest, BOOL_FLAGS);
    if (!file) throw new Error('solve: missing <matrix.json>');
    const trace = getBool(rest, 'trace');
    const cost = loadMatrix(file);
    const t0 = Date.now();
    const res = solve(cost, {
      ...solverOptions(rest),
      onIteration: trace ? s => console.log(traceLine(s)) : undefined,
    });
    console.log(JSON.stringify({ ...res, durationMs: Date.now() - t0 }, null, 2));
    return;
  }

  if (mode === 'batch') {
    const file = positional(rest, BOOL_FLAGS);
    if (!file) throw new Error('batch: missing <problems.json>');
    const jobs = getNumber(rest, 'jobs', 1);
    const out = getFlag(rest, 'out');
    const problems = loadProblems(file);

    console.log(`Batch: problems=${problems.length} jobs=${jobs}`);
    const report = await runBatch(problems, { options: solverOptions(rest), jobs });
    for (const r of report.results) {
      console.log(r.success
        ? `${r.id.padEnd(20)}  cost ${r.result.totalCost}  iters ${r.result.iterations}${r.result.converged ? '' : '  (not converged)'}`
        : `${r.id.padEnd(20)}  FAILED  ${r.error}`);
    }
    const { total, successful, failed } = report.summary;
    console.log(`\nTotal ${total}  ok ${successful}  failed ${failed}`);
    if (out) console.log(`Saved -> ${writeJson(out, report)}`);
    return;
  }

  if (mode === 'bench') {
    const sizes = getNumberList(rest, 'sizes', [4, 6, 8]);
    const trials = getNumber(rest, 'trials', 10);
    const seed = getNumber(rest, 'seed', 42);
    const out = getFlag(rest, 'out');

    console.log(`Bench vs Hungarian: sizes=${sizes.join(',')} trials=${trials} seed=${seed}`);
    const report = runBench({ sizes, trials, seed, options: solverOptions(rest, false) });
    for (const line of formatBench(report)) console.log(line);
    if (out) console.log(`Saved -> ${writeJson(out, report)}`);
    return;
  }

  console.log(`Usage:
  # Solve one matrix (bare grid or {"cost_matrix": [...]})
  tsx src/cli.ts solve <matrix.json> [--seed 1] [--max-iter 1000] [--threshold 1e-3] [--step 0.05] [--temperature 1] [--raw-costs] [--trace]

  # Solve a list of {id, cost_matrix} problems
  tsx src/cli.ts batch <problems.json> [--jobs 4] [--out artifacts/batch.json]

  # Compare against the exact optimum on random matrices
  tsx src/cli.ts bench [--sizes 4,6,8] [--trials 10] [--seed 42] [--out artifacts/bench.json]
`);
}

main().catch(err => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
