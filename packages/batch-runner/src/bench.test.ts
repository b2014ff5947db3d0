import test from 'node:test';
import assert from 'node:assert/strict';
import { mulberry32 } from '@hopnet/shared';
import { formatBench, formatBenchRow, randomMatrix, runBench } from './bench';

test('randomMatrix draws integers in 1..maxCost', () => {
  const m = randomMatrix(5, mulberry32(9), 7);
  assert.equal(m.length, 5);
  for (const row of m) {
    assert.equal(row.length, 5);
    for (const v of row) assert.ok(Number.isInteger(v) && v >= 1 && v <= 7);
  }
});

test('single-cell problems are always optimal', () => {
  const { rows } = runBench({ sizes: [1], trials: 4, seed: 3 });
  assert.equal(rows.length, 1);
  const [r] = rows;
  assert.equal(r.n, 1);
  assert.equal(r.trials, 4);
  assert.equal(r.avgGap, 0);
  assert.equal(r.avgGapPct, 0);
  assert.equal(r.optimalRate, 1);
  assert.equal(r.repairedRate, 0);
});

test('runBench reports one row per size and is reproducible', () => {
  const opts = { sizes: [3, 4], trials: 3, seed: 11 };
  const a = runBench(opts);
  assert.deepEqual(a.rows.map(r => r.n), [3, 4]);
  for (const r of a.rows) {
    assert.ok(r.avgGap >= 0);
    assert.ok(r.optimalRate >= 0 && r.optimalRate <= 1);
    assert.ok(r.avgIterations >= 1);
  }
  assert.deepEqual(runBench(opts), a);
});

test('formatBenchRow lines up under the header', () => {
  const row = {
    n: 4, trials: 10, avgGap: 1.5, avgGapPct: 3.456, optimalRate: 0.7,
    convergedRate: 1, repairedRate: 0.1, avgIterations: 88.04,
  };
  assert.equal(formatBenchRow(row), '  4      10     3.46      70%    100%     88.0');
  const lines = formatBench({ seed: 1, rows: [row] });
  assert.equal(lines.length, 2);
  assert.equal(lines[0].length, lines[1].length);
});
