import test from 'node:test';
import assert from 'node:assert/strict';
import type { Problem } from '@hopnet/shared';
import { runBatch, type SpawnWorker } from './batch';
import { validateBatch, InvalidBatchError } from './problems';
import { handleTask, type TaskMsg } from './solveWorker';

const PROBLEMS: Problem[] = [
  { id: 'a', costMatrix: [[1, 2], [3, 4]] },
  { id: 'b', costMatrix: [[1, 2], [3]] },
  { id: 'c', costMatrix: [[5]] },
];

type Script = (task: TaskMsg) => { delay: number; reply?: unknown; error?: Error; exitCode?: number };

/** In-process stand-in for worker threads; records how many ran at once. */
function fakeWorkers(script: Script) {
  const stats = { spawned: 0, terminated: 0, running: 0, peak: 0 };
  const spawn: SpawnWorker = () => {
    stats.spawned++;
    stats.running++;
    stats.peak = Math.max(stats.peak, stats.running);
    let onMsg: (msg: unknown) => void = () => {};
    let onErr: (err: Error) => void = () => {};
    let onExit: (code: number) => void = () => {};
    return {
      onMessage: cb => { onMsg = cb; },
      onError: cb => { onErr = cb; },
      onExit: cb => { onExit = cb; },
      post: task => {
        const { delay, reply, error, exitCode } = script(task);
        setTimeout(() => {
          if (exitCode !== undefined) onExit(exitCode);
          else if (error) onErr(error);
          else onMsg(reply ?? handleTask(task));
        }, delay);
      },
      terminate: async () => {
        stats.terminated++;
        stats.running--;
        return 0;
      },
    };
  };
  return { spawn, stats };
}

test('validateBatch rejects a bad envelope', () => {
  assert.throws(() => validateBatch({}), { name: 'InvalidBatchError', message: 'Problems must be a list' });
  assert.throws(() => validateBatch([]), { message: 'Problems list cannot be empty' });
  const many = Array.from({ length: 101 }, (_, i) => ({ id: i, cost_matrix: [[1]] }));
  assert.throws(() => validateBatch(many), {
    message: 'Batch size of 101 exceeds maximum of 100 problems. Please split into smaller batches.',
  });
  assert.throws(() => validateBatch([{ id: 'x', cost_matrix: [[1]] }, 7]), { message: 'Problem 1 must be an object' });
  assert.throws(() => validateBatch([{ cost_matrix: [[1]] }]), { message: "Problem 0 is missing required field 'id'" });
  assert.throws(() => validateBatch([{ id: 'a' }]), {
    message: "Problem 0 (id: a) is missing required field 'cost_matrix'",
  });
  assert.throws(() => validateBatch([null]), InvalidBatchError);
});

test('validateBatch accepts both matrix keys and numeric ids', () => {
  const out = validateBatch([{ id: 1, cost_matrix: [[1]] }, { id: 'two', costMatrix: [[2]] }]);
  assert.deepEqual(out, [
    { id: '1', costMatrix: [[1]] },
    { id: 'two', costMatrix: [[2]] },
  ]);
});

test('runBatch inline keeps order and isolates failures', async () => {
  const { results, summary } = await runBatch(PROBLEMS);
  assert.deepEqual(results.map(r => r.id), ['a', 'b', 'c']);

  const [a, b, c] = results;
  assert.ok(a.success);
  assert.equal(a.result.totalCost, 5);
  assert.ok(!b.success);
  assert.equal(b.error, 'Matrix must be square. Row 1 has 1 elements, expected 2');
  assert.ok(c.success);
  assert.deepEqual(c.result.assignment, [0]);

  assert.deepEqual(summary, { total: 3, successful: 2, failed: 1 });
});

test('runBatch reports bad options per item', async () => {
  const { results, summary } = await runBatch(PROBLEMS.slice(0, 1), { options: { maxIterations: 0 } });
  assert.deepEqual(results, [
    { id: 'a', success: false, error: 'maxIterations must be a positive integer, got 0' },
  ]);
  assert.deepEqual(summary, { total: 1, successful: 0, failed: 1 });
});

test('pool caps concurrency and returns results in input order', async () => {
  const problems: Problem[] = Array.from({ length: 5 }, (_, i) => ({ id: `p${i}`, costMatrix: [[i + 1]] }));
  // earlier slots finish later
  const { spawn, stats } = fakeWorkers(task => ({ delay: (5 - task.id) * 3 }));

  const { results, summary } = await runBatch(problems, { jobs: 2, spawnWorker: spawn });

  assert.deepEqual(results.map(r => r.id), ['p0', 'p1', 'p2', 'p3', 'p4']);
  assert.deepEqual(results.map(r => (r.success ? r.result.totalCost : -1)), [1, 2, 3, 4, 5]);
  assert.deepEqual(summary, { total: 5, successful: 5, failed: 0 });
  assert.equal(stats.spawned, 5);
  assert.equal(stats.terminated, 5);
  assert.equal(stats.peak, 2);
});

test('pool matches the inline run', async () => {
  const { spawn } = fakeWorkers(() => ({ delay: 1 }));
  const pooled = await runBatch(PROBLEMS, { jobs: 3, spawnWorker: spawn });
  const inline = await runBatch(PROBLEMS);
  assert.deepEqual(pooled, inline);
});

test('a crashed worker fails only its own item', async () => {
  const { spawn, stats } = fakeWorkers(task =>
    task.id === 1 ? { delay: 1, error: new Error('boom') } : { delay: 1 });
  const { results, summary } = await runBatch(
    [PROBLEMS[0], PROBLEMS[2], PROBLEMS[0]],
    { jobs: 2, spawnWorker: spawn },
  );
  assert.deepEqual(results[1], { id: 'c', success: false, error: 'Worker error: boom' });
  assert.ok(results[0].success);
  assert.ok(results[2].success);
  assert.deepEqual(summary, { total: 3, successful: 2, failed: 1 });
  assert.equal(stats.terminated, 3);
});

test('unexpected and malformed replies become failed items', async () => {
  const { spawn } = fakeWorkers(task =>
    task.id === 0
      ? { delay: 1, reply: { ok: false, id: 0, error: 'stack trace' } }
      : { delay: 1, reply: 'garbage' });
  const { results } = await runBatch(PROBLEMS.slice(0, 2), { jobs: 2, spawnWorker: spawn });
  assert.deepEqual(results, [
    { id: 'a', success: false, error: 'Worker error: stack trace' },
    { id: 'b', success: false, error: 'Malformed worker reply' },
  ]);
});

test('a worker that exits without replying fails its item', async () => {
  const { spawn, stats } = fakeWorkers(task => (task.id === 0 ? { delay: 1, exitCode: 3 } : { delay: 1 }));
  const { results, summary } = await runBatch(PROBLEMS.slice(0, 1).concat(PROBLEMS.slice(2)), { jobs: 2, spawnWorker: spawn });
  assert.deepEqual(results[0], { id: 'a', success: false, error: 'Worker error: exited with code 3' });
  assert.ok(results[1].success);
  assert.deepEqual(summary, { total: 2, successful: 1, failed: 1 });
  assert.equal(stats.terminated, 2);
});

test('runBatch on real worker threads', async () => {
  const { results, summary } = await runBatch([
    { id: 'a', costMatrix: [[1, 2], [3, 4]] },
    { id: 'b', costMatrix: [[1, -1], [0, 0]] },
    { id: 'c', costMatrix: [[9, 2, 7, 8], [6, 4, 3, 7], [5, 8, 1, 8], [7, 6, 9, 4]] },
  ], { jobs: 2 });

  assert.deepEqual(
    results.map(r => [r.id, r.success ? r.result.totalCost : r.error]),
    [['a', 5], ['b', 'Cost at position [0][1] is -1, which is negative'], ['c', 13]],
  );
  assert.deepEqual(summary, { total: 3, successful: 2, failed: 1 });
});
