import { test } from 'node:test';
import assert from 'node:assert/strict';
import { handleTask } from './solveWorker';

test('handleTask solves and echoes the slot id', () => {
  const reply = handleTask({ id: 7, problem: { id: 'x', costMatrix: [[3, 1], [1, 3]] }, options: {} });
  assert.equal(reply.id, 7);
  assert.ok(reply.ok && 'result' in reply);
  assert.deepEqual(reply.result.assignment, [1, 0]);
  assert.equal(reply.result.totalCost, 2);
});

test('handleTask turns a bad matrix into an item error', () => {
  const reply = handleTask({ id: 0, problem: { id: 'x', costMatrix: [[1, -2], [3, 4]] }, options: {} });
  assert.deepEqual(reply, { ok: true, id: 0, error: 'Cost at position [0][1] is -2, which is negative' });
});

test('handleTask honours maxSize from the options', () => {
  const reply = handleTask({ id: 1, problem: { id: 'x', costMatrix: [[1, 2], [3, 4]] }, options: { maxSize: 1 } });
  assert.deepEqual(reply, { ok: true, id: 1, error: 'Matrix size 2x2 exceeds maximum allowed size of 1x1' });
});
