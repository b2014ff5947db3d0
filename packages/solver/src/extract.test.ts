import { test } from 'node:test';
import assert from 'node:assert/strict';
import { argmaxRow, extractPermutation } from './extract';

test('argmaxRow breaks ties toward the lowest column', () => {
  assert.equal(argmaxRow([0.2, 0.7, 0.7]), 1);
  assert.equal(argmaxRow([0.4, 0.4]), 0);
  assert.equal(argmaxRow([0.9]), 0);
});

test('distinct row winners are kept as they are', () => {
  const out = extractPermutation([
    [0.9, 0.1, 0.0],
    [0.2, 0.1, 0.7],
    [0.1, 0.8, 0.1],
  ]);
  assert.deepEqual(out, { assignment: [0, 2, 1], repaired: false });
});

test('collisions are repaired most-confident row first', () => {
  // rows 0 and 1 both want column 0; row 1 is more confident and keeps it
  const out = extractPermutation([
    [0.9, 0.8, 0.1],
    [0.95, 0.3, 0.2],
    [0.5, 0.4, 0.6],
  ]);
  assert.deepEqual(out, { assignment: [1, 0, 2], repaired: true });
});

test('losing rows fall back to their next best free column', () => {
  const out = extractPermutation([
    [0.9, 0.2, 0.1],
    [0.8, 0.1, 0.3],
    [0.7, 0.6, 0.5],
  ]);
  assert.deepEqual(out, { assignment: [0, 2, 1], repaired: true });
});

test('a fully tied grid resolves to the identity', () => {
  const out = extractPermutation([
    [0.5, 0.5, 0.5],
    [0.5, 0.5, 0.5],
    [0.5, 0.5, 0.5],
  ]);
  assert.deepEqual(out, { assignment: [0, 1, 2], repaired: true });
});

test('equal confidence is ordered by row index', () => {
  // both rows peak at 0.6 on column 1; row 0 is processed first
  const out = extractPermutation([
    [0.1, 0.6],
    [0.2, 0.6],
  ]);
  assert.deepEqual(out, { assignment: [1, 0], repaired: true });
});
