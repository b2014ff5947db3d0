import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  createGrid, mapGrid, rowSums, colSums, gridSum, maxEntry,
  maxAbsDiff, isPermutation, assignmentCost,
} from './matrix';

test('createGrid builds independent rows', () => {
  const g = createGrid(2, 0.5);
  assert.deepEqual(g, [[0.5, 0.5], [0.5, 0.5]]);
  g[0][0] = 1;
  assert.equal(g[1][0], 0.5);
});

test('mapGrid passes value and coordinates', () => {
  const g = mapGrid([[1, 2], [3, 4]], (v, i, j) => v * 10 + i + j);
  assert.deepEqual(g, [[10, 21], [31, 42]]);
});

test('row, column and total sums', () => {
  const g = [[1, 2, 3], [4, 5, 6], [7, 8, 9]];
  assert.deepEqual(rowSums(g), [6, 15, 24]);
  assert.deepEqual(colSums(g), [12, 15, 18]);
  assert.equal(gridSum(g), 45);
  assert.equal(maxEntry(g), 9);
});

test('maxAbsDiff finds the largest cell change', () => {
  assert.equal(maxAbsDiff([[0, 1], [2, 3]], [[0, 1.5], [1, 3]]), 1);
  assert.equal(maxAbsDiff([[4]], [[4]]), 0);
});

test('isPermutation checks length, range and uniqueness', () => {
  assert.equal(isPermutation([2, 0, 1], 3), true);
  assert.equal(isPermutation([0, 0, 1], 3), false);
  assert.equal(isPermutation([0, 1], 3), false);
  assert.equal(isPermutation([0, 3, 1], 3), false);
  assert.equal(isPermutation([0, 1.5, 2], 3), false);
});

test('assignmentCost sums the chosen cells', () => {
  const cost = [[9, 2, 7, 8], [6, 4, 3, 7], [5, 8, 1, 8], [7, 6, 9, 4]];
  assert.equal(assignmentCost(cost, [1, 0, 2, 3]), 13);
  assert.equal(assignmentCost(cost, [0, 1, 2, 3]), 18);
});
