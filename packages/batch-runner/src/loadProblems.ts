import fs from 'fs';
import path from 'path';
import type { CostMatrix, Problem } from '@hopnet/shared';
import { validateCostMatrix } from '@hopnet/solver';
import { validateBatch } from './problems';

/** Parse a JSON file; errors name the file. */
export function readJson(p: string): unknown {
  const abs = path.resolve(p);
  let txt: string;
  try {
    txt = fs.readFileSync(abs, 'utf8');
  } catch (e) {
    throw new Error(`Cannot read ${abs}: ${e instanceof Error ? e.message : String(e)}`);
  }
  try {
    return JSON.parse(txt);
  } catch (e) {
    throw new Error(`Invalid JSON in ${abs}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export function writeJson(p: string, data: unknown) {
  const abs = path.resolve(p);
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, JSON.stringify(data, null, 2));
  return abs;
}

/**
 * A matrix file holds either the bare grid or `{ "cost_matrix": [...] }`.
 */
export function loadMatrix(p: string, maxSize?: number): CostMatrix {
  const data = readJson(p);
  const grid = typeof data === 'object' && data !== null && !Array.isArray(data)
    ? ('cost_matrix' in data ? data.cost_matrix : 'costMatrix' in data ? data.costMatrix : data)
    : data;
  return validateCostMatrix(grid, maxSize);
}

/**
 * A problems file holds a list of `{ id, cost_matrix }` or `{ "problems": [...] }`.
 */
export function loadProblems(p: string, maxBatch?: number): Problem[] {
  const data = readJson(p);
  const list = typeof data === 'object' && data !== null && !Array.isArray(data) && 'problems' in data
    ? data.problems
    : data;
  return validateBatch(list, maxBatch);
}
