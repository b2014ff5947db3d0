import type { BatchItem, Problem, SolverConfig } from '@hopnet/shared';
import { LIMITS } from '@hopnet/shared';
import { solve, resolveConfig, validateCostMatrix, InvalidMatrixError, InvalidConfigError } from '@hopnet/solver';

/** The batch as a whole is unusable (not a list, empty, too long, malformed item). */
export class InvalidBatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidBatchError';
  }
}

/**
 * Check the envelope of a batch and normalise each item to a Problem.
 * Items carry `id` plus `cost_matrix` (wire form) or `costMatrix`.
 * The matrices themselves are checked later, one by one.
 */
export function validateBatch(input: unknown, maxBatch: number = LIMITS.MAX_BATCH): Problem[] {
  if (!Array.isArray(input)) throw new InvalidBatchError('Problems must be a list');
  if (input.length === 0) throw new InvalidBatchError('Problems list cannot be empty');
  if (input.length > maxBatch) {
    throw new InvalidBatchError(
      `Batch size of ${input.length} exceeds maximum of ${maxBatch} problems. Please split into smaller batches.`,
    );
  }

  return input.map((item: unknown, i): Problem => {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) {
      throw new InvalidBatchError(`Problem ${i} must be an object`);
    }
    if (!('id' in item) || (typeof item.id !== 'string' && typeof item.id !== 'number')) {
      throw new InvalidBatchError(`Problem ${i} is missing required field 'id'`);
    }
    const id = String(item.id);
    if ('cost_matrix' in item) return { id, costMatrix: item.cost_matrix };
    if ('costMatrix' in item) return { id, costMatrix: item.costMatrix };
    throw new InvalidBatchError(`Problem ${i} (id: ${id}) is missing required field 'cost_matrix'`);
  });
}

/**
 * Solve one batch item. Caller errors (bad matrix or options) become a failed
 * item so the rest of the batch carries on; anything else propagates.
 */
export function solveProblem(problem: Problem, options: Partial<SolverConfig> = {}): BatchItem {
  try {
    const { maxSize } = resolveConfig(options);
    const cost = validateCostMatrix(problem.costMatrix, maxSize);
    return { id: problem.id, success: true, result: solve(cost, options) };
  } catch (e) {
    if (e instanceof InvalidMatrixError || e instanceof InvalidConfigError) {
      return { id: problem.id, success: false, error: e.message };
    }
    throw e;
  }
}
