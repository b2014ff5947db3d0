import type { CostMatrix } from '@hopnet/shared';
import { LIMITS } from '@hopnet/shared';

export type MatrixErrorCode =
  | 'MALFORMED'
  | 'EMPTY'
  | 'NOT_SQUARE'
  | 'NOT_NUMBER'
  | 'NOT_FINITE'
  | 'NEGATIVE'
  | 'COST_TOO_LARGE'
  | 'TOO_LARGE';

export type MatrixErrorDetail = { row?: number; col?: number; size?: number };

/** The caller sent a matrix the solver cannot take. The message is safe to return verbatim. */
export class InvalidMatrixError extends Error {
  readonly code: MatrixErrorCode;
  readonly row?: number;
  readonly col?: number;
  readonly size?: number;

  constructor(code: MatrixErrorCode, message: string, detail: MatrixErrorDetail = {}) {
    super(message);
    this.name = 'InvalidMatrixError';
    this.code = code;
    this.row = detail.row;
    this.col = detail.col;
    this.size = detail.size;
  }
}

/**
 * Check an untrusted value against the cost matrix rules and return a fresh
 * copy typed as a CostMatrix. Throws InvalidMatrixError on the first problem
 * found, scanning rows then cells in order.
 */
export function validateCostMatrix(input: unknown, maxSize: number = LIMITS.MAX_MATRIX_SIZE): CostMatrix {
  if (!Array.isArray(input)) {
    throw new InvalidMatrixError('MALFORMED', 'Cost matrix must be an array of rows');
  }
  const n = input.length;
  if (n === 0) {
    throw new InvalidMatrixError('EMPTY', 'Cost matrix cannot be empty', { size: 0 });
  }
  if (n > maxSize) {
    throw new InvalidMatrixError(
      'TOO_LARGE',
      `Matrix size ${n}x${n} exceeds maximum allowed size of ${maxSize}x${maxSize}`,
      { size: n },
    );
  }

  const out: number[][] = [];
  for (let i = 0; i < n; i++) {
    const row: unknown = input[i];
    if (!Array.isArray(row)) {
      throw new InvalidMatrixError('MALFORMED', `Row ${i} must be an array`, { row: i });
    }
    if (row.length !== n) {
      throw new InvalidMatrixError(
        'NOT_SQUARE',
        `Matrix must be square. Row ${i} has ${row.length} elements, expected ${n}`,
        { row: i, size: n },
      );
    }
    const copy: number[] = [];
    for (let j = 0; j < n; j++) {
      const v: unknown = row[j];
      const at = { row: i, col: j };
      if (typeof v !== 'number') {
        throw new InvalidMatrixError('NOT_NUMBER', `Cost at position [${i}][${j}] must be a number, got ${typeof v}`, at);
      }
      if (Number.isNaN(v)) {
        throw new InvalidMatrixError('NOT_FINITE', `Cost at position [${i}][${j}] is NaN`, at);
      }
      if (!Number.isFinite(v)) {
        throw new InvalidMatrixError('NOT_FINITE', `Cost at position [${i}][${j}] is infinite`, at);
      }
      if (v < LIMITS.MIN_COST) {
        throw new InvalidMatrixError('NEGATIVE', `Cost at position [${i}][${j}] is ${v}, which is negative`, at);
      }
      if (v > LIMITS.MAX_COST) {
        throw new InvalidMatrixError(
          'COST_TOO_LARGE',
          `Cost at position [${i}][${j}] is ${v}, which exceeds maximum allowed value of ${LIMITS.MAX_COST}`,
          at,
        );
      }
      copy.push(v);
    }
    out.push(copy);
  }
  return out;
}
