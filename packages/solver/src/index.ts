export { activation, inverseActivation } from './activation';
export { energy, gradient } from './energy';
export { initState, step, relax } from './network';
export type { NetworkState, InitOpts, RelaxOpts, Relaxation } from './network';
export { argmaxRow, extractPermutation } from './extract';
export type { Extraction } from './extract';
export { validateCostMatrix, InvalidMatrixError } from './validate';
export type { MatrixErrorCode, MatrixErrorDetail } from './validate';
export { resolveConfig, InvalidConfigError } from './config';
export { solve, normalizeCosts } from './solve';
export { hungarian } from './hungarian';
