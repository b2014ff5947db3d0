export * from './types';
export * from './constants';
export * from './rng';
export * from './matrix';
