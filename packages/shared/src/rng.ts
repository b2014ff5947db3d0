import type { RandomSource } from './types';

export function mulberry32(seed: number): RandomSource {
  let t = seed >>> 0;
  return function () {
    t += 0x6D2B79F5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer in [lo, hi], both inclusive. */
export function randInt(rng: RandomSource, lo: number, hi: number): number {
  return lo + Math.floor(rng() * (hi - lo + 1));
}
