import type { RandomSource } from '../../src/random.js';

/** Replays `values` in order, wrapping around. Draw count is exposed for assertions. */
export function sequenceRandom(values: number[]): RandomSource & { draws: number } {
  const src = {
    draws: 0,
    next(): number {
      const v = values[src.draws % values.length];
      src.draws++;
      return v;
    },
  };
  return src;
}

export const constantRandom = (value: number): RandomSource => ({ next: () => value });
