/** Uniform source of numbers in [0, 1). */
export interface RandomSource {
  next(): number;
}

export type Clock = () => Date;

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

export const systemClock: Clock = () => new Date();

const FLOAT32_STEPS = 1 << 24;

/**
 * Draw a value that is exactly representable as a 32-bit float and lies in [0, 1).
 * Rounding Math.random() through Math.fround can land on 1.0, so quantise first.
 */
export function randomFloat32(random: RandomSource): number {
  return Math.floor(random.next() * FLOAT32_STEPS) / FLOAT32_STEPS;
}

/** Integer in [0, n). */
export function randomInt(random: RandomSource, n: number): number {
  if (n <= 0) return 0;
  const i = Math.floor(random.next() * n);
  return i < n ? i : n - 1;
}
