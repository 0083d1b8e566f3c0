import { mathRandom, randomFloat32, randomInt, systemClock, type Clock, type RandomSource } from '../random.js';
import { CPU_CORES, METRIC_KINDS, type MetricEnvelope, type MetricKind } from './types.js';

export interface CountBounds {
  min: number;
  max: number;
}

export interface GeneratorDeps {
  random?: RandomSource;
  clock?: Clock;
}

export type MetricsGenerator = () => MetricEnvelope[];

/**
 * Number of metrics for one response, drawn uniformly from [min, max).
 * When min === max the range is empty and exactly `min` is returned.
 */
export function drawCount(bounds: CountBounds, random: RandomSource): number {
  const span = bounds.max - bounds.min;
  if (span <= 0) return bounds.min;
  return bounds.min + randomInt(random, span);
}

export function generateEnvelope(kind: MetricKind, random: RandomSource, clock: Clock): MetricEnvelope {
  switch (kind) {
    case 'load_avg':
      return { type: 'load_avg', payload: { value: randomFloat32(random) } };
    case 'cpu_usage': {
      const value: number[] = [];
      for (let i = 0; i < CPU_CORES; i++) value.push(randomFloat32(random));
      return { type: 'cpu_usage', payload: { value } };
    }
    case 'last_kernel_upgrade':
      return { type: 'last_kernel_upgrade', payload: { value: clock() } };
  }
}

export function generateMetrics(bounds: CountBounds, deps: GeneratorDeps = {}): MetricEnvelope[] {
  const random = deps.random ?? mathRandom;
  const clock = deps.clock ?? systemClock;
  const n = drawCount(bounds, random);
  const out: MetricEnvelope[] = [];
  for (let i = 0; i < n; i++) {
    const kind = METRIC_KINDS[randomInt(random, METRIC_KINDS.length)];
    out.push(Object.freeze(generateEnvelope(kind, random, clock)));
  }
  return out;
}

export function createGenerator(bounds: CountBounds, deps: GeneratorDeps = {}): MetricsGenerator {
  const frozen = { min: bounds.min, max: bounds.max };
  return () => generateMetrics(frozen, deps);
}
