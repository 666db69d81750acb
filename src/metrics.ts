import type { PerformanceSample } from './types.js';

export const HEADROOM_FACTOR = 1.02;

export type Metric = (sample: PerformanceSample) => number;

/** Duration used as divisor, floored at one microsecond. */
export function effectiveDuration(sample: PerformanceSample): number {
  return Math.max(1, sample.durationMicros);
}

/** Operations per microsecond (Mop/s) of a single thread. */
export const operationRate: Metric = (s) => s.operationCount / effectiveDuration(s);

/** Operations per microsecond summed over every thread of the run. */
export const aggregateRate: Metric = (s) => (s.operationCount * s.threadCount) / effectiveDuration(s);

/** Bytes of value moved per microsecond (MB/s). */
export const memoryThroughput: Metric = (s) => (s.operationCount * s.valueSize) / effectiveDuration(s);

export function axisBound(values: number[]): number {
  const peak = values.length > 0 ? values.reduce((a, b) => Math.max(a, b)) : 1;
  return HEADROOM_FACTOR * peak;
}
