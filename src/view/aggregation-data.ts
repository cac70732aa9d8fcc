/**
 * Accumulators - the running statistics kept per row.
 *
 * Nothing here retains raw samples: every kind keeps O(1) state, plus one
 * counter and one exemplar slot per bucket for distributions.
 */

import { AggregationType } from './aggregation';
import type { Aggregation } from './aggregation';

/**
 * Extra context attached to a recording, kept with distribution exemplars.
 */
export type Attachments = Readonly<Record<string, unknown>>;

/**
 * A single sample retained as representative of its bucket.
 */
export interface Exemplar {
  readonly value: number;
  readonly attachments: Attachments;
  readonly timestamp: Date;
}

export interface CountData {
  readonly type: AggregationType.Count;
  value: number;
}

export interface SumData {
  readonly type: AggregationType.Sum;
  value: number;
  readonly start: Date;
}

export interface LastValueData {
  readonly type: AggregationType.LastValue;
  value: number;
}

export interface DistributionData {
  readonly type: AggregationType.Distribution;
  count: number;
  min: number;
  max: number;
  mean: number;
  sumOfSquaredDev: number;
  /** Non-cumulative counts, one more entry than `bounds`. */
  readonly countPerBucket: number[];
  readonly exemplarsPerBucket: Array<Exemplar | undefined>;
  readonly bounds: readonly number[];
  readonly start: Date;
}

export type AggregationData = CountData | SumData | LastValueData | DistributionData;

/**
 * Creates empty accumulator state for an aggregation.
 */
export function newAggregationData(aggregation: Aggregation, start: Date): AggregationData {
  switch (aggregation.type) {
    case AggregationType.Count:
      return { type: AggregationType.Count, value: 0 };
    case AggregationType.Sum:
      return { type: AggregationType.Sum, value: 0, start };
    case AggregationType.LastValue:
      return { type: AggregationType.LastValue, value: 0 };
    case AggregationType.Distribution:
      return {
        type: AggregationType.Distribution,
        count: 0,
        min: Number.POSITIVE_INFINITY,
        max: Number.NEGATIVE_INFINITY,
        mean: 0,
        sumOfSquaredDev: 0,
        countPerBucket: new Array<number>(aggregation.buckets.length + 1).fill(0),
        exemplarsPerBucket: new Array<Exemplar | undefined>(aggregation.buckets.length + 1).fill(undefined),
        bounds: aggregation.buckets,
        start,
      };
  }
}

/**
 * Folds one value into the accumulator.
 *
 * Callers must not run two `addSample` calls on the same accumulator
 * concurrently; the running mean and deviation updates are not atomic.
 */
export function addSample(
  data: AggregationData,
  value: number,
  attachments: Attachments | undefined,
  timestamp: Date
): void {
  switch (data.type) {
    case AggregationType.Count:
      data.value += 1;
      return;
    case AggregationType.Sum:
      data.value += value;
      return;
    case AggregationType.LastValue:
      data.value = value;
      return;
    case AggregationType.Distribution:
      addToDistribution(data, value, attachments, timestamp);
      return;
  }
}

function addToDistribution(
  data: DistributionData,
  value: number,
  attachments: Attachments | undefined,
  timestamp: Date
): void {
  if (value < data.min) data.min = value;
  if (value > data.max) data.max = value;

  // Welford's online update
  data.count++;
  const delta = value - data.mean;
  data.mean += delta / data.count;
  data.sumOfSquaredDev += delta * (value - data.mean);

  const index = bucketIndex(data.bounds, value);
  data.countPerBucket[index] = (data.countPerBucket[index] ?? 0) + 1;

  if (attachments !== undefined) {
    data.exemplarsPerBucket[index] = Object.freeze({ value, attachments, timestamp });
  }
}

/**
 * Index of the bucket holding `value`: the first bound greater than or
 * equal to it, or `bounds.length` when it exceeds every bound.
 */
export function bucketIndex(bounds: readonly number[], value: number): number {
  let low = 0;
  let high = bounds.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const bound = bounds[mid];
    if (bound !== undefined && bound < value) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

/**
 * Point-in-time copy that later `addSample` calls do not affect.
 */
export function cloneAggregationData(data: AggregationData): AggregationData {
  switch (data.type) {
    case AggregationType.Count:
    case AggregationType.LastValue:
    case AggregationType.Sum:
      return { ...data };
    case AggregationType.Distribution:
      return {
        ...data,
        countPerBucket: [...data.countPerBucket],
        exemplarsPerBucket: [...data.exemplarsPerBucket],
      };
  }
}

/**
 * Sum of all values folded into a distribution.
 */
export function distributionSum(data: DistributionData): number {
  return data.mean * data.count;
}

/**
 * Sample variance of a distribution, 0 below two samples.
 */
export function distributionVariance(data: DistributionData): number {
  if (data.count <= 1) {
    return 0;
  }
  return data.sumOfSquaredDev / (data.count - 1);
}
