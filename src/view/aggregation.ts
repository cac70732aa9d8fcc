/**
 * Aggregations - how a view folds recorded values into a row.
 */

import { NegativeBucketBoundsError } from '../errors';

export enum AggregationType {
  Count = 'count',
  Sum = 'sum',
  LastValue = 'lastValue',
  Distribution = 'distribution',
}

export type Aggregation =
  | { readonly type: AggregationType.Count }
  | { readonly type: AggregationType.Sum }
  | { readonly type: AggregationType.LastValue }
  | { readonly type: AggregationType.Distribution; readonly buckets: readonly number[] };

export type DistributionAggregation = Extract<Aggregation, { type: AggregationType.Distribution }>;

/**
 * Counts recorded values, ignoring the values themselves.
 */
export function count(): Aggregation {
  return { type: AggregationType.Count };
}

/**
 * Sums recorded values.
 */
export function sum(): Aggregation {
  return { type: AggregationType.Sum };
}

/**
 * Keeps only the most recently recorded value.
 */
export function lastValue(): Aggregation {
  return { type: AggregationType.LastValue };
}

/**
 * Buckets recorded values and tracks count, min, max, mean and the sum of
 * squared deviations.
 *
 * Bucket `i` holds values `v` with `bounds[i-1] < v <= bounds[i]`; one extra
 * bucket holds everything above the largest bound. Bounds are normalized at
 * registration.
 *
 * @example
 * ```typescript
 * distribution(1, 5, 10, 20, 50, 100, 250)
 * ```
 */
export function distribution(...bounds: number[]): Aggregation {
  return { type: AggregationType.Distribution, buckets: [...bounds] };
}

/**
 * Sorts distribution bounds ascending, dropping zero and duplicate bounds.
 *
 * @throws NegativeBucketBoundsError if any bound is negative
 */
export function normalizeBuckets(bounds: readonly number[]): number[] {
  if (bounds.some((bound) => bound < 0)) {
    throw new NegativeBucketBoundsError(bounds);
  }

  const sorted = [...bounds].sort((a, b) => a - b);
  const normalized: number[] = [];
  for (const bound of sorted) {
    if (bound === 0 || Number.isNaN(bound)) continue;
    if (normalized.length > 0 && normalized[normalized.length - 1] === bound) continue;
    normalized.push(bound);
  }
  return normalized;
}

/**
 * Returns the canonical, frozen form of an aggregation.
 */
export function normalizeAggregation(aggregation: Aggregation): Aggregation {
  const normalized: Aggregation =
    aggregation.type === AggregationType.Distribution
      ? { type: AggregationType.Distribution, buckets: Object.freeze(normalizeBuckets(aggregation.buckets)) }
      : { type: aggregation.type };
  return Object.freeze(normalized);
}

export function sameAggregation(a: Aggregation, b: Aggregation): boolean {
  if (a.type === AggregationType.Distribution && b.type === AggregationType.Distribution) {
    return (
      a.buckets.length === b.buckets.length &&
      a.buckets.every((bound, i) => bound === b.buckets[i])
    );
  }
  return a.type === b.type;
}
