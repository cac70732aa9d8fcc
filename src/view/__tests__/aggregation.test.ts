import { describe, it, expect } from 'vitest';
import { NegativeBucketBoundsError } from '../../errors';
import {
  AggregationType,
  count,
  distribution,
  lastValue,
  normalizeAggregation,
  normalizeBuckets,
  sameAggregation,
  sum,
} from '../aggregation';
import {
  addSample,
  bucketIndex,
  cloneAggregationData,
  distributionSum,
  distributionVariance,
  newAggregationData,
} from '../aggregation-data';
import type { AggregationData, DistributionData } from '../aggregation-data';

const T0 = new Date('2026-01-01T00:00:00Z');
const T1 = new Date('2026-01-01T00:00:01Z');

function distributionData(...bounds: number[]): DistributionData {
  const data = newAggregationData(normalizeAggregation(distribution(...bounds)), T0);
  if (data.type !== AggregationType.Distribution) {
    throw new Error('expected distribution data');
  }
  return data;
}

function feed(data: AggregationData, ...values: number[]): void {
  for (const value of values) {
    addSample(data, value, undefined, T1);
  }
}

describe('normalizeBuckets', () => {
  it('should sort bounds ascending', () => {
    expect(normalizeBuckets([2, 1])).toEqual([1, 2]);
  });

  it('should drop zero and duplicate bounds', () => {
    expect(normalizeBuckets([2, 0, 1])).toEqual([1, 2]);
    expect(normalizeBuckets([5, 1, 5, 1])).toEqual([1, 5]);
  });

  it('should reject negative bounds', () => {
    expect(() => normalizeBuckets([-1, 2])).toThrow(NegativeBucketBoundsError);
    expect(() => normalizeBuckets([-1, 2])).toThrow('negative bucket bounds not supported: [-1, 2]');
  });

  it('should accept no bounds at all', () => {
    expect(normalizeBuckets([])).toEqual([]);
  });
});

describe('sameAggregation', () => {
  it('should compare kinds', () => {
    expect(sameAggregation(count(), count())).toBe(true);
    expect(sameAggregation(count(), sum())).toBe(false);
  });

  it('should compare distribution bounds', () => {
    expect(sameAggregation(distribution(1, 2), distribution(1, 2))).toBe(true);
    expect(sameAggregation(distribution(1, 2), distribution(1, 3))).toBe(false);
    expect(sameAggregation(distribution(1), distribution(1, 2))).toBe(false);
  });
});

describe('bucketIndex', () => {
  const bounds = [1, 5, 10];

  it('should place a value equal to a bound in that bound bucket', () => {
    expect(bucketIndex(bounds, 1)).toBe(0);
    expect(bucketIndex(bounds, 5)).toBe(1);
    expect(bucketIndex(bounds, 10)).toBe(2);
  });

  it('should place values between bounds in the upper bucket', () => {
    expect(bucketIndex(bounds, 0.5)).toBe(0);
    expect(bucketIndex(bounds, 1.5)).toBe(1);
    expect(bucketIndex(bounds, 7)).toBe(2);
  });

  it('should place values above every bound in the overflow bucket', () => {
    expect(bucketIndex(bounds, 11)).toBe(3);
    expect(bucketIndex([], 42)).toBe(0);
  });
});

describe('accumulators', () => {
  it('should count values regardless of their magnitude', () => {
    const data = newAggregationData(count(), T0);
    feed(data, 100, -3, 0.5);

    expect(data).toEqual({ type: AggregationType.Count, value: 3 });
  });

  it('should sum values and keep the start time', () => {
    const data = newAggregationData(sum(), T0);
    feed(data, 1, 5);

    expect(data).toEqual({ type: AggregationType.Sum, value: 6, start: T0 });
  });

  it('should keep the last value', () => {
    const data = newAggregationData(lastValue(), T0);
    feed(data, 4, 9, 2);

    expect(data).toEqual({ type: AggregationType.LastValue, value: 2 });
  });

  it('should start a distribution with infinite min and max', () => {
    const data = distributionData(2);

    expect(data.min).toBe(Number.POSITIVE_INFINITY);
    expect(data.max).toBe(Number.NEGATIVE_INFINITY);
    expect(data.countPerBucket).toEqual([0, 0]);
  });

  it('should track count, min, max, mean and squared deviation', () => {
    const data = distributionData(2);
    feed(data, 1, 5);

    expect(data.count).toBe(2);
    expect(data.min).toBe(1);
    expect(data.max).toBe(5);
    expect(data.mean).toBe(3);
    expect(data.sumOfSquaredDev).toBe(8);
    expect(data.countPerBucket).toEqual([1, 1]);
    expect(distributionSum(data)).toBe(6);
    expect(distributionVariance(data)).toBe(8);
  });

  it('should report zero variance below two samples', () => {
    const data = distributionData(2);
    feed(data, 7);

    expect(distributionVariance(data)).toBe(0);
  });

  it('should keep the most recent exemplar per bucket', () => {
    const data = distributionData(10);
    addSample(data, 3, { trace: 'a' }, T0);
    addSample(data, 4, { trace: 'b' }, T1);
    addSample(data, 50, undefined, T1);

    expect(data.exemplarsPerBucket[0]).toEqual({ value: 4, attachments: { trace: 'b' }, timestamp: T1 });
    expect(data.exemplarsPerBucket[1]).toBeUndefined();
  });

  it('should clone independently of later samples', () => {
    const data = distributionData(2);
    feed(data, 1);
    const snapshot = cloneAggregationData(data);
    feed(data, 5);

    expect(snapshot).toMatchObject({ count: 1, countPerBucket: [1, 0] });
  });
});
