import { describe, it, expect } from 'vitest';
import { buildSpeedDistribution, summarizeSpeeds } from './speedStats';

describe('buildSpeedDistribution()', () => {
  it('buckets speeds from zero up to the fastest', () => {
    const buckets = buildSpeedDistribution([3, 7, 12, 10], 5);

    expect(buckets).toEqual([
      { start: 0, end: 5, label: '0-5 km/h', count: 1, percentage: 25 },
      { start: 5, end: 10, label: '5-10 km/h', count: 1, percentage: 25 },
      { start: 10, end: 15, label: '10-15 km/h', count: 2, percentage: 50 },
    ]);
  });

  it('puts the fastest speed in the last bucket when it sits on an edge', () => {
    const buckets = buildSpeedDistribution([10], 5);

    expect(buckets.map((b) => b.count)).toEqual([0, 1]);
    expect(buckets[1].end).toBe(10);
  });

  it('keeps a single bucket for stationary vehicles', () => {
    expect(buildSpeedDistribution([0], 5)).toEqual([
      { start: 0, end: 5, label: '0-5 km/h', count: 1, percentage: 100 },
    ]);
  });

  it('returns no buckets without speeds', () => {
    expect(buildSpeedDistribution([], 5)).toEqual([]);
  });

  it('handles more speeds than fit in an argument list', () => {
    const speeds = Array.from({ length: 500_000 }, (_, i) => i % 100);
    const buckets = buildSpeedDistribution(speeds, 5);

    // fastest is 99: twenty buckets of 25,000 each
    expect(buckets).toHaveLength(20);
    expect(buckets[19]).toEqual({ start: 95, end: 100, label: '95-100 km/h', count: 25_000, percentage: 5 });
  });

  it('rejects a non-positive bucket width', () => {
    expect(() => buildSpeedDistribution([10], 0)).toThrow(RangeError);
  });
});

describe('summarizeSpeeds()', () => {
  it('reports mean, range and sample standard deviation', () => {
    expect(summarizeSpeeds([10, 20])).toEqual({ avgKmh: 15, minKmh: 10, maxKmh: 20, stdKmh: 7.07 });
  });

  it('reports a single speed with no spread', () => {
    expect(summarizeSpeeds([12.346])).toEqual({ avgKmh: 12.35, minKmh: 12.35, maxKmh: 12.35, stdKmh: 0 });
  });

  it('summarizes a very long session', () => {
    const speeds = Array.from({ length: 500_000 }, (_, i) => 20 + (i % 41));

    const stats = summarizeSpeeds(speeds);
    expect(stats.minKmh).toBe(20);
    expect(stats.maxKmh).toBe(60);
  });

  it('leaves everything unknown without speeds', () => {
    expect(summarizeSpeeds([])).toEqual({ avgKmh: null, minKmh: null, maxKmh: null, stdKmh: null });
  });
});
