import type { SpeedBucket, SpeedStats } from '../types';
import { average } from './mathUtils';

const round2 = (value: number): number => Math.round(value * 100) / 100;

// No spreading: a long session holds more speeds than a call takes arguments
const minOf = (values: readonly number[]): number => values.reduce((min, v) => (v < min ? v : min), Infinity);
const maxOf = (values: readonly number[]): number => values.reduce((max, v) => (v > max ? v : max), -Infinity);

// Sample standard deviation; a single value has none to speak of
const standardDeviation = (values: readonly number[], mean: number): number => {
  if (values.length < 2) return 0;
  const squares = values.reduce((sum, v) => sum + (v - mean) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
};

export const summarizeSpeeds = (speedsKmh: readonly number[]): SpeedStats => {
  const mean = average(speedsKmh);
  if (mean === null) {
    return { avgKmh: null, minKmh: null, maxKmh: null, stdKmh: null };
  }
  return {
    avgKmh: round2(mean),
    minKmh: round2(minOf(speedsKmh)),
    maxKmh: round2(maxOf(speedsKmh)),
    stdKmh: round2(standardDeviation(speedsKmh, mean)),
  };
};

/**
 * Histogram of speeds in buckets of `bucketWidthKmh`, from 0 up to the fastest
 * speed. The last bucket includes its upper edge.
 */
export const buildSpeedDistribution = (
  speedsKmh: readonly number[],
  bucketWidthKmh: number
): SpeedBucket[] => {
  if (speedsKmh.length === 0) return [];
  if (!(bucketWidthKmh > 0)) {
    throw new RangeError(`Bucket width must be positive, got ${bucketWidthKmh}`);
  }

  const fastest = maxOf(speedsKmh);
  const bucketCount = Math.max(1, Math.ceil(fastest / bucketWidthKmh));
  const counts = new Array<number>(bucketCount).fill(0);
  for (const speed of speedsKmh) {
    const index = Math.min(bucketCount - 1, Math.max(0, Math.floor(speed / bucketWidthKmh)));
    counts[index]++;
  }

  return counts.map((count, i) => {
    const start = i * bucketWidthKmh;
    const end = start + bucketWidthKmh;
    return {
      start,
      end,
      label: `${start}-${end} km/h`,
      count,
      percentage: round2((count / speedsKmh.length) * 100),
    };
  });
};
