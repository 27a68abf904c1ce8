import {
  DEGENERATE_RANGE_EPSILON,
  type MetricKey,
  type MetricRange,
} from '@hand-squeeze/shared';
import type { RangeTracker } from '../calibration/RangeTracker.js';

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Map a raw value into [0, 1] against a range.
 * A range narrower than 1e-9 (or inverted) yields exactly 0.
 */
export function normalizeInRange(value: number, range: MetricRange): number {
  const span = range.max - range.min;
  if (span < DEGENERATE_RANGE_EPSILON) {
    return 0;
  }
  return clamp01((value - range.min) / span);
}

/**
 * Normalizes raw metrics against the range currently in effect for their key.
 */
export class Normalizer {
  constructor(private readonly ranges: RangeTracker) {}

  normalize(key: MetricKey, value: number): number {
    return normalizeInRange(value, this.ranges.effectiveRange(key));
  }
}
