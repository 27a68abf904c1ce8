import { type MetricKey, metricKey } from '@hand-squeeze/shared';
import { beforeEach, describe, expect, it } from 'vitest';
import { RangeTracker } from '../src/calibration/RangeTracker.js';

const LEFT_X: MetricKey = metricKey('Left', 'tip_to_mcp_0');
const LEFT_Y: MetricKey = metricKey('Left', 'mcp_to_mcp');
const RIGHT_X: MetricKey = metricKey('Right', 'tip_to_mcp_0');

describe('RangeTracker', () => {
  let ranges: RangeTracker;

  beforeEach(() => {
    ranges = new RangeTracker();
  });

  describe('update', () => {
    it('should track running min and max', () => {
      for (const value of [10, 20, 30, 20, 10]) {
        ranges.update(LEFT_X, value);
      }

      expect(ranges.globalRange(LEFT_X)).toEqual({ min: 10, max: 30 });
    });

    it('should only ever widen the range', () => {
      ranges.update(LEFT_X, 5);
      ranges.update(LEFT_X, 15);
      ranges.update(LEFT_X, 10);

      expect(ranges.globalRange(LEFT_X)).toEqual({ min: 5, max: 15 });
    });

    it('should set min and max from the first observation', () => {
      ranges.update(LEFT_X, 42);
      expect(ranges.globalRange(LEFT_X)).toEqual({ min: 42, max: 42 });
    });

    it('should ignore NaN', () => {
      ranges.update(LEFT_X, 1);
      expect(ranges.update(LEFT_X, Number.NaN)).toBe(false);
      expect(ranges.globalRange(LEFT_X)).toEqual({ min: 1, max: 1 });
    });
  });

  describe('effectiveRange', () => {
    it('should default to [0, 1] for an unseen key', () => {
      expect(ranges.effectiveRange(LEFT_X)).toEqual({ min: 0, max: 1 });
      expect(ranges.globalRange(LEFT_X)).toBeUndefined();
    });

    it('should use running values when nothing is locked', () => {
      ranges.update(LEFT_X, 3);
      ranges.update(LEFT_X, 9);
      expect(ranges.effectiveRange(LEFT_X)).toEqual({ min: 3, max: 9 });
    });

    it('should prefer locked values over running values', () => {
      ranges.update(LEFT_X, 10);
      ranges.update(LEFT_X, 30);
      ranges.lockMin('Left');
      ranges.update(LEFT_X, 2);

      expect(ranges.globalRange(LEFT_X)).toEqual({ min: 2, max: 30 });
      expect(ranges.effectiveRange(LEFT_X)).toEqual({ min: 10, max: 30 });
    });
  });

  describe('locks', () => {
    it('should freeze tracking once max is locked', () => {
      ranges.update(LEFT_X, 10);
      ranges.update(LEFT_X, 30);
      ranges.lockMax('Left');

      expect(ranges.update(LEFT_X, 50)).toBe(false);
      expect(ranges.update(LEFT_X, 1)).toBe(false);
      expect(ranges.globalRange(LEFT_X)).toEqual({ min: 10, max: 30 });
      expect(ranges.effectiveRange(LEFT_X)).toEqual({ min: 10, max: 30 });
    });

    it('should keep tracking when only min is locked', () => {
      ranges.update(LEFT_X, 10);
      ranges.lockMin('Left');

      expect(ranges.update(LEFT_X, 50)).toBe(true);
      expect(ranges.effectiveRange(LEFT_X)).toEqual({ min: 10, max: 50 });
    });

    it('should not gate metrics that were unseen when max was locked', () => {
      ranges.update(LEFT_X, 10);
      ranges.lockMax('Left');

      expect(ranges.update(LEFT_Y, 7)).toBe(true);
      expect(ranges.globalRange(LEFT_Y)).toEqual({ min: 7, max: 7 });
    });

    it('should report how many metrics each boundary covers', () => {
      ranges.update(LEFT_X, 1);
      ranges.update(LEFT_Y, 2);
      expect(ranges.lockMin('Left')).toBe(2);
      expect(ranges.lockedCounts('Left')).toEqual({ min: 2, max: 0 });
    });

    it('should replace a previous lock with current values', () => {
      ranges.update(LEFT_X, 10);
      ranges.lockMin('Left');
      ranges.update(LEFT_X, 4);
      ranges.lockMin('Left');

      expect(ranges.effectiveRange(LEFT_X).min).toBe(4);
    });

    it('should resume tracking after clearing', () => {
      ranges.update(LEFT_X, 10);
      ranges.update(LEFT_X, 30);
      ranges.lockMin('Left');
      ranges.lockMax('Left');
      ranges.clearLocks('Left');

      ranges.update(LEFT_X, 50);
      expect(ranges.effectiveRange(LEFT_X)).toEqual({ min: 10, max: 50 });
      expect(ranges.lockedCounts('Left')).toEqual({ min: 0, max: 0 });
    });
  });

  describe('hand isolation', () => {
    it('should keep each hand in its own partition', () => {
      ranges.update(LEFT_X, 10);
      ranges.update(LEFT_X, 30);
      ranges.update(RIGHT_X, 100);

      ranges.lockMax('Right');
      ranges.update(LEFT_X, 60);

      expect(ranges.globalRange(LEFT_X)).toEqual({ min: 10, max: 60 });
      expect(ranges.globalRange(RIGHT_X)).toEqual({ min: 100, max: 100 });
      expect(ranges.lockedCounts('Left')).toEqual({ min: 0, max: 0 });
    });

    it('should lock only the requested hand', () => {
      ranges.update(LEFT_X, 10);
      ranges.update(RIGHT_X, 20);

      expect(ranges.lockMax('Left')).toBe(1);
      expect(ranges.lockedCounts('Right')).toEqual({ min: 0, max: 0 });
      expect(ranges.update(RIGHT_X, 40)).toBe(true);
    });

    it('should clear only the requested hand', () => {
      ranges.update(LEFT_X, 10);
      ranges.update(RIGHT_X, 20);
      ranges.lockMax('Left');
      ranges.lockMax('Right');

      ranges.clearLocks('Left');

      expect(ranges.lockedCounts('Left')).toEqual({ min: 0, max: 0 });
      expect(ranges.lockedCounts('Right')).toEqual({ min: 0, max: 1 });
    });
  });
});
