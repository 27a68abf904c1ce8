/**
 * @fileoverview Running min/max per metric key, with per-hand locked bounds.
 *
 * Every map is partitioned by hand, so no operation on one hand's keys can
 * read or write the other hand's state.
 *
 * Tracking is gated only by the max lock: once a hand's max is locked, its
 * global min and max both stop moving. Locking the min alone leaves tracking
 * running and only overrides the lower bound used for normalization.
 */

import {
  DEFAULT_RANGE_MAX,
  DEFAULT_RANGE_MIN,
  type Hand,
  type MetricKey,
  type MetricName,
  type MetricRange,
} from '@hand-squeeze/shared';

type PerHand<T> = Record<Hand, T>;
type BoundMap = Map<MetricName, number>;

function emptyPerHand(): PerHand<BoundMap> {
  return { Left: new Map(), Right: new Map() };
}

/**
 * Number of metrics covered by each locked boundary of a hand.
 */
export interface LockedCounts {
  readonly min: number;
  readonly max: number;
}

export class RangeTracker {
  private readonly globalMin = emptyPerHand();
  private readonly globalMax = emptyPerHand();
  private readonly lockedMin = emptyPerHand();
  private readonly lockedMax = emptyPerHand();

  /**
   * Widen the running range of a key with a new observation.
   * @returns false when tracking for the key is frozen by a max lock
   */
  update(key: MetricKey, value: number): boolean {
    if (this.lockedMax[key.hand].has(key.metric)) {
      return false;
    }
    if (Number.isNaN(value)) {
      return false;
    }

    const mins = this.globalMin[key.hand];
    const maxes = this.globalMax[key.hand];
    const currentMin = mins.get(key.metric);
    const currentMax = maxes.get(key.metric);

    if (currentMin === undefined || value < currentMin) {
      mins.set(key.metric, value);
    }
    if (currentMax === undefined || value > currentMax) {
      maxes.set(key.metric, value);
    }
    return true;
  }

  /**
   * Bounds used for normalization: locked value, else running value, else default.
   */
  effectiveRange(key: MetricKey): MetricRange {
    const min =
      this.lockedMin[key.hand].get(key.metric) ??
      this.globalMin[key.hand].get(key.metric) ??
      DEFAULT_RANGE_MIN;
    const max =
      this.lockedMax[key.hand].get(key.metric) ??
      this.globalMax[key.hand].get(key.metric) ??
      DEFAULT_RANGE_MAX;
    return { min, max };
  }

  /**
   * The running range of a key, or undefined before its first observation.
   */
  globalRange(key: MetricKey): MetricRange | undefined {
    const min = this.globalMin[key.hand].get(key.metric);
    const max = this.globalMax[key.hand].get(key.metric);
    if (min === undefined || max === undefined) {
      return undefined;
    }
    return { min, max };
  }

  /**
   * Replace the hand's locked min with its current running minimums.
   * @returns number of metrics locked
   */
  lockMin(hand: Hand): number {
    this.lockedMin[hand] = new Map(this.globalMin[hand]);
    return this.lockedMin[hand].size;
  }

  /**
   * Replace the hand's locked max with its current running maximums.
   * From now on the hand's locked metrics stop tracking.
   * @returns number of metrics locked
   */
  lockMax(hand: Hand): number {
    this.lockedMax[hand] = new Map(this.globalMax[hand]);
    return this.lockedMax[hand].size;
  }

  /**
   * Drop both locked boundaries of a hand. Running ranges are kept.
   */
  clearLocks(hand: Hand): void {
    this.lockedMin[hand].clear();
    this.lockedMax[hand].clear();
  }

  lockedCounts(hand: Hand): LockedCounts {
    return { min: this.lockedMin[hand].size, max: this.lockedMax[hand].size };
  }
}
