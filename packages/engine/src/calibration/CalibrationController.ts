/**
 * @fileoverview Executes calibration commands against the range tracker.
 *
 * A hand's calibration state is derived from which of its boundaries are
 * locked; no separate flag is stored.
 */

import {
  type CalibrationCommand,
  type CalibrationStatus,
  type Hand,
  HANDS,
  type Logger,
  logger as defaultLogger,
} from '@hand-squeeze/shared';
import type { RangeTracker } from './RangeTracker.js';

export class CalibrationController {
  constructor(
    private readonly ranges: RangeTracker,
    private readonly logger: Logger = defaultLogger
  ) {}

  /**
   * Freeze the lower bound of every tracked metric of a hand at its current value.
   */
  lockMin(hand: Hand): void {
    const metrics = this.ranges.lockMin(hand);
    this.logger.info('Locked min', { hand, metrics });
  }

  /**
   * Freeze the upper bound of every tracked metric of a hand at its current value.
   * This also stops range tracking for those metrics until cleared.
   */
  lockMax(hand: Hand): void {
    const metrics = this.ranges.lockMax(hand);
    this.logger.info('Locked max', { hand, metrics });
  }

  /**
   * Return a hand to pure running-range tracking.
   */
  clear(hand: Hand): void {
    this.ranges.clearLocks(hand);
    this.logger.info('Calibration cleared', { hand });
  }

  apply(command: CalibrationCommand): void {
    switch (command.kind) {
      case 'lock_min':
        this.lockMin(command.hand);
        break;
      case 'lock_max':
        this.lockMax(command.hand);
        break;
      case 'clear':
        for (const hand of HANDS) {
          this.clear(hand);
        }
        break;
    }
  }

  status(hand: Hand): CalibrationStatus {
    const counts = this.ranges.lockedCounts(hand);
    if (counts.min > 0 && counts.max > 0) return 'both_locked';
    if (counts.min > 0) return 'min_locked';
    if (counts.max > 0) return 'max_locked';
    return 'unlocked';
  }

  snapshot(): Record<Hand, CalibrationStatus> {
    return { Left: this.status('Left'), Right: this.status('Right') };
  }
}
