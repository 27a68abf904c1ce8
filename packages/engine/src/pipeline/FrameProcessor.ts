/**
 * @fileoverview Runs the measurement pipeline for each detected hand of a frame.
 *
 * Per hand: extract the 7 metrics, then for each metric in canonical order
 * update its range, normalize it and smooth it. The smoothed vector goes to
 * the transport and is returned for display. A failure anywhere in that chain
 * skips the hand for this frame; nothing is thrown to the caller.
 */

import {
  type DetectedHand,
  type FrameSize,
  type Hand,
  type HandLandmarks,
  type Logger,
  OSC_ADDRESSES,
  metricKey,
} from '@hand-squeeze/shared';
import type { RangeTracker } from '../calibration/RangeTracker.js';
import { resolveHandedness } from '../handedness.js';
import { extractMetrics } from '../metrics/MetricExtractor.js';
import { mapMetricValues, toMetricVector } from '../metrics/metricValues.js';
import type { HandResult, MetricsTransport } from '../types.js';
import type { Normalizer } from './Normalizer.js';
import type { Smoother } from './Smoother.js';

export interface FrameProcessorDeps {
  readonly ranges: RangeTracker;
  readonly normalizer: Normalizer;
  readonly smoother: Smoother;
  readonly transport: MetricsTransport;
  readonly logger: Logger;
}

export class FrameProcessor {
  constructor(private readonly deps: FrameProcessorDeps) {}

  /**
   * Process a hand whose side is already known.
   * @returns the hand's result, or null if it was skipped
   */
  process(hand: Hand, landmarks: HandLandmarks, frame: FrameSize): HandResult | null {
    try {
      return this.run(hand, landmarks, frame);
    } catch (error) {
      this.logSkipped(hand, error);
      return null;
    }
  }

  /**
   * Process a hand as reported by the detector, inferring its side when unlabeled.
   */
  processDetected(detected: DetectedHand, frame: FrameSize): HandResult | null {
    let hand: Hand;
    try {
      hand = resolveHandedness(detected.landmarks, detected.handedness);
    } catch (error) {
      this.logSkipped(undefined, error);
      return null;
    }
    return this.process(hand, detected.landmarks, frame);
  }

  private run(hand: Hand, landmarks: HandLandmarks, frame: FrameSize): HandResult {
    const { ranges, normalizer, smoother, transport } = this.deps;
    const raw = extractMetrics(landmarks, frame);

    const metrics = mapMetricValues(raw, (metric, value) => {
      const key = metricKey(hand, metric);
      ranges.update(key, value);
      return smoother.smooth(key, normalizer.normalize(key, value));
    });
    const values = toMetricVector(metrics);

    transport.send(OSC_ADDRESSES[hand], values);
    return { hand, values, metrics };
  }

  private logSkipped(hand: Hand | undefined, error: unknown): void {
    this.deps.logger.warn('Skipping hand for this frame', {
      hand: hand ?? 'unknown',
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
