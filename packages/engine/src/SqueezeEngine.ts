/**
 * @fileoverview The owned pipeline object.
 *
 * All state that lives for the whole run (running ranges, locked bounds,
 * smoothing buffers) hangs off one engine instance created at startup.
 * Tests build a fresh engine instead of resetting anything global.
 */

import {
  type CalibrationCommand,
  type CalibrationStatus,
  DEFAULT_SMOOTHING_WINDOW,
  type DetectedHand,
  type FrameSize,
  type Hand,
  type Logger,
  logger as defaultLogger,
} from '@hand-squeeze/shared';
import { CalibrationController } from './calibration/CalibrationController.js';
import { RangeTracker } from './calibration/RangeTracker.js';
import { FrameProcessor } from './pipeline/FrameProcessor.js';
import { Normalizer } from './pipeline/Normalizer.js';
import { Smoother } from './pipeline/Smoother.js';
import type { HandResult, MetricsTransport } from './types.js';

export interface SqueezeEngineOptions {
  /** Where each hand's vector is sent */
  readonly transport: MetricsTransport;
  /** Samples averaged per metric (default: 5) */
  readonly smoothingWindow?: number;
  readonly logger?: Logger;
}

export class SqueezeEngine {
  readonly ranges: RangeTracker;
  readonly normalizer: Normalizer;
  readonly smoother: Smoother;
  readonly calibration: CalibrationController;
  readonly processor: FrameProcessor;

  constructor(options: SqueezeEngineOptions) {
    const logger = options.logger ?? defaultLogger;
    this.ranges = new RangeTracker();
    this.normalizer = new Normalizer(this.ranges);
    this.smoother = new Smoother(options.smoothingWindow ?? DEFAULT_SMOOTHING_WINDOW);
    this.calibration = new CalibrationController(this.ranges, logger);
    this.processor = new FrameProcessor({
      ranges: this.ranges,
      normalizer: this.normalizer,
      smoother: this.smoother,
      transport: options.transport,
      logger,
    });
  }

  /**
   * Process every detected hand of a frame, in detection order.
   * Skipped hands are left out of the result.
   */
  processFrame(hands: readonly DetectedHand[], frame: FrameSize): HandResult[] {
    const results: HandResult[] = [];
    for (const detected of hands) {
      const result = this.processor.processDetected(detected, frame);
      if (result) {
        results.push(result);
      }
    }
    return results;
  }

  applyCalibration(command: CalibrationCommand): void {
    this.calibration.apply(command);
  }

  calibrationState(): Record<Hand, CalibrationStatus> {
    return this.calibration.snapshot();
  }
}
