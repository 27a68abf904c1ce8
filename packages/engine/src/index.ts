/**
 * @fileoverview Calibration, normalization and smoothing pipeline.
 *
 * Turns hand skeletons into bounded, temporally stable control values:
 * - MetricExtractor: pixel-space distances between landmarks
 * - RangeTracker: running min/max with per-hand locks
 * - Normalizer: maps a metric into [0, 1] against its effective range
 * - Smoother: moving average over a fixed window
 * - CalibrationController: lock/clear commands
 * - FrameProcessor: orchestrates the above per hand
 */

export { CalibrationController } from './calibration/CalibrationController.js';
export { type LockedCounts, RangeTracker } from './calibration/RangeTracker.js';
export { InvalidHandError } from './errors.js';
export { resolveHandedness } from './handedness.js';
export { extractMetrics, pixelDistance } from './metrics/MetricExtractor.js';
export { mapMetricValues, toMetricVector } from './metrics/metricValues.js';
export { FrameProcessor, type FrameProcessorDeps } from './pipeline/FrameProcessor.js';
export { Normalizer, normalizeInRange } from './pipeline/Normalizer.js';
export { RingBuffer } from './pipeline/RingBuffer.js';
export { Smoother } from './pipeline/Smoother.js';
export { SqueezeEngine, type SqueezeEngineOptions } from './SqueezeEngine.js';
export type { HandResult, MetricsTransport } from './types.js';
