/**
 * @fileoverview Main entry point for the shared package.
 * Re-exports all types, protocol definitions, and constants.
 */

// Constants
export {
  DEFAULT_OSC_HOST,
  DEFAULT_OSC_PORT,
  DEFAULT_RANGE_MAX,
  DEFAULT_RANGE_MIN,
  DEFAULT_SMOOTHING_WINDOW,
  DEGENERATE_RANGE_EPSILON,
  FINGERTIPS,
  HAND_LANDMARKS,
  KNUCKLES,
  LANDMARK_COUNT,
  OSC_ADDRESSES,
} from './constants.js';
// Protocol
export {
  type CalibrationCommand,
  CalibrationCommandSchema,
  type CalibrationStatus,
  CalibrationStatusSchema,
  CalibrationStateMessage,
  ClientMessage,
  CommandMessage,
  DetectedHandSchema,
  ErrorMessage,
  HandMetricsMessage,
  HandSchema,
  LandmarkFrameMessage,
  LandmarkSchema,
  MetricValuesSchema,
  parseClientMessage,
  ServerMessage,
  serializeServerMessage,
  StreamEndMessage,
  type TrackerCommand,
  TrackerCommandSchema,
} from './protocol/index.js';
// Types
export type {
  DetectedHand,
  FrameSize,
  Hand,
  HandLandmarks,
  Landmark,
  MetricKey,
  MetricName,
  MetricRange,
  MetricValues,
} from './types/index.js';
export { formatMetricKey, HANDS, METRIC_NAMES, metricKey } from './types/index.js';

// Logging
export {
  formatLog,
  getLogLevel,
  type Logger,
  type LogLevel,
  logger,
  setLogLevel,
} from './utils/logger.js';
