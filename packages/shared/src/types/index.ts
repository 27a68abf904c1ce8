/**
 * @fileoverview Core types shared between the engine, the server and tests.
 * These types define the measurements flowing from a hand skeleton to the
 * control-signal receiver.
 */

/**
 * Which hand a skeleton belongs to.
 * Labels are given in the mirrored (selfie) frame, as the detector reports them.
 */
export type Hand = 'Left' | 'Right';

/**
 * Both hands, in the order they are reported and iterated.
 */
export const HANDS: readonly Hand[] = ['Left', 'Right'];

/**
 * Metric names in canonical order.
 * The order of this list is the order of values in every emitted vector.
 */
export const METRIC_NAMES = [
  'tip_to_mcp_0',
  'tip_to_mcp_1',
  'tip_to_mcp_2',
  'tip_to_mcp_3',
  'thumb_to_index_mcp',
  'avg_tip_to_wrist',
  'mcp_to_mcp',
] as const;

/**
 * Name of a single scalar measurement taken from one hand.
 */
export type MetricName = (typeof METRIC_NAMES)[number];

/**
 * Address of one tracked measurement: a metric of a specific hand.
 * State is never shared between the two hands of the same metric.
 */
export interface MetricKey {
  readonly hand: Hand;
  readonly metric: MetricName;
}

/**
 * One value per metric.
 */
export type MetricValues = Record<MetricName, number>;

/**
 * A single 2D landmark in normalized image coordinates (0-1).
 * Depth is carried along when the detector provides it but never measured.
 */
export interface Landmark {
  readonly x: number;
  readonly y: number;
  readonly z?: number | undefined;
}

/**
 * The 21 landmarks of one hand skeleton, in detector order.
 */
export type HandLandmarks = readonly Landmark[];

/**
 * Pixel size of the frame the landmarks were detected in.
 */
export interface FrameSize {
  readonly width: number;
  readonly height: number;
}

/**
 * A hand as reported by the detector. The label may be missing, in which
 * case it is inferred from the skeleton geometry.
 */
export interface DetectedHand {
  readonly landmarks: HandLandmarks;
  readonly handedness?: Hand | undefined;
}

/**
 * Normalization bounds in effect for one metric key.
 */
export interface MetricRange {
  readonly min: number;
  readonly max: number;
}

/**
 * Build a typed metric key.
 */
export function metricKey(hand: Hand, metric: MetricName): MetricKey {
  return { hand, metric };
}

/**
 * Render a key the way logs and overlays label it, e.g. `Left_tip_to_mcp_0`.
 */
export function formatMetricKey(key: MetricKey): string {
  return `${key.hand}_${key.metric}`;
}
