import type { Hand, MetricValues } from '@hand-squeeze/shared';

/**
 * Receiver of the per-hand control vector (an OSC client in production).
 */
export interface MetricsTransport {
  /**
   * Deliver one hand's vector.
   * @param address - `/hand/left` or `/hand/right`
   * @param values - the 7 smoothed values in canonical metric order
   */
  send(address: string, values: readonly number[]): void;
}

/**
 * Output of processing one hand of one frame.
 */
export interface HandResult {
  readonly hand: Hand;
  /** Smoothed values in canonical metric order, as sent to the transport */
  readonly values: readonly number[];
  /** The same values keyed by metric name, for overlays */
  readonly metrics: MetricValues;
}
