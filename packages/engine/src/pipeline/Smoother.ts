/**
 * @fileoverview Simple moving average over the last N normalized samples of each key.
 *
 * This is a hard window, not exponential smoothing: a sample contributes
 * equally until it is evicted. Buffers are created on first use of a key and
 * live as long as the smoother, so memory is bounded at 14 x N values.
 */

import {
  DEFAULT_SMOOTHING_WINDOW,
  type Hand,
  type MetricKey,
  type MetricName,
} from '@hand-squeeze/shared';
import { RingBuffer } from './RingBuffer.js';

export class Smoother {
  private readonly buffers: Record<Hand, Map<MetricName, RingBuffer>> = {
    Left: new Map(),
    Right: new Map(),
  };

  constructor(readonly windowSize: number = DEFAULT_SMOOTHING_WINDOW) {
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new RangeError(`Smoothing window must be a positive integer, got ${windowSize}`);
    }
  }

  /**
   * Record a sample and return the mean of the key's window.
   */
  smooth(key: MetricKey, value: number): number {
    const buffer = this.ensureBuffer(key);
    buffer.push(value);
    return buffer.mean();
  }

  /**
   * Number of samples currently held for a key.
   */
  bufferedCount(key: MetricKey): number {
    return this.buffers[key.hand].get(key.metric)?.size ?? 0;
  }

  /** Samples currently held for a key, oldest first */
  window(key: MetricKey): number[] {
    return this.buffers[key.hand].get(key.metric)?.toArray() ?? [];
  }

  private ensureBuffer(key: MetricKey): RingBuffer {
    const buffers = this.buffers[key.hand];
    let buffer = buffers.get(key.metric);
    if (!buffer) {
      buffer = new RingBuffer(this.windowSize);
      buffers.set(key.metric, buffer);
    }
    return buffer;
  }
}
