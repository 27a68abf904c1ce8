import type { HandResult } from '@hand-squeeze/engine';
import {
  type CalibrationStatus,
  formatMetricKey,
  type Hand,
  type Logger,
  logger as defaultLogger,
  METRIC_NAMES,
} from '@hand-squeeze/shared';
import type { MetricsView } from '../runtime/types.js';

/**
 * Text view: smoothed metrics every N frames at debug level, calibration
 * changes at info level. An interval of 0 turns metric logging off.
 */
export class LogMetricsView implements MetricsView {
  private frames = 0;

  constructor(
    private readonly everyFrames: number,
    private readonly logger: Logger = defaultLogger
  ) {}

  render(results: readonly HandResult[]): void {
    this.frames++;
    if (this.everyFrames <= 0 || this.frames % this.everyFrames !== 0) {
      return;
    }
    for (const result of results) {
      const metrics: Record<string, number> = {};
      for (const metric of METRIC_NAMES) {
        metrics[formatMetricKey({ hand: result.hand, metric })] =
          Math.round(result.metrics[metric] * 1000) / 1000;
      }
      this.logger.debug('Hand metrics', { frame: this.frames, ...metrics });
    }
  }

  showCalibration(state: Record<Hand, CalibrationStatus>): void {
    this.logger.info('Calibration state', state);
  }

  close(): void {
    this.logger.debug('Metrics view closed', { frames: this.frames });
  }
}

/**
 * Fan every view call out to several views.
 */
export function combineViews(...views: MetricsView[]): MetricsView {
  return {
    render(results) {
      for (const view of views) view.render(results);
    },
    showCalibration(state) {
      for (const view of views) view.showCalibration(state);
    },
    close() {
      for (const view of views) view.close();
    },
  };
}
