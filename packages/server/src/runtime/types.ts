import type { HandResult } from '@hand-squeeze/engine';
import type {
  CalibrationStatus,
  DetectedHand,
  FrameSize,
  Hand,
  TrackerCommand,
} from '@hand-squeeze/shared';

/**
 * A frame whose hands were already detected on the capture side.
 */
export interface LandmarkFrame {
  readonly size: FrameSize;
  readonly hands: readonly DetectedHand[];
}

/**
 * Where frames come from.
 */
export interface FrameSource<TFrame> {
  /** @throws when the source cannot be opened */
  open(): Promise<void>;
  /** Next frame, or null when no further frame can be read */
  read(): Promise<TFrame | null>;
  /** Wake a pending read so that it resolves null */
  cancel?(): void;
  release(): Promise<void>;
}

export interface Detection {
  readonly size: FrameSize;
  readonly hands: readonly DetectedHand[];
}

export interface HandDetector<TFrame> {
  detect(frame: TFrame): Promise<Detection>;
}

export interface CommandSource {
  /** Next pending command, without blocking */
  poll(): TrackerCommand | null;
  close(): void;
}

export interface MetricsView {
  render(results: readonly HandResult[]): void;
  showCalibration(state: Record<Hand, CalibrationStatus>): void;
  close(): void;
}
