/**
 * @fileoverview The single-threaded frame loop.
 *
 * One iteration reads a frame, detects hands, runs the engine over them in
 * detection order, renders the results, then polls and applies at most one
 * command. `quit` takes effect at the top of the next iteration.
 *
 * Every collaborator is released when `run()` settles, whichever way it ends.
 */

import type { SqueezeEngine } from '@hand-squeeze/engine';
import { type Logger, logger as defaultLogger, type TrackerCommand } from '@hand-squeeze/shared';
import type { CommandSource, Detection, FrameSource, HandDetector, MetricsView } from './types.js';

export type LoopExitReason = 'quit' | 'end_of_stream' | 'open_failed';

export interface ClosableTransport {
  close(): Promise<void>;
}

export interface TrackerLoopDeps<TFrame> {
  source: FrameSource<TFrame>;
  detector: HandDetector<TFrame>;
  engine: SqueezeEngine;
  commands: CommandSource;
  view: MetricsView;
  /** Closed together with the other collaborators */
  transport: ClosableTransport;
  logger?: Logger | undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class TrackerLoop<TFrame> {
  private readonly logger: Logger;
  private stopRequested = false;
  private frames = 0;

  constructor(private readonly deps: TrackerLoopDeps<TFrame>) {
    this.logger = deps.logger ?? defaultLogger;
  }

  /** Frames read so far */
  get frameCount(): number {
    return this.frames;
  }

  async run(): Promise<LoopExitReason> {
    try {
      try {
        await this.deps.source.open();
      } catch (error) {
        this.logger.error('Cannot open frame source', { error: errorMessage(error) });
        return 'open_failed';
      }
      const reason = await this.loop();
      this.logger.info('Tracker loop finished', { reason, frames: this.frames });
      return reason;
    } finally {
      await this.releaseAll();
    }
  }

  /**
   * Ask the loop to end as if `quit` had been issued.
   */
  stop(): void {
    this.stopRequested = true;
    this.deps.source.cancel?.();
  }

  private async loop(): Promise<LoopExitReason> {
    while (!this.stopRequested) {
      const frame = await this.deps.source.read();
      if (frame === null) {
        return this.stopRequested ? 'quit' : 'end_of_stream';
      }
      this.frames++;

      const detection = await this.detect(frame);
      const results = this.deps.engine.processFrame(detection.hands, detection.size);
      this.deps.view.render(results);

      const command = this.deps.commands.poll();
      if (command) {
        this.apply(command);
      }
    }
    return 'quit';
  }

  private async detect(frame: TFrame): Promise<Detection> {
    try {
      return await this.deps.detector.detect(frame);
    } catch (error) {
      this.logger.warn('Hand detection failed', { frame: this.frames, error: errorMessage(error) });
      return { size: { width: 0, height: 0 }, hands: [] };
    }
  }

  private apply(command: TrackerCommand): void {
    if (command.kind === 'quit') {
      this.logger.info('Quit requested');
      this.stopRequested = true;
      return;
    }
    this.deps.engine.applyCalibration(command);
    this.deps.view.showCalibration(this.deps.engine.calibrationState());
  }

  private async releaseAll(): Promise<void> {
    this.deps.commands.close();
    this.deps.view.close();
    try {
      await this.deps.source.release();
    } catch (error) {
      this.logger.error('Failed to release frame source', { error: errorMessage(error) });
    }
    try {
      await this.deps.transport.close();
    } catch (error) {
      this.logger.error('Failed to close transport', { error: errorMessage(error) });
    }
  }
}
