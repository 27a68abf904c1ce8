/**
 * @fileoverview Replays a recorded landmark session from a JSONL file.
 *
 * Each non-empty line holds one `landmark_frame` payload (the `type` field may
 * be left out). Replay stops at the end of the file or at the first line that
 * does not parse.
 */

import { readFile } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { LandmarkFrameMessage, type Logger, logger as defaultLogger } from '@hand-squeeze/shared';
import type { FrameSource, LandmarkFrame } from '../runtime/types.js';

const RecordedFrameSchema = LandmarkFrameMessage.omit({ type: true });

export interface RecordingFrameSourceConfig {
  path: string;
  /** Delay before each frame, to replay at capture speed (default: 0) */
  frameIntervalMs?: number | undefined;
  logger?: Logger | undefined;
}

export class RecordingFrameSource implements FrameSource<LandmarkFrame> {
  private readonly path: string;
  private readonly frameIntervalMs: number;
  private readonly logger: Logger;
  private lines: string[] = [];
  private position = 0;

  constructor(config: RecordingFrameSourceConfig) {
    this.path = config.path;
    this.frameIntervalMs = config.frameIntervalMs ?? 0;
    this.logger = config.logger ?? defaultLogger;
  }

  async open(): Promise<void> {
    const contents = await readFile(this.path, 'utf8');
    this.lines = contents.split(/\r?\n/).filter((line) => line.trim().length > 0);
    this.position = 0;
    this.logger.info('Recording opened', { path: this.path, frames: this.lines.length });
  }

  async read(): Promise<LandmarkFrame | null> {
    const line = this.lines[this.position];
    if (line === undefined) {
      return null;
    }
    const lineNumber = this.position + 1;
    this.position++;

    if (this.frameIntervalMs > 0) {
      await sleep(this.frameIntervalMs);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      this.logger.warn('Unreadable frame in recording', { line: lineNumber, error: 'invalid JSON' });
      return null;
    }

    const result = RecordedFrameSchema.safeParse(raw);
    if (!result.success) {
      this.logger.warn('Unreadable frame in recording', {
        line: lineNumber,
        error: result.error.message,
      });
      return null;
    }

    const { width, height, hands } = result.data;
    return { size: { width, height }, hands };
  }

  release(): Promise<void> {
    this.lines = [];
    this.position = 0;
    return Promise.resolve();
  }
}
