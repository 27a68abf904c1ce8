/**
 * @fileoverview Wires configuration, sources, engine, transport and views
 * into a tracker loop.
 */

import { SqueezeEngine } from '@hand-squeeze/engine';
import { type Logger, logger as defaultLogger } from '@hand-squeeze/shared';
import type { TrackerConfig } from './config/trackerConfig.js';
import { KeyboardCommandSource, type KeyInput, mergeCommandSources } from './input/KeyboardCommandSource.js';
import { LandmarkStreamServer } from './input/LandmarkStreamServer.js';
import { passthroughDetector } from './input/passthroughDetector.js';
import { RecordingFrameSource } from './input/RecordingFrameSource.js';
import { TrackerLoop } from './runtime/TrackerLoop.js';
import type { CommandSource, FrameSource, LandmarkFrame, MetricsView } from './runtime/types.js';
import { OscUdpTransport } from './transport/OscUdpTransport.js';
import { combineViews, LogMetricsView } from './view/LogMetricsView.js';

export {
  clearConfigCache,
  type KeyBindings,
  loadTrackerConfig,
  parseTrackerConfig,
  type TrackerConfig,
} from './config/trackerConfig.js';
export { commandForKey, KeyboardCommandSource, mergeCommandSources } from './input/KeyboardCommandSource.js';
export { type Connection, LandmarkStreamServer } from './input/LandmarkStreamServer.js';
export { passthroughDetector } from './input/passthroughDetector.js';
export { RecordingFrameSource } from './input/RecordingFrameSource.js';
export { type LoopExitReason, TrackerLoop } from './runtime/TrackerLoop.js';
export type {
  CommandSource,
  Detection,
  FrameSource,
  HandDetector,
  LandmarkFrame,
  MetricsView,
} from './runtime/types.js';
export { encodeOscMessage, OscEncodingError } from './transport/oscMessage.js';
export { OscUdpTransport } from './transport/OscUdpTransport.js';
export { combineViews, LogMetricsView } from './view/LogMetricsView.js';

export interface TrackerOptions {
  /** Read commands from this stream (default: no keyboard) */
  keyInput?: KeyInput | undefined;
  logger?: Logger | undefined;
}

/**
 * Build a ready-to-run loop from configuration.
 */
export function createTracker(
  config: TrackerConfig,
  options: TrackerOptions = {}
): TrackerLoop<LandmarkFrame> {
  const logger = options.logger ?? defaultLogger;

  const transport = new OscUdpTransport({
    host: config.transport.host,
    port: config.transport.port,
    logger,
  });
  const engine = new SqueezeEngine({
    transport,
    smoothingWindow: config.pipeline.smoothingWindow,
    logger,
  });

  const commandSources: CommandSource[] = [];
  const keyboard = options.keyInput
    ? new KeyboardCommandSource(config.keys, options.keyInput)
    : null;
  if (keyboard) {
    commandSources.push(keyboard);
  }
  const views: MetricsView[] = [new LogMetricsView(config.logging.metricsEveryFrames, logger)];

  let source: FrameSource<LandmarkFrame>;
  if (config.source.kind === 'websocket') {
    const server = new LandmarkStreamServer({
      port: config.source.port,
      host: config.source.host,
      logger,
    });
    commandSources.push(server.commands);
    views.push(server.view);
    source = server;
  } else {
    source = new RecordingFrameSource({
      path: config.source.path,
      frameIntervalMs: config.source.frameIntervalMs,
      logger,
    });
  }

  const loop = new TrackerLoop({
    source,
    detector: passthroughDetector,
    engine,
    commands: mergeCommandSources(...commandSources),
    view: combineViews(...views),
    transport,
    logger,
  });

  if (keyboard) {
    keyboard.onQuit(() => loop.stop());
    keyboard.start();
  }
  return loop;
}
