/**
 * @fileoverview Landmark stream protocol message definitions.
 * Uses Zod for runtime validation of incoming messages.
 *
 * A capture client (a browser page running the hand detector, or a replay
 * tool) connects over WebSocket, streams `landmark_frame` messages and may
 * send calibration commands. The server answers with the smoothed metrics
 * of every processed hand so the client can draw its overlay.
 */

import { z } from 'zod';
import { LANDMARK_COUNT } from '../constants.js';

// ============ Shared Schemas ============

/**
 * Schema for hand labels.
 */
export const HandSchema = z.enum(['Left', 'Right']);

/**
 * Schema for one landmark in normalized image coordinates.
 */
export const LandmarkSchema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number().optional(),
});

/**
 * Schema for one detected hand.
 */
export const DetectedHandSchema = z.object({
  landmarks: z.array(LandmarkSchema).length(LANDMARK_COUNT),
  handedness: HandSchema.optional(),
});

/**
 * Schema for the 7 metric values of one hand.
 */
export const MetricValuesSchema = z.object({
  tip_to_mcp_0: z.number(),
  tip_to_mcp_1: z.number(),
  tip_to_mcp_2: z.number(),
  tip_to_mcp_3: z.number(),
  thumb_to_index_mcp: z.number(),
  avg_tip_to_wrist: z.number(),
  mcp_to_mcp: z.number(),
});

/**
 * Schema for the derived calibration state of one hand.
 */
export const CalibrationStatusSchema = z.enum([
  'unlocked',
  'min_locked',
  'max_locked',
  'both_locked',
]);
export type CalibrationStatus = z.infer<typeof CalibrationStatusSchema>;

// ============ Commands ============

/**
 * Calibration commands. `clear` always applies to both hands.
 */
export const CalibrationCommandSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('lock_min'), hand: HandSchema }),
  z.object({ kind: z.literal('lock_max'), hand: HandSchema }),
  z.object({ kind: z.literal('clear') }),
]);
export type CalibrationCommand = z.infer<typeof CalibrationCommandSchema>;

/**
 * Everything the command surface can ask the tracker to do.
 */
export const TrackerCommandSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('lock_min'), hand: HandSchema }),
  z.object({ kind: z.literal('lock_max'), hand: HandSchema }),
  z.object({ kind: z.literal('clear') }),
  z.object({ kind: z.literal('quit') }),
]);
export type TrackerCommand = z.infer<typeof TrackerCommandSchema>;

// ============ Client -> Server Messages ============

/**
 * One captured frame with every hand the detector found in it.
 */
export const LandmarkFrameMessage = z.object({
  type: z.literal('landmark_frame'),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  hands: z.array(DetectedHandSchema).max(2),
});
export type LandmarkFrameMessage = z.infer<typeof LandmarkFrameMessage>;

/**
 * A command issued from the capture client.
 */
export const CommandMessage = z.object({
  type: z.literal('command'),
  command: TrackerCommandSchema,
});

/**
 * The capture side has no more frames to send.
 */
export const StreamEndMessage = z.object({
  type: z.literal('stream_end'),
});

/**
 * Union of all valid client-to-server messages.
 */
export const ClientMessage = z.discriminatedUnion('type', [
  LandmarkFrameMessage,
  CommandMessage,
  StreamEndMessage,
]);
export type ClientMessage = z.infer<typeof ClientMessage>;

// ============ Server -> Client Messages ============

/**
 * Smoothed metrics of one hand after a processed frame.
 */
export const HandMetricsMessage = z.object({
  type: z.literal('hand_metrics'),
  hand: HandSchema,
  values: MetricValuesSchema,
});

/**
 * Calibration state of both hands, sent after every applied command.
 */
export const CalibrationStateMessage = z.object({
  type: z.literal('calibration_state'),
  hands: z.object({
    Left: CalibrationStatusSchema,
    Right: CalibrationStatusSchema,
  }),
});

/**
 * Rejection of an invalid client message.
 */
export const ErrorMessage = z.object({
  type: z.literal('error'),
  message: z.string(),
});

/**
 * Union of all server-to-client messages.
 */
export const ServerMessage = z.discriminatedUnion('type', [
  HandMetricsMessage,
  CalibrationStateMessage,
  ErrorMessage,
]);
export type ServerMessage = z.infer<typeof ServerMessage>;

// ============ Utilities ============

/**
 * Parse and validate a client message.
 * @param data - Raw message data (already JSON-parsed)
 * @returns Validated message or null if invalid
 */
export function parseClientMessage(data: unknown): ClientMessage | null {
  const result = ClientMessage.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Serialize a server message to JSON string.
 */
export function serializeServerMessage(message: ServerMessage): string {
  return JSON.stringify(message);
}
