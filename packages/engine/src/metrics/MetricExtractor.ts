/**
 * @fileoverview Geometric measurements taken from one hand skeleton.
 *
 * Distances are measured in pixels of the source frame: the x delta is scaled
 * by the frame width and the y delta by the frame height before taking the
 * norm. The same hand therefore measures differently at different capture
 * resolutions, and ranges must be re-learned when the resolution changes.
 *
 * `thumb_to_index_mcp` ends at the index knuckle (landmark 5). Earlier
 * versions of this tracker measured to the middle knuckle (landmark 9), so
 * receivers tuned against those see different values for this metric.
 */

import {
  FINGERTIPS,
  type FrameSize,
  HAND_LANDMARKS,
  type HandLandmarks,
  KNUCKLES,
  LANDMARK_COUNT,
  type Landmark,
  type MetricValues,
} from '@hand-squeeze/shared';
import { InvalidHandError } from '../errors.js';

type Finger = 0 | 1 | 2 | 3;

/**
 * Euclidean distance between two landmarks in frame pixels.
 */
export function pixelDistance(a: Landmark, b: Landmark, frame: FrameSize): number {
  const dx = (a.x - b.x) * frame.width;
  const dy = (a.y - b.y) * frame.height;
  return Math.hypot(dx, dy);
}

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Compute the 7 raw metrics of one hand.
 * @throws {InvalidHandError} if the skeleton has fewer than 21 landmarks
 */
export function extractMetrics(landmarks: HandLandmarks, frame: FrameSize): MetricValues {
  if (landmarks.length < LANDMARK_COUNT) {
    throw new InvalidHandError(`expected ${LANDMARK_COUNT} landmarks, got ${landmarks.length}`);
  }

  const at = (index: number): Landmark => {
    const landmark = landmarks[index];
    if (!landmark) {
      throw new InvalidHandError(`missing landmark ${index}`);
    }
    return landmark;
  };

  const wrist = at(HAND_LANDMARKS.WRIST);
  const tips = FINGERTIPS.map(at);
  const knuckles = KNUCKLES.map(at);

  const tipToMcp = (finger: Finger): number =>
    pixelDistance(at(FINGERTIPS[finger]), at(KNUCKLES[finger]), frame);

  const knucklePairs: number[] = [];
  for (let i = 0; i < knuckles.length; i++) {
    for (let j = i + 1; j < knuckles.length; j++) {
      const a = knuckles[i];
      const b = knuckles[j];
      if (a && b) {
        knucklePairs.push(pixelDistance(a, b, frame));
      }
    }
  }

  return {
    tip_to_mcp_0: tipToMcp(0),
    tip_to_mcp_1: tipToMcp(1),
    tip_to_mcp_2: tipToMcp(2),
    tip_to_mcp_3: tipToMcp(3),
    thumb_to_index_mcp: pixelDistance(
      at(HAND_LANDMARKS.THUMB_TIP),
      at(HAND_LANDMARKS.INDEX_MCP),
      frame
    ),
    avg_tip_to_wrist: mean(tips.map((tip) => pixelDistance(tip, wrist, frame))),
    mcp_to_mcp: mean(knucklePairs),
  };
}
