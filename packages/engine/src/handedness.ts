import { HAND_LANDMARKS, type Hand, type HandLandmarks } from '@hand-squeeze/shared';
import { InvalidHandError } from './errors.js';

/**
 * Decide which hand a skeleton belongs to.
 *
 * The detector's label wins when present. Otherwise the wrist is compared to
 * the middle-finger knuckle in the mirrored frame: a wrist left of the
 * knuckle is a right hand.
 */
export function resolveHandedness(landmarks: HandLandmarks, label?: Hand): Hand {
  if (label) {
    return label;
  }

  const wrist = landmarks[HAND_LANDMARKS.WRIST];
  const middleKnuckle = landmarks[HAND_LANDMARKS.MIDDLE_MCP];
  if (!wrist || !middleKnuckle) {
    throw new InvalidHandError('cannot infer handedness without wrist and middle knuckle');
  }

  return wrist.x < middleKnuckle.x ? 'Right' : 'Left';
}
