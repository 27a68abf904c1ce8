/**
 * @fileoverview Mock hand data for testing metric extraction and the frame pipeline.
 */

import type { DetectedHand, Hand, Landmark } from '@hand-squeeze/shared';

export interface MockLandmarkOptions {
  /** Wrist X position (0-1, default: 0.5) */
  x?: number;
  /** Wrist Y position (0-1, default: 0.5) */
  y?: number;
  /** Scale applied to every offset from the wrist (default: 1) */
  size?: number;
  /** How far fingertips are pulled onto their knuckles, 0 = open, 1 = fist (default: 0) */
  curl?: number;
  /**
   * Which side the geometric handedness fallback should infer.
   * Shifts every finger landmark slightly so the middle knuckle sits right
   * (`'Right'`) or left (`'Left'`) of the wrist (default: 'Right').
   */
  facing?: Hand;
}

/**
 * Offsets from the wrist for an open hand, by landmark index.
 */
const OPEN_HAND_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [0, 0], // Wrist (0)
  [-0.06, -0.02], // Thumb CMC
  [-0.08, -0.06], // Thumb MCP
  [-0.06, -0.1], // Thumb IP
  [-0.08, -0.14], // Thumb TIP (4)
  [-0.04, -0.04], // Index MCP (5)
  [-0.04, -0.1], // Index PIP
  [-0.04, -0.14], // Index DIP
  [-0.04, -0.16], // Index TIP (8)
  [0, -0.04], // Middle MCP (9)
  [0, -0.1], // Middle PIP
  [0, -0.15], // Middle DIP
  [0, -0.18], // Middle TIP (12)
  [0.04, -0.04], // Ring MCP (13)
  [0.04, -0.09], // Ring PIP
  [0.04, -0.13], // Ring DIP
  [0.04, -0.16], // Ring TIP (16)
  [0.06, -0.02], // Pinky MCP (17)
  [0.07, -0.07], // Pinky PIP
  [0.07, -0.1], // Pinky DIP
  [0.07, -0.13], // Pinky TIP (20)
];

/** Fingertip index -> its knuckle index */
const TIP_TO_KNUCKLE: ReadonlyMap<number, number> = new Map([
  [8, 5],
  [12, 9],
  [16, 13],
  [20, 17],
]);

/**
 * Create mock hand landmarks (21 points).
 *
 * @example
 * ```typescript
 * // Default open right hand centered in the frame
 * const landmarks = createMockLandmarks();
 *
 * // Half-closed hand that the fallback labels as left
 * const squeezed = createMockLandmarks({ curl: 0.5, facing: 'Left' });
 * ```
 */
export function createMockLandmarks(options: MockLandmarkOptions = {}): Landmark[] {
  const baseX = options.x ?? 0.5;
  const baseY = options.y ?? 0.5;
  const size = options.size ?? 1;
  const curl = options.curl ?? 0;
  const lean = (options.facing ?? 'Right') === 'Right' ? 0.01 : -0.01;

  const offsets = OPEN_HAND_OFFSETS.map(([dx, dy], index): [number, number] => {
    const knuckle = TIP_TO_KNUCKLE.get(index);
    const knuckleOffset = knuckle === undefined ? undefined : OPEN_HAND_OFFSETS[knuckle];
    if (!knuckleOffset) {
      return [dx, dy];
    }
    return [dx + (knuckleOffset[0] - dx) * curl, dy + (knuckleOffset[1] - dy) * curl];
  });

  return offsets.map(([dx, dy], index) => ({
    x: baseX + dx * size + (index === 0 ? 0 : lean),
    y: baseY + dy * size,
  }));
}

/**
 * Create a mock detected hand. Leave `handedness` out to exercise the
 * geometric fallback.
 *
 * @example
 * ```typescript
 * const left = createMockDetectedHand({ handedness: 'Left', curl: 0.3 });
 * const unlabeled = createMockDetectedHand({ facing: 'Left' });
 * ```
 */
export function createMockDetectedHand(
  options: MockLandmarkOptions & { handedness?: Hand } = {}
): DetectedHand {
  const landmarks = createMockLandmarks(options);
  return options.handedness ? { landmarks, handedness: options.handedness } : { landmarks };
}
