import type { Detection, HandDetector, LandmarkFrame } from '../runtime/types.js';

/**
 * Detector for frames that arrive with their landmarks already attached.
 */
export const passthroughDetector: HandDetector<LandmarkFrame> = {
  detect(frame: LandmarkFrame): Promise<Detection> {
    return Promise.resolve({ size: frame.size, hands: frame.hands });
  },
};
