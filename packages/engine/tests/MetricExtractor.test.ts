import type { Landmark } from '@hand-squeeze/shared';
import { describe, expect, it } from 'vitest';
import { InvalidHandError } from '../src/errors.js';
import { extractMetrics, pixelDistance } from '../src/metrics/MetricExtractor.js';

/**
 * A skeleton with hand-picked knuckles and fingertips; every other landmark
 * sits on the wrist. In a 100x200 frame:
 * - knuckles are 20px apart on one row
 * - tip-to-knuckle distances are 20, 30, 10 and 5 px
 * - thumb tip is 10px from the index knuckle
 */
function buildSkeleton(): Landmark[] {
  const landmarks: Landmark[] = Array.from({ length: 21 }, () => ({ x: 0.5, y: 0.5 }));
  landmarks[4] = { x: 0.26, y: 0.36 }; // thumb tip
  landmarks[5] = { x: 0.2, y: 0.4 }; // index MCP
  landmarks[9] = { x: 0.4, y: 0.4 }; // middle MCP
  landmarks[13] = { x: 0.6, y: 0.4 }; // ring MCP
  landmarks[17] = { x: 0.8, y: 0.4 }; // pinky MCP
  landmarks[8] = { x: 0.2, y: 0.3 }; // index tip
  landmarks[12] = { x: 0.4, y: 0.25 }; // middle tip
  landmarks[16] = { x: 0.6, y: 0.35 }; // ring tip
  landmarks[20] = { x: 0.83, y: 0.42 }; // pinky tip
  return landmarks;
}

const FRAME = { width: 100, height: 200 };

describe('MetricExtractor', () => {
  describe('pixelDistance', () => {
    it('should scale x by width and y by height', () => {
      const distance = pixelDistance({ x: 0, y: 0 }, { x: 0.03, y: 0.02 }, FRAME);
      expect(distance).toBeCloseTo(5);
    });

    it('should ignore depth', () => {
      const distance = pixelDistance({ x: 0, y: 0, z: 0 }, { x: 0, y: 0, z: 5 }, FRAME);
      expect(distance).toBe(0);
    });
  });

  describe('extractMetrics', () => {
    it('should measure each fingertip against its own knuckle', () => {
      const metrics = extractMetrics(buildSkeleton(), FRAME);

      expect(metrics.tip_to_mcp_0).toBeCloseTo(20);
      expect(metrics.tip_to_mcp_1).toBeCloseTo(30);
      expect(metrics.tip_to_mcp_2).toBeCloseTo(10);
      expect(metrics.tip_to_mcp_3).toBeCloseTo(5);
    });

    it('should measure thumb tip to index knuckle, not the middle knuckle', () => {
      const metrics = extractMetrics(buildSkeleton(), FRAME);
      expect(metrics.thumb_to_index_mcp).toBeCloseTo(10);
      expect(metrics.thumb_to_index_mcp).not.toBeCloseTo(Math.hypot(14, 8));
    });

    it('should average the four fingertip-to-wrist distances', () => {
      const metrics = extractMetrics(buildSkeleton(), FRAME);
      const expected =
        (Math.hypot(30, 40) + Math.hypot(10, 50) + Math.hypot(10, 30) + Math.hypot(33, 16)) / 4;

      expect(metrics.avg_tip_to_wrist).toBeCloseTo(expected);
    });

    it('should average all six knuckle pairs', () => {
      const metrics = extractMetrics(buildSkeleton(), FRAME);
      // 20 + 40 + 60 + 20 + 40 + 20
      expect(metrics.mcp_to_mcp).toBeCloseTo(200 / 6);
    });

    it('should depend on the frame resolution', () => {
      const wide = extractMetrics(buildSkeleton(), { width: 200, height: 200 });

      expect(wide.tip_to_mcp_3).toBeCloseTo(Math.hypot(6, 4));
      expect(wide.mcp_to_mcp).toBeCloseTo(400 / 6);
    });

    it('should return finite values for a collapsed skeleton', () => {
      const point: Landmark[] = Array.from({ length: 21 }, () => ({ x: 0.5, y: 0.5 }));
      const metrics = extractMetrics(point, FRAME);

      expect(Object.values(metrics)).toEqual([0, 0, 0, 0, 0, 0, 0]);
    });

    it('should reject skeletons with fewer than 21 landmarks', () => {
      const partial = buildSkeleton().slice(0, 20);

      expect(() => extractMetrics(partial, FRAME)).toThrow(InvalidHandError);
      expect(() => extractMetrics(partial, FRAME)).toThrow(/expected 21 landmarks, got 20/);
    });
  });
});
