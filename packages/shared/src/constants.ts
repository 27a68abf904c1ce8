/**
 * @fileoverview Shared constants used by the engine and the server.
 * These are compile-time constants that don't depend on runtime configuration.
 */

import type { Hand } from './types/index.js';

// ============ Landmarks ============

/**
 * Number of landmarks in one hand skeleton.
 */
export const LANDMARK_COUNT = 21;

/**
 * Landmark indices used by the metric extractor.
 */
export const HAND_LANDMARKS = {
  WRIST: 0,
  THUMB_TIP: 4,
  INDEX_MCP: 5,
  INDEX_TIP: 8,
  MIDDLE_MCP: 9,
  MIDDLE_TIP: 12,
  RING_MCP: 13,
  RING_TIP: 16,
  PINKY_MCP: 17,
  PINKY_TIP: 20,
} as const;

/**
 * Fingertips of the four fingers (thumb excluded), index to pinky.
 */
export const FINGERTIPS = [
  HAND_LANDMARKS.INDEX_TIP,
  HAND_LANDMARKS.MIDDLE_TIP,
  HAND_LANDMARKS.RING_TIP,
  HAND_LANDMARKS.PINKY_TIP,
] as const;

/**
 * Knuckles (MCP joints) matching {@link FINGERTIPS}.
 */
export const KNUCKLES = [
  HAND_LANDMARKS.INDEX_MCP,
  HAND_LANDMARKS.MIDDLE_MCP,
  HAND_LANDMARKS.RING_MCP,
  HAND_LANDMARKS.PINKY_MCP,
] as const;

// ============ Pipeline ============

/**
 * Default number of normalized samples averaged per metric.
 */
export const DEFAULT_SMOOTHING_WINDOW = 5;

/**
 * Ranges narrower than this are degenerate and normalize to 0.
 */
export const DEGENERATE_RANGE_EPSILON = 1e-9;

/**
 * Bounds used for a metric that has never been observed.
 */
export const DEFAULT_RANGE_MIN = 0;
export const DEFAULT_RANGE_MAX = 1;

// ============ Transport ============

/**
 * OSC address each hand's vector is sent to.
 */
export const OSC_ADDRESSES: Readonly<Record<Hand, string>> = {
  Left: '/hand/left',
  Right: '/hand/right',
};

/**
 * Default OSC receiver (SuperCollider's language port on loopback).
 */
export const DEFAULT_OSC_HOST = '127.0.0.1';
export const DEFAULT_OSC_PORT = 57120;
