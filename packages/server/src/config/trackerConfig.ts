/**
 * @fileoverview Tracker configuration loading from YAML.
 * Validates and caches configuration for the tracker process.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { DEFAULT_OSC_HOST, DEFAULT_OSC_PORT, DEFAULT_SMOOTHING_WINDOW, logger } from '@hand-squeeze/shared';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

const portSchema = z.number().int().min(1).max(65535);
const keySchema = z.string().length(1);

// Schema for tracker configuration
const TrackerConfigSchema = z.object({
  source: z.discriminatedUnion('kind', [
    z.object({
      kind: z.literal('websocket'),
      host: z.string().min(1).default('127.0.0.1'),
      port: portSchema,
    }),
    z.object({
      kind: z.literal('replay'),
      path: z.string().min(1),
      frameIntervalMs: z.number().int().min(0).default(0),
    }),
  ]),
  transport: z
    .object({
      host: z.string().min(1).default(DEFAULT_OSC_HOST),
      port: portSchema.default(DEFAULT_OSC_PORT),
    })
    .default({}),
  pipeline: z
    .object({
      smoothingWindow: z.number().int().positive().default(DEFAULT_SMOOTHING_WINDOW),
    })
    .default({}),
  keys: z
    .object({
      quit: keySchema.default('q'),
      lockMinLeft: keySchema.default('3'),
      lockMaxLeft: keySchema.default('4'),
      lockMinRight: keySchema.default('5'),
      lockMaxRight: keySchema.default('6'),
      clear: keySchema.default('c'),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      metricsEveryFrames: z.number().int().min(0).default(30),
    })
    .default({}),
});

export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;
export type SourceConfig = TrackerConfig['source'];
export type KeyBindings = TrackerConfig['keys'];

let cachedConfig: TrackerConfig | null = null;

/**
 * Validate an already-parsed configuration document.
 * @throws {Error} with every zod issue in its message when invalid
 */
export function parseTrackerConfig(rawConfig: unknown): TrackerConfig {
  const result = TrackerConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    logger.error('Invalid tracker configuration', { issues: result.error.issues });
    throw new Error(`Invalid tracker configuration: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Load and validate tracker configuration from YAML file.
 * Caches the result for subsequent calls.
 *
 * Config file is loaded from:
 * - the explicit path argument if given
 * - CONFIG_PATH environment variable if set
 * - Otherwise from ./config/tracker.yaml relative to cwd
 */
export function loadTrackerConfig(path?: string): TrackerConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configPath =
    path ?? process.env['CONFIG_PATH'] ?? join(process.cwd(), 'config/tracker.yaml');

  const fileContents = readFileSync(configPath, 'utf8');
  const rawConfig: unknown = parseYaml(fileContents);
  const validatedConfig = parseTrackerConfig(rawConfig);
  cachedConfig = validatedConfig;
  return validatedConfig;
}

/**
 * Clear the cached config (useful for testing or hot-reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
