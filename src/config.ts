/**
 * Engine configuration: defaults, per-call overrides and environment loading
 */

import { z } from 'zod';
import type { LogLevel } from './logger.js';
import { DEFAULT_ENGINE_CONFIG } from './types.js';
import type { EngineConfig, EngineConfigOverrides } from './types.js';

// ============================================================================
// Overrides
// ============================================================================

export function resolveConfig(
  overrides: EngineConfigOverrides = {},
  base: EngineConfig = DEFAULT_ENGINE_CONFIG
): EngineConfig {
  const config: EngineConfig = {
    thresholds: { ...base.thresholds, ...overrides.thresholds },
    labels: { ...base.labels, ...overrides.labels },
    colorBoost: { ...base.colorBoost, ...overrides.colorBoost },
    colorFallback: { ...base.colorFallback, ...overrides.colorFallback },
    text: { ...base.text, ...overrides.text },
    floors: { ...base.floors, ...overrides.floors },
  };

  if (config.thresholds.high > config.thresholds.critical) {
    throw new RangeError(
      `High threshold (${config.thresholds.high}) must not exceed critical threshold (${config.thresholds.critical})`
    );
  }

  return config;
}

// ============================================================================
// Environment
// ============================================================================

const optionalNumber = z.coerce.number().finite().nonnegative().optional();

export const EnvSchema = z.object({
  ENVIRISK_CRITICAL_THRESHOLD: optionalNumber,
  ENVIRISK_HIGH_THRESHOLD: optionalNumber,
  ENVIRISK_CONFIDENCE_SCALE: optionalNumber,
  ENVIRISK_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
});

export interface RuntimeSettings {
  overrides: EngineConfigOverrides;
  logLevel: LogLevel;
}

/** Blank variables count as unset. */
function presentOnly(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function loadSettingsFromEnv(env: Record<string, string | undefined> = process.env): RuntimeSettings {
  const parsed = EnvSchema.parse(presentOnly(env));
  const overrides: EngineConfigOverrides = {};

  const thresholds: Partial<EngineConfig['thresholds']> = {};
  if (parsed.ENVIRISK_CRITICAL_THRESHOLD !== undefined) thresholds.critical = parsed.ENVIRISK_CRITICAL_THRESHOLD;
  if (parsed.ENVIRISK_HIGH_THRESHOLD !== undefined) thresholds.high = parsed.ENVIRISK_HIGH_THRESHOLD;
  if (Object.keys(thresholds).length > 0) {
    overrides.thresholds = thresholds;
  }
  if (parsed.ENVIRISK_CONFIDENCE_SCALE !== undefined) {
    overrides.labels = { confidenceScale: parsed.ENVIRISK_CONFIDENCE_SCALE };
  }

  // Fail once at startup rather than inside every scoring call
  resolveConfig(overrides);

  return { overrides, logLevel: parsed.ENVIRISK_LOG_LEVEL };
}
