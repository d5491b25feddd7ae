import {
  AlertSeverity,
  EngineConfig,
  EngineConfigOverrides,
  EngineConfigOverridesSchema,
  EngineConfigSchema,
  ZoneType
} from '@wayguard/shared-types';
import { ConfigurationError, describeIssues } from '../utils/errors';

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  radiusKm: 5.0,
  cooldownMs: 5 * 60 * 1000, // 5 minutes
  debounceSamples: 1,
  severityBands: [
    { withinKm: 1, severity: AlertSeverity.HIGH },
    { withinKm: 'radius', severity: AlertSeverity.MODERATE }
  ],
  zoneIntensityTable: {
    [ZoneType.DANGEROUS]: 0.9,
    [ZoneType.HIGH_RISK]: 0.85,
    [ZoneType.RESTRICTED]: 0.7,
    [ZoneType.CAUTION]: 0.5,
    [ZoneType.SAFE]: 0.3
  },
  zoneProximity: {
    criticalKm: 0.1,
    warningKm: 0.5
  },
  mergeThresholdKm: 0, // off
  recheckIntervalMs: 30 * 1000,
  maxActiveAlerts: 100
};

/**
 * Apply overrides on top of a base configuration. Throws a
 * ConfigurationError and leaves the base untouched when the result is invalid.
 */
export function resolveEngineConfig(
  overrides: EngineConfigOverrides = {},
  base: EngineConfig = DEFAULT_ENGINE_CONFIG
): EngineConfig {
  const parsedOverrides = EngineConfigOverridesSchema.safeParse(overrides);
  if (!parsedOverrides.success) {
    throw new ConfigurationError(
      `Invalid engine configuration: ${describeIssues(parsedOverrides.error.issues)}`,
      parsedOverrides.error.issues
    );
  }

  const defined = Object.fromEntries(
    Object.entries(parsedOverrides.data).filter(([, value]) => value !== undefined)
  );
  const merged = EngineConfigSchema.safeParse({ ...base, ...defined });
  if (!merged.success) {
    throw new ConfigurationError(
      `Invalid engine configuration: ${describeIssues(merged.error.issues)}`,
      merged.error.issues
    );
  }

  return merged.data;
}
