import dotenv from 'dotenv';
import { EngineConfigOverrides } from '@wayguard/shared-types';
import { resolveEngineConfig } from '@wayguard/alert-engine';

dotenv.config();

function required(name: string, fallback?: string): string {
  const v = process.env[name] ?? fallback;
  if (!v) throw new Error(`Missing required env var ${name}`);
  return v;
}

function optionalNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new Error(`Env var ${name} must be a number, got "${raw}"`);
  return value;
}

/**
 * Engine overrides from the environment. Unset values fall back to the engine
 * defaults; out-of-range values throw a ConfigurationError at startup.
 */
export function loadEngineOverrides(env: NodeJS.ProcessEnv = process.env): EngineConfigOverrides {
  const overrides: EngineConfigOverrides = {
    radiusKm: optionalNumber(env, 'ALERT_RADIUS_KM'),
    cooldownMs: optionalNumber(env, 'ALERT_COOLDOWN_MS'),
    debounceSamples: optionalNumber(env, 'GEOFENCE_DEBOUNCE_SAMPLES'),
    recheckIntervalMs: optionalNumber(env, 'ALERT_RECHECK_INTERVAL_MS'),
  };
  resolveEngineConfig(overrides);
  return overrides;
}

export const config = {
  NODE_ENV: process.env.NODE_ENV ?? 'development',
  PORT: Number(process.env.PORT ?? 3008),
  CORS_ORIGIN: process.env.CORS_ORIGIN ?? 'http://localhost:3000',

  // Shared with the issuer of subject tokens
  JWT_SECRET: required('JWT_SECRET', 'dev-secret'),

  ENGINE: loadEngineOverrides(),
  SESSION_IDLE_TIMEOUT_MS: optionalNumber(process.env, 'SESSION_IDLE_TIMEOUT_MS') ?? 30 * 60 * 1000,
};
