import { z } from 'zod';
import { AlertSeverity, ZoneType } from './enums';

// Engine configuration schemas
const intensity = z.number().min(0).max(1);

export const SeverityBandSchema = z.object({
  withinKm: z.union([z.number().positive(), z.literal('radius')]),
  severity: z.nativeEnum(AlertSeverity)
});

export const ZoneIntensityTableSchema = z.object({
  [ZoneType.DANGEROUS]: intensity,
  [ZoneType.HIGH_RISK]: intensity,
  [ZoneType.RESTRICTED]: intensity,
  [ZoneType.CAUTION]: intensity,
  [ZoneType.SAFE]: intensity
});

export const ZoneProximitySchema = z.object({
  criticalKm: z.number().min(0),
  warningKm: z.number().min(0)
}).refine(value => value.criticalKm <= value.warningKm, {
  message: 'criticalKm must not exceed warningKm'
});

export const EngineConfigSchema = z.object({
  radiusKm: z.number().positive('radiusKm must be greater than 0'),
  cooldownMs: z.number().int().min(0, 'cooldown cannot be negative'),
  debounceSamples: z.number().int().min(1, 'debounceSamples must be at least 1'),
  severityBands: z.array(SeverityBandSchema).min(1),
  zoneIntensityTable: ZoneIntensityTableSchema,
  zoneProximity: ZoneProximitySchema,
  mergeThresholdKm: z.number().min(0),
  recheckIntervalMs: z.number().int().positive(),
  maxActiveAlerts: z.number().int().positive(),
  subjectId: z.string().min(1).optional()
});

export const EngineConfigOverridesSchema = EngineConfigSchema.partial();

export type SeverityBand = z.infer<typeof SeverityBandSchema>;
export type ZoneIntensityTable = z.infer<typeof ZoneIntensityTableSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigOverrides = z.infer<typeof EngineConfigOverridesSchema>;

// Upstream payload schemas. Field names follow the safety API, which is not
// consistent between endpoints, so most of them are optional here and the
// fallbacks are resolved by the payload parser.
export const NumericSchema = z.union([
  z.number().finite(),
  z.string().trim().regex(/^-?\d+(\.\d+)?$/, 'Expected a numeric string').transform(Number)
]);

const identifier = z.union([z.string().min(1), z.number()]).transform(String);

export const RawCoordinateSchema = z.object({
  latitude: NumericSchema.nullish(),
  lat: NumericSchema.nullish(),
  longitude: NumericSchema.nullish(),
  lon: NumericSchema.nullish(),
  lng: NumericSchema.nullish()
});

// [lat, lon] pairs or coordinate objects
export const RawVertexSchema = z.union([
  z.tuple([NumericSchema, NumericSchema]),
  RawCoordinateSchema
]);

export const RawPOISchema = RawCoordinateSchema.extend({
  id: identifier.nullish(),
  alert_id: identifier.nullish(),
  location: RawCoordinateSchema.nullish(),
  type: z.string().nullish(),
  intensity: NumericSchema.nullish(),
  severity: z.string().nullish(),
  weight: NumericSchema.nullish(),
  alert_count: z.number().int().min(1).nullish(),
  timestamp: z.string().nullish(),
  created_at: z.string().nullish(),
  tourist_id: identifier.nullish(),
  user_id: identifier.nullish(),
  creator_id: identifier.nullish(),
  description: z.string().nullish(),
  title: z.string().nullish()
});

export const RawZoneSchema = z.object({
  id: identifier,
  name: z.string().nullish(),
  description: z.string().nullish(),
  type: z.string().nullish(),
  polygon_coordinates: z.array(RawVertexSchema).nullish(),
  polygon: z.array(RawVertexSchema).nullish(),
  coordinates: z.array(RawVertexSchema).nullish(),
  center: RawCoordinateSchema.nullish(),
  radius_meters: NumericSchema.nullish(),
  warning_message: z.string().nullish(),
  safety_recommendation: z.string().nullish()
});

export type RawCoordinate = z.infer<typeof RawCoordinateSchema>;
export type RawVertex = z.infer<typeof RawVertexSchema>;
export type RawPOI = z.infer<typeof RawPOISchema>;
export type RawZone = z.infer<typeof RawZoneSchema>;

// Common validation utilities
export const isValidCoordinate = (latitude: number, longitude: number): boolean => {
  return Number.isFinite(latitude) && Number.isFinite(longitude) &&
    latitude >= -90 && latitude <= 90 &&
    longitude >= -180 && longitude <= 180;
};
