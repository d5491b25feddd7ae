import {
  GeoPoint,
  HeatPointType,
  PointOfInterest,
  RawCoordinate,
  RawPOISchema,
  RawVertex,
  RawZoneSchema,
  RestrictedZone,
  ZoneType,
  isValidCoordinate
} from '@wayguard/shared-types';
import { logger } from './logger';
import { InvalidZoneError, MalformedPOIError, describeIssues } from './errors';
import { circlePolygon } from './geo';

export const DEFAULT_ZONE_RADIUS_METERS = 1000;

const SEVERITY_INTENSITY: Record<string, number> = {
  critical: 1.0,
  high: 0.8,
  medium: 0.6,
  low: 0.4
};

export interface ParsedZones {
  zones: RestrictedZone[];
  errors: InvalidZoneError[];
}

export interface ParsedPOIs {
  pois: PointOfInterest[];
  errors: MalformedPOIError[];
}

// Best-effort id for error messages about payloads that failed validation
function idOf(raw: unknown): string | undefined {
  if (typeof raw !== 'object' || raw === null) return undefined;
  for (const key of ['id', 'alert_id']) {
    const value: unknown = Reflect.get(raw, key);
    if (typeof value === 'string' || typeof value === 'number') return String(value);
  }
  return undefined;
}

function coordinateOf(raw: RawCoordinate): GeoPoint | undefined {
  const latitude = raw.latitude ?? raw.lat;
  const longitude = raw.longitude ?? raw.lon ?? raw.lng;
  if (latitude == null || longitude == null) return undefined;
  return { latitude, longitude };
}

function vertexOf(raw: RawVertex): GeoPoint | undefined {
  if (Array.isArray(raw)) {
    return { latitude: raw[0], longitude: raw[1] };
  }
  return coordinateOf(raw);
}

function parseDate(value: string | null | undefined): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export function parseZoneType(type: string | null | undefined): ZoneType {
  switch (type?.trim().toLowerCase()) {
    case 'dangerous':
      return ZoneType.DANGEROUS;
    case 'high_risk':
    case 'highrisk':
    case 'high-risk':
    case 'risky':
      return ZoneType.HIGH_RISK;
    case 'caution':
      return ZoneType.CAUTION;
    case 'safe':
      return ZoneType.SAFE;
    default:
      return ZoneType.RESTRICTED;
  }
}

export function parseHeatPointType(type: string | null | undefined): HeatPointType {
  if (type == null) return HeatPointType.PANIC_ALERT;

  switch (type.trim().toLowerCase().replace(/[\s-]/g, '_')) {
    case 'panic':
    case 'panic_alert':
    case 'panicalert':
      return HeatPointType.PANIC_ALERT;
    case 'restricted_zone':
    case 'restrictedzone':
      return HeatPointType.RESTRICTED_ZONE;
    case 'incident':
    case 'safety_incident':
    case 'safetyincident':
      return HeatPointType.SAFETY_INCIDENT;
    default:
      return HeatPointType.GENERAL;
  }
}

/**
 * Normalize one zone payload. Explicit polygon coordinates win; a zone that
 * only has a center and radius becomes a circular ring.
 */
export function parseZone(raw: unknown): RestrictedZone | InvalidZoneError {
  const parsed = RawZoneSchema.safeParse(raw);
  if (!parsed.success) {
    return new InvalidZoneError(idOf(raw) ?? 'unknown', describeIssues(parsed.error.issues));
  }

  const data = parsed.data;
  const center = data.center ? coordinateOf(data.center) : undefined;
  const vertices = data.polygon_coordinates ?? data.polygon ?? data.coordinates;

  let polygon: GeoPoint[];
  let radiusMeters: number | undefined;

  if (vertices) {
    const points = vertices.map(vertexOf);
    const resolved = points.filter((point): point is GeoPoint => point !== undefined);
    if (resolved.length !== points.length) {
      return new InvalidZoneError(data.id, 'polygon vertex without coordinates');
    }
    polygon = resolved;
  } else if (center) {
    radiusMeters = data.radius_meters ?? DEFAULT_ZONE_RADIUS_METERS;
    if (radiusMeters <= 0) {
      return new InvalidZoneError(data.id, `radius must be positive, got ${radiusMeters}`);
    }
    polygon = circlePolygon(center, radiusMeters);
  } else {
    return new InvalidZoneError(data.id, 'needs polygon coordinates or a center and radius');
  }

  return {
    id: data.id,
    name: data.name ?? 'Unknown Zone',
    zoneType: parseZoneType(data.type),
    polygon,
    center,
    warningMessage: data.warning_message ?? data.safety_recommendation ?? undefined,
    description: data.description ?? undefined,
    radiusMeters
  };
}

/**
 * Normalize one alert/incident payload into a point of interest
 */
export function parsePOI(raw: unknown, now: Date = new Date()): PointOfInterest | MalformedPOIError {
  const parsed = RawPOISchema.safeParse(raw);
  if (!parsed.success) {
    return new MalformedPOIError(describeIssues(parsed.error.issues), idOf(raw));
  }

  const data = parsed.data;
  const id = data.id ?? data.alert_id;
  if (!id) {
    return new MalformedPOIError('missing id');
  }

  const latitude = data.latitude ?? data.lat ?? data.location?.lat ?? data.location?.latitude;
  const longitude = data.longitude ?? data.lon ?? data.lng ??
    data.location?.lon ?? data.location?.lng ?? data.location?.longitude;
  if (latitude == null || longitude == null) {
    return new MalformedPOIError('missing coordinates', id);
  }
  if (!isValidCoordinate(latitude, longitude)) {
    return new MalformedPOIError(`coordinates out of range (${latitude}, ${longitude})`, id);
  }

  const severityIntensity = data.severity ? SEVERITY_INTENSITY[data.severity.toLowerCase()] : undefined;
  const intensity = data.intensity ?? severityIntensity ?? data.weight ?? 0.5;

  return {
    id,
    position: { latitude, longitude },
    type: parseHeatPointType(data.type),
    intensity: Math.min(1, Math.max(0, intensity)),
    timestamp: parseDate(data.timestamp ?? data.created_at) ?? now,
    alertCount: data.alert_count ?? 1,
    sourceId: data.tourist_id ?? data.user_id ?? data.creator_id ?? undefined,
    description: data.description ?? data.title ?? undefined
  };
}

export function parseZones(raws: readonly unknown[]): ParsedZones {
  const result: ParsedZones = { zones: [], errors: [] };
  for (const raw of raws) {
    const zone = parseZone(raw);
    if (zone instanceof InvalidZoneError) {
      logger.warn(zone.message, { zoneId: zone.zoneId });
      result.errors.push(zone);
    } else {
      result.zones.push(zone);
    }
  }
  return result;
}

export function parsePOIs(raws: readonly unknown[], now: Date = new Date()): ParsedPOIs {
  const result: ParsedPOIs = { pois: [], errors: [] };
  for (const raw of raws) {
    const poi = parsePOI(raw, now);
    if (poi instanceof MalformedPOIError) {
      logger.warn(poi.message, { poiId: poi.poiId });
      result.errors.push(poi);
    } else {
      result.pois.push(poi);
    }
  }
  return result;
}
