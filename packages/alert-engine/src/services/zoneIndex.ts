import {
  GeoPoint,
  RestrictedZone,
  ZONE_SEVERITY_ORDER,
  ZoneDistance,
  ZoneType,
  isValidCoordinate
} from '@wayguard/shared-types';
import { logger } from '../utils/logger';
import { DiagnosticsCallback, InvalidZoneError } from '../utils/errors';
import {
  BoundingBox,
  TurfPolygon,
  boundingBox,
  haversineKm,
  isInBoundingBox,
  isPointInPolygon,
  openRing,
  toTurfPolygon,
  vertexCentroid
} from '../utils/geo';

interface IndexedZone {
  zone: RestrictedZone;
  feature: TurfPolygon;
  bounds: BoundingBox;
  center: GeoPoint;
}

export interface ZoneLoadResult {
  loaded: number;
  skipped: number;
  errors: InvalidZoneError[];
}

export const severityRank = (zoneType: ZoneType): number => ZONE_SEVERITY_ORDER.indexOf(zoneType);

/**
 * Reduce a list of zones to the most severe zone type. An empty list is safe.
 */
export function highestSeverity(zones: readonly RestrictedZone[]): ZoneType {
  return zones.reduce<ZoneType>(
    (highest, zone) => (severityRank(zone.zoneType) < severityRank(highest) ? zone.zoneType : highest),
    ZoneType.SAFE
  );
}

export class ZoneIndex {
  private entries: IndexedZone[] = [];
  private byId = new Map<string, IndexedZone>();

  constructor(private readonly onDiagnostic?: DiagnosticsCallback) {}

  get size(): number {
    return this.entries.length;
  }

  /**
   * Replace the working set. Invalid zones are skipped and reported; the
   * previous set stays in place until the new one is fully prepared.
   */
  load(zones: readonly RestrictedZone[]): ZoneLoadResult {
    const entries: IndexedZone[] = [];
    const byId = new Map<string, IndexedZone>();
    const errors: InvalidZoneError[] = [];

    for (const zone of zones) {
      const problem = this.validate(zone, byId);
      if (problem) {
        const error = new InvalidZoneError(zone.id, problem);
        errors.push(error);
        logger.warn(error.message, { zoneId: zone.id });
        this.onDiagnostic?.(error);
        continue;
      }

      const feature = toTurfPolygon(zone.polygon);
      const entry: IndexedZone = {
        zone,
        feature,
        bounds: boundingBox(feature),
        center: zone.center ?? vertexCentroid(feature)
      };
      entries.push(entry);
      byId.set(zone.id, entry);
    }

    this.entries = entries;
    this.byId = byId;

    logger.info(`Loaded ${entries.length} restricted zones`, { skipped: errors.length });
    return { loaded: entries.length, skipped: errors.length, errors };
  }

  zones(): RestrictedZone[] {
    return this.entries.map(entry => entry.zone);
  }

  get(zoneId: string): RestrictedZone | undefined {
    return this.byId.get(zoneId)?.zone;
  }

  centerOf(zoneId: string): GeoPoint | undefined {
    return this.byId.get(zoneId)?.center;
  }

  /**
   * Check whether a single loaded zone contains the point
   */
  contains(zoneId: string, point: GeoPoint): boolean {
    const entry = this.byId.get(zoneId);
    if (!entry) return false;
    return isInBoundingBox(point, entry.bounds) && isPointInPolygon(point, entry.feature);
  }

  /**
   * Every zone whose polygon contains the point. Overlapping zones all match.
   */
  containsPoint(point: GeoPoint): RestrictedZone[] {
    return this.entries
      .filter(entry => isInBoundingBox(point, entry.bounds) && isPointInPolygon(point, entry.feature))
      .map(entry => entry.zone);
  }

  /**
   * Zones ordered by distance from the point to their representative center,
   * then by severity, then by id.
   */
  nearestZones(point: GeoPoint, maxResults: number, withinKm?: number): ZoneDistance[] {
    if (maxResults <= 0) return [];

    return this.entries
      .map(entry => ({ zone: entry.zone, distanceKm: haversineKm(point, entry.center) }))
      .filter(candidate => withinKm === undefined || candidate.distanceKm <= withinKm)
      .sort((a, b) =>
        a.distanceKm - b.distanceKm ||
        severityRank(a.zone.zoneType) - severityRank(b.zone.zoneType) ||
        (a.zone.id < b.zone.id ? -1 : a.zone.id > b.zone.id ? 1 : 0)
      )
      .slice(0, maxResults);
  }

  highestSeverity(zones: readonly RestrictedZone[]): ZoneType {
    return highestSeverity(zones);
  }

  private validate(zone: RestrictedZone, accepted: Map<string, IndexedZone>): string | null {
    if (!zone.id) {
      return 'missing id';
    }
    if (accepted.has(zone.id)) {
      return 'duplicate id';
    }
    const ring = openRing(zone.polygon);
    if (ring.length < 3) {
      return `polygon has ${ring.length} points, at least 3 are required`;
    }
    if (ring.some(vertex => !isValidCoordinate(vertex.latitude, vertex.longitude))) {
      return 'polygon has out-of-range coordinates';
    }
    if (zone.center && !isValidCoordinate(zone.center.latitude, zone.center.longitude)) {
      return 'center has out-of-range coordinates';
    }
    return null;
  }
}
