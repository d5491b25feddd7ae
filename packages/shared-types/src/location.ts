import { HeatPointType, ZoneType } from './enums';

export interface GeoPoint {
  readonly latitude: number;
  readonly longitude: number;
}

export interface LocationFix extends GeoPoint {
  accuracy?: number; // in meters
  timestamp?: Date;
}

/**
 * Closed ring of at least three vertices. The closing edge from the last
 * vertex back to the first is implicit.
 */
export type Polygon = readonly GeoPoint[];

export interface RestrictedZone {
  id: string;
  name: string;
  zoneType: ZoneType;
  polygon: Polygon;
  center?: GeoPoint;
  warningMessage?: string;
  description?: string;
  radiusMeters?: number;
}

export interface PointOfInterest {
  id: string;
  position: GeoPoint;
  type: HeatPointType;
  intensity: number; // 0.0 to 1.0
  timestamp: Date;
  alertCount: number;
  sourceId?: string;
  description?: string;
}

export interface ZoneDistance {
  zone: RestrictedZone;
  distanceKm: number;
}

export interface ZoneMembership {
  inside: boolean;
  lastTransitionAt?: Date;
  outsideStreak: number;
}
