import bbox from '@turf/bbox';
import booleanPointInPolygon from '@turf/boolean-point-in-polygon';
import centroid from '@turf/centroid';
import circle from '@turf/circle';
import distance from '@turf/distance';
import { Feature, Polygon as GeoJSONPolygon, polygon as turfPolygon } from '@turf/helpers';
import { GeoPoint, Polygon } from '@wayguard/shared-types';

export const EARTH_RADIUS_KM = 6371;

export type TurfPolygon = Feature<GeoJSONPolygon>;

export interface BoundingBox {
  minLatitude: number;
  minLongitude: number;
  maxLatitude: number;
  maxLongitude: number;
}

// GeoJSON positions are [longitude, latitude]
export const toPosition = (point: GeoPoint): number[] => [point.longitude, point.latitude];

export const toGeoPoint = (position: number[]): GeoPoint => ({
  latitude: position[1],
  longitude: position[0]
});

/**
 * Great-circle distance in kilometers. Valid as an approximation for the
 * short ranges used by alerting.
 */
export function haversineKm(from: GeoPoint, to: GeoPoint): number {
  const radians = distance(toPosition(from), toPosition(to), { units: 'radians' });
  return radians * EARTH_RADIUS_KM;
}

const samePoint = (a: GeoPoint, b: GeoPoint): boolean =>
  a.latitude === b.latitude && a.longitude === b.longitude;

/**
 * Drop an explicit closing vertex, if the caller repeated the first one.
 */
export function openRing(polygon: Polygon): GeoPoint[] {
  const ring = [...polygon];
  if (ring.length > 1 && samePoint(ring[0], ring[ring.length - 1])) {
    ring.pop();
  }
  return ring;
}

export function toTurfPolygon(polygon: Polygon): TurfPolygon {
  const ring = openRing(polygon);
  if (ring.length < 3) {
    throw new Error(`Polygon needs at least 3 vertices, got ${ring.length}`);
  }
  const positions = ring.map(toPosition);
  return turfPolygon([[...positions, positions[0]]]);
}

const asTurfPolygon = (polygon: Polygon | TurfPolygon): TurfPolygon =>
  'geometry' in polygon ? polygon : toTurfPolygon(polygon);

/**
 * Even-odd ray casting. Points lying exactly on an edge are not guaranteed
 * either way.
 */
export function isPointInPolygon(point: GeoPoint, polygon: Polygon | TurfPolygon): boolean {
  if (!('geometry' in polygon) && openRing(polygon).length < 3) return false;
  return booleanPointInPolygon(toPosition(point), asTurfPolygon(polygon));
}

/**
 * Arithmetic mean of the distinct vertices.
 */
export function vertexCentroid(polygon: Polygon | TurfPolygon): GeoPoint {
  return toGeoPoint(centroid(asTurfPolygon(polygon)).geometry.coordinates);
}

export function boundingBox(polygon: TurfPolygon): BoundingBox {
  const [minLongitude, minLatitude, maxLongitude, maxLatitude] = bbox(polygon);
  return { minLatitude, minLongitude, maxLatitude, maxLongitude };
}

export const isInBoundingBox = (point: GeoPoint, box: BoundingBox): boolean =>
  point.latitude >= box.minLatitude && point.latitude <= box.maxLatitude &&
  point.longitude >= box.minLongitude && point.longitude <= box.maxLongitude;

/**
 * Approximate a circular zone with a ring of `steps` vertices.
 */
export function circlePolygon(center: GeoPoint, radiusMeters: number, steps = 16): GeoPoint[] {
  const ring = circle(toPosition(center), radiusMeters, { steps, units: 'meters' });
  return openRing(ring.geometry.coordinates[0].map(toGeoPoint));
}
