import {
  boundingBox,
  circlePolygon,
  haversineKm,
  isPointInPolygon,
  openRing,
  toTurfPolygon,
  vertexCentroid
} from '../../utils/geo';
import { INSIDE_RED_FORT, OUTSIDE_RED_FORT, RED_FORT_ZONE } from '../helpers/fixtures';

describe('geo utilities', () => {
  describe('haversineKm', () => {
    test('should measure one degree of latitude on a 6371km sphere', () => {
      const distance = haversineKm({ latitude: 0, longitude: 0 }, { latitude: 1, longitude: 0 });
      expect(distance).toBeCloseTo(111.195, 2);
    });

    test('should measure short distances between nearby fixes', () => {
      const distance = haversineKm(
        { latitude: 28.6139, longitude: 77.2090 },
        { latitude: 28.6150, longitude: 77.2090 }
      );
      expect(distance).toBeCloseTo(0.1223, 3);
    });

    test('should be zero for identical points', () => {
      expect(haversineKm(INSIDE_RED_FORT, INSIDE_RED_FORT)).toBe(0);
    });
  });

  describe('isPointInPolygon', () => {
    test('should contain a point strictly inside a convex polygon', () => {
      expect(isPointInPolygon(INSIDE_RED_FORT, RED_FORT_ZONE.polygon)).toBe(true);
    });

    test('should exclude a point strictly outside a convex polygon', () => {
      expect(isPointInPolygon(OUTSIDE_RED_FORT, RED_FORT_ZONE.polygon)).toBe(false);
    });

    test('should apply the even-odd rule to concave rings', () => {
      // U shape opening to the north
      const ring = [
        { latitude: 0, longitude: 0 },
        { latitude: 0, longitude: 3 },
        { latitude: 3, longitude: 3 },
        { latitude: 3, longitude: 2 },
        { latitude: 1, longitude: 2 },
        { latitude: 1, longitude: 1 },
        { latitude: 3, longitude: 1 },
        { latitude: 3, longitude: 0 }
      ];

      expect(isPointInPolygon({ latitude: 2, longitude: 0.5 }, ring)).toBe(true);
      expect(isPointInPolygon({ latitude: 2, longitude: 1.5 }, ring)).toBe(false);
      expect(isPointInPolygon({ latitude: 0.5, longitude: 1.5 }, ring)).toBe(true);
    });

    test('should treat rings with fewer than three vertices as empty', () => {
      const ring = [
        { latitude: 0, longitude: 0 },
        { latitude: 1, longitude: 1 }
      ];
      expect(isPointInPolygon({ latitude: 0.5, longitude: 0.5 }, ring)).toBe(false);
    });
  });

  describe('openRing', () => {
    test('should drop a repeated closing vertex', () => {
      const closed = [...RED_FORT_ZONE.polygon, RED_FORT_ZONE.polygon[0]];
      expect(openRing(closed)).toHaveLength(4);
    });

    test('should keep an open ring as is', () => {
      expect(openRing(RED_FORT_ZONE.polygon)).toEqual(RED_FORT_ZONE.polygon);
    });
  });

  describe('vertexCentroid', () => {
    test('should average the distinct vertices', () => {
      const centroid = vertexCentroid(RED_FORT_ZONE.polygon);
      expect(centroid.latitude).toBeCloseTo(28.62, 10);
      expect(centroid.longitude).toBeCloseTo(77.21, 10);
    });

    test('should accept a prepared polygon', () => {
      const centroid = vertexCentroid(toTurfPolygon(RED_FORT_ZONE.polygon));
      expect(centroid.latitude).toBeCloseTo(28.62, 10);
      expect(centroid.longitude).toBeCloseTo(77.21, 10);
    });
  });

  describe('toTurfPolygon', () => {
    test('should close the ring in longitude, latitude order', () => {
      const feature = toTurfPolygon(RED_FORT_ZONE.polygon);

      expect(feature.geometry.coordinates[0]).toEqual([
        [77.20, 28.60],
        [77.22, 28.60],
        [77.22, 28.64],
        [77.20, 28.64],
        [77.20, 28.60]
      ]);
      expect(isPointInPolygon(INSIDE_RED_FORT, feature)).toBe(true);
    });

    test('should reject rings with fewer than three vertices', () => {
      expect(() => toTurfPolygon(RED_FORT_ZONE.polygon.slice(0, 2))).toThrow('Polygon needs at least 3 vertices, got 2');
    });
  });

  describe('boundingBox', () => {
    test('should span the extremes of a prepared polygon', () => {
      expect(boundingBox(toTurfPolygon(RED_FORT_ZONE.polygon))).toEqual({
        minLatitude: 28.60,
        minLongitude: 77.20,
        maxLatitude: 28.64,
        maxLongitude: 77.22
      });
    });
  });

  describe('circlePolygon', () => {
    test('should build a ring of vertices at the given radius', () => {
      const center = { latitude: 28.6562, longitude: 77.2410 };
      const ring = circlePolygon(center, 1000);

      expect(ring).toHaveLength(16);
      for (const vertex of ring) {
        expect(haversineKm(center, vertex)).toBeCloseTo(1, 3);
      }
    });

    test('should honour a custom vertex count', () => {
      expect(circlePolygon({ latitude: 0, longitude: 0 }, 500, 8)).toHaveLength(8);
    });
  });
});
