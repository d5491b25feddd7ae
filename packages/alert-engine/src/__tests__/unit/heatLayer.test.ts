import { HeatPointType, RiskLevel } from '@wayguard/shared-types';
import { assessSafety, riskLevelFor, zoneHeatPoints } from '../../services/heatLayer';
import { DEFAULT_ENGINE_CONFIG } from '../../config/engineConfig';
import { RED_FORT_ZONE, SMALL_ZONE, makePOI } from '../helpers/fixtures';

const HERE = { latitude: 28.6139, longitude: 77.2090 };

// Heat point `offset` degrees of latitude north of HERE
const pointAt = (id: string, offset: number, intensity: number) =>
  makePOI({ id, intensity, position: { latitude: HERE.latitude + offset, longitude: HERE.longitude } });

describe('heat layer', () => {
  describe('assessSafety', () => {
    test('should score a location with no heat as safe', () => {
      expect(assessSafety(HERE, [])).toEqual({ score: 100, riskLevel: RiskLevel.SAFE, contributingPoints: 0 });
    });

    test('should deduct 40 for an intense point within half a kilometer', () => {
      expect(assessSafety(HERE, [pointAt('a', 0.0018, 0.9)]))
        .toEqual({ score: 60, riskLevel: RiskLevel.MODERATE, contributingPoints: 1 });
    });

    test('should deduct 20 for a point within one kilometer', () => {
      expect(assessSafety(HERE, [pointAt('a', 0.0072, 0.7)]).score).toBe(80);
    });

    test('should deduct 10 for a point within two kilometers', () => {
      expect(assessSafety(HERE, [pointAt('a', 0.0135, 0.5)]).score).toBe(90);
    });

    test('should apply only the first matching rule per point', () => {
      // Close enough for the first rule, but not intense enough
      expect(assessSafety(HERE, [pointAt('a', 0.0018, 0.8)]).score).toBe(80);
    });

    test('should ignore points beyond two kilometers or below every threshold', () => {
      const result = assessSafety(HERE, [pointAt('far', 0.0225, 1), pointAt('weak', 0.0018, 0.4)]);

      expect(result).toEqual({ score: 100, riskLevel: RiskLevel.SAFE, contributingPoints: 0 });
    });

    test('should never go below zero', () => {
      const points = [pointAt('a', 0.0018, 0.9), pointAt('b', 0.0018, 0.9), pointAt('c', 0.0018, 0.9)];

      expect(assessSafety(HERE, points)).toEqual({ score: 0, riskLevel: RiskLevel.DANGEROUS, contributingPoints: 3 });
    });
  });

  describe('riskLevelFor', () => {
    test.each([
      [100, RiskLevel.SAFE],
      [80, RiskLevel.SAFE],
      [79, RiskLevel.MODERATE],
      [60, RiskLevel.MODERATE],
      [59, RiskLevel.RISKY],
      [40, RiskLevel.RISKY],
      [39, RiskLevel.DANGEROUS],
      [0, RiskLevel.DANGEROUS]
    ])('should rate a score of %i as %s', (score, level) => {
      expect(riskLevelFor(score)).toBe(level);
    });
  });

  describe('zoneHeatPoints', () => {
    test('should place one weighted point per zone', () => {
      const at = new Date('2026-03-01T12:00:00Z');
      const [fort, lane] = zoneHeatPoints([RED_FORT_ZONE, SMALL_ZONE], DEFAULT_ENGINE_CONFIG.zoneIntensityTable, at);

      expect(fort).toMatchObject({
        id: 'zone:red-fort',
        type: HeatPointType.RESTRICTED_ZONE,
        intensity: 0.9,
        timestamp: at,
        alertCount: 1,
        description: 'Red Fort Danger Zone'
      });
      expect(fort.position.latitude).toBeCloseTo(28.62, 10);
      expect(fort.position.longitude).toBeCloseTo(77.21, 10);
      expect(lane.intensity).toBe(0.7);
    });

    test('should use the zone center when one is given', () => {
      const center = { latitude: 28.63, longitude: 77.205 };
      const [point] = zoneHeatPoints([{ ...RED_FORT_ZONE, center }], DEFAULT_ENGINE_CONFIG.zoneIntensityTable);

      expect(point.position).toBe(center);
    });

    test('should mark a location inside a dangerous zone as moderate', () => {
      const heat = zoneHeatPoints([RED_FORT_ZONE], DEFAULT_ENGINE_CONFIG.zoneIntensityTable);

      expect(assessSafety({ latitude: 28.62, longitude: 77.21 }, heat).score).toBe(60);
    });
  });
});
