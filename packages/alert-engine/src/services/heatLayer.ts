import {
  GeoPoint,
  HeatPointType,
  PointOfInterest,
  RestrictedZone,
  RiskLevel,
  SafetyAssessment,
  ZoneIntensityTable
} from '@wayguard/shared-types';
import { haversineKm, vertexCentroid } from '../utils/geo';

interface SafetyDeduction {
  withinKm: number;
  minIntensity: number;
  penalty: number;
}

// Checked in order, the first matching rule applies to a heat point
const SAFETY_DEDUCTIONS: readonly SafetyDeduction[] = [
  { withinKm: 0.5, minIntensity: 0.8, penalty: 40 },
  { withinKm: 1.0, minIntensity: 0.6, penalty: 20 },
  { withinKm: 2.0, minIntensity: 0.4, penalty: 10 }
];

/**
 * One heat point per zone, placed on the zone center and weighted by zone type
 */
export function zoneHeatPoints(
  zones: readonly RestrictedZone[],
  table: ZoneIntensityTable,
  at: Date = new Date()
): PointOfInterest[] {
  return zones.map(zone => ({
    id: `zone:${zone.id}`,
    position: zone.center ?? vertexCentroid(zone.polygon),
    type: HeatPointType.RESTRICTED_ZONE,
    intensity: table[zone.zoneType],
    timestamp: at,
    alertCount: 1,
    description: zone.name
  }));
}

export function riskLevelFor(score: number): RiskLevel {
  if (score >= 80) return RiskLevel.SAFE;
  if (score >= 60) return RiskLevel.MODERATE;
  if (score >= 40) return RiskLevel.RISKY;
  return RiskLevel.DANGEROUS;
}

export function assessSafety(point: GeoPoint, heatPoints: readonly PointOfInterest[]): SafetyAssessment {
  let score = 100;
  let contributingPoints = 0;

  for (const heatPoint of heatPoints) {
    const distanceKm = haversineKm(point, heatPoint.position);
    const rule = SAFETY_DEDUCTIONS.find(
      deduction => distanceKm < deduction.withinKm && heatPoint.intensity > deduction.minIntensity
    );
    if (rule) {
      score = Math.max(0, score - rule.penalty);
      contributingPoints++;
    }
  }

  return { score, riskLevel: riskLevelFor(score), contributingPoints };
}
