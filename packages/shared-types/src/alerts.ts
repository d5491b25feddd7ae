import { AlertSeverity, GeofenceEventType, ProximityAlertType, RiskLevel } from './enums';
import { GeoPoint, RestrictedZone } from './location';

export interface ProximityAlertEvent {
  id: string;
  type: ProximityAlertType;
  title: string;
  description: string;
  distanceKm: number;
  severity: AlertSeverity;
  timestamp: Date;
  sourceId: string; // POI id or zone id
  location: GeoPoint;
  metadata?: Record<string, unknown>;
}

export interface GeofenceEvent {
  id: string;
  eventType: GeofenceEventType;
  zone: RestrictedZone;
  location: GeoPoint;
  timestamp: Date;
}

export interface EvaluationResult {
  geofence: GeofenceEvent[];
  proximity: ProximityAlertEvent[];
}

export interface EngineStatus {
  zoneCount: number;
  poiCount: number;
  insideZoneIds: string[];
  lastFix?: GeoPoint & { timestamp: Date };
  monitoring: boolean;
  activeAlerts: number;
}

export interface SafetyAssessment {
  score: number; // 0 to 100
  riskLevel: RiskLevel;
  contributingPoints: number;
}
