import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import {
  AlertSeverity,
  EngineConfig,
  GeoPoint,
  LocationFix,
  PointOfInterest,
  ProximityAlertEvent,
  ProximityAlertType,
  RestrictedZone,
  isValidCoordinate
} from '@wayguard/shared-types';
import { logger } from '../utils/logger';
import { DiagnosticsCallback, MalformedPOIError } from '../utils/errors';
import { haversineKm } from '../utils/geo';
import { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from '../config/engineConfig';
import { ZoneIndex } from './zoneIndex';

export interface ProximityTrackerOptions {
  config?: EngineConfig;
  zoneIndex?: ZoneIndex;
  clock?: () => Date;
  onDiagnostic?: DiagnosticsCallback;
}

export interface POIIngestResult {
  accepted: number;
  dropped: number;
  alerts: ProximityAlertEvent[];
}

/**
 * Combine two points of interest into one aggregate. The first point anchors
 * identity, position and type.
 */
export function mergePoints(a: PointOfInterest, b: PointOfInterest): PointOfInterest {
  return {
    ...a,
    intensity: Math.max(a.intensity, b.intensity),
    alertCount: a.alertCount + b.alertCount,
    timestamp: a.timestamp.getTime() >= b.timestamp.getTime() ? a.timestamp : b.timestamp,
    description: a.description ?? b.description
  };
}

/**
 * Greedy clustering in input order: each unprocessed point absorbs every
 * later unprocessed point within thresholdKm of it. O(n^2), so meant for POI
 * sets of tens to low hundreds of entries.
 */
export function mergeNearby(points: readonly PointOfInterest[], thresholdKm: number): PointOfInterest[] {
  const processed = new Array<boolean>(points.length).fill(false);
  const merged: PointOfInterest[] = [];

  for (let i = 0; i < points.length; i++) {
    if (processed[i]) continue;
    processed[i] = true;

    let current = points[i];
    for (let j = i + 1; j < points.length; j++) {
      if (processed[j]) continue;
      if (haversineKm(points[i].position, points[j].position) <= thresholdKm) {
        current = mergePoints(current, points[j]);
        processed[j] = true;
      }
    }
    merged.push(current);
  }

  return merged;
}

const formatDistance = (distanceKm: number): string =>
  distanceKm < 0.1 ? `${Math.round(distanceKm * 1000)}m` : `${distanceKm.toFixed(1)}km`;

export class ProximityTracker {
  private readonly emitter = new EventEmitter();
  private readonly zoneIndex?: ZoneIndex;
  private readonly clock: () => Date;
  private readonly onDiagnostic?: DiagnosticsCallback;

  private config: EngineConfig;
  private pois: PointOfInterest[] = [];
  private position?: GeoPoint;
  private lastAlertAt = new Map<string, number>();
  // Latest evaluation time seen, so fix timestamps and the clock never rewind cooldowns
  private latestAt = 0;
  private alerts: ProximityAlertEvent[] = [];

  constructor(options: ProximityTrackerOptions = {}) {
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
    this.zoneIndex = options.zoneIndex;
    this.clock = options.clock ?? (() => new Date());
    this.onDiagnostic = options.onDiagnostic;
  }

  get poiCount(): number {
    return this.pois.length;
  }

  get currentPosition(): GeoPoint | undefined {
    return this.position;
  }

  /**
   * Subscribe to proximity alerts. Returns an unsubscribe function.
   */
  on(event: 'alert', listener: (alert: ProximityAlertEvent) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  /**
   * Set the alert radius and the minimum interval between two alerts for the
   * same target. Invalid values leave the previous configuration in place.
   */
  configure(radiusKm: number, cooldownMs: number): void {
    this.config = resolveEngineConfig({ radiusKm, cooldownMs }, this.config);
    logger.debug('Proximity tracker configured', { radiusKm, cooldownMs });
  }

  applyConfig(config: EngineConfig): void {
    this.config = config;
  }

  ingestLocation(fix: LocationFix): ProximityAlertEvent[] {
    this.position = { latitude: fix.latitude, longitude: fix.longitude };
    return this.evaluate(fix.timestamp ?? this.clock());
  }

  /**
   * Replace the cached POI set and re-evaluate against the last known position
   */
  ingestPOISet(pois: readonly PointOfInterest[]): POIIngestResult {
    const valid: PointOfInterest[] = [];
    let dropped = 0;

    for (const poi of pois) {
      const problem = this.validate(poi);
      if (problem) {
        dropped++;
        const error = new MalformedPOIError(problem, poi.id || undefined);
        logger.warn(error.message);
        this.onDiagnostic?.(error);
        continue;
      }
      valid.push({
        ...poi,
        intensity: Math.min(1, Math.max(0, poi.intensity)),
        alertCount: Math.max(1, Math.floor(poi.alertCount))
      });
    }

    this.pois = this.config.mergeThresholdKm > 0
      ? mergeNearby(valid, this.config.mergeThresholdKm)
      : valid;

    logger.debug(`Cached ${this.pois.length} points of interest`, { dropped });
    return { accepted: valid.length, dropped, alerts: this.evaluate(this.clock()) };
  }

  /**
   * Re-evaluate the cached set against the last known position
   */
  recheck(at: Date = this.clock()): ProximityAlertEvent[] {
    return this.evaluate(at);
  }

  points(): PointOfInterest[] {
    return [...this.pois];
  }

  activeAlerts(): ProximityAlertEvent[] {
    return [...this.alerts];
  }

  private evaluate(at: Date): ProximityAlertEvent[] {
    const position = this.position;
    if (!position) return [];

    const now = Math.max(this.latestAt, at.getTime());
    this.latestAt = now;
    this.pruneCooldowns(now);
    const events: ProximityAlertEvent[] = [];

    const candidates = this.pois
      .filter(poi => !(this.config.subjectId && poi.sourceId === this.config.subjectId))
      .map(poi => ({ poi, distanceKm: haversineKm(position, poi.position) }))
      .filter(candidate => candidate.distanceKm <= this.config.radiusKm)
      .sort((a, b) => a.distanceKm - b.distanceKm);

    for (const { poi, distanceKm } of candidates) {
      if (!this.cooldownElapsed(poi.id, now)) continue;
      events.push(this.record(poi.id, now, this.buildPOIAlert(poi, distanceKm, at)));
    }

    if (this.zoneIndex) {
      const { criticalKm, warningKm } = this.config.zoneProximity;
      for (const { zone, distanceKm } of this.zoneIndex.nearestZones(position, Infinity, warningKm)) {
        if (this.zoneIndex.contains(zone.id, position)) continue;
        const severity = distanceKm <= criticalKm ? AlertSeverity.CRITICAL : AlertSeverity.HIGH;
        // Warning and critical levels cool down separately so an approach escalates
        const key = `zone:${zone.id}:${severity}`;
        if (!this.cooldownElapsed(key, now)) continue;
        events.push(this.record(key, now, this.buildZoneAlert(zone, distanceKm, severity, at)));
      }
    }

    return events;
  }

  private severityFor(distanceKm: number): AlertSeverity {
    for (const band of this.config.severityBands) {
      const limit = band.withinKm === 'radius' ? this.config.radiusKm : band.withinKm;
      if (distanceKm <= limit) return band.severity;
    }
    return AlertSeverity.MODERATE;
  }

  private buildPOIAlert(poi: PointOfInterest, distanceKm: number, at: Date): ProximityAlertEvent {
    return {
      id: uuidv4(),
      type: ProximityAlertType.PANIC_ALERT,
      title: 'Emergency Alert Nearby',
      description: poi.alertCount > 1
        ? `${poi.alertCount} unresolved emergencies reported ${formatDistance(distanceKm)} away`
        : `Unresolved emergency reported ${formatDistance(distanceKm)} away`,
      distanceKm,
      severity: this.severityFor(distanceKm),
      timestamp: at,
      sourceId: poi.id,
      location: poi.position,
      metadata: {
        poiType: poi.type,
        intensity: poi.intensity,
        alertCount: poi.alertCount
      }
    };
  }

  private buildZoneAlert(
    zone: RestrictedZone,
    distanceKm: number,
    severity: AlertSeverity,
    at: Date
  ): ProximityAlertEvent {
    const distance = formatDistance(distanceKm);
    return {
      id: uuidv4(),
      type: ProximityAlertType.RESTRICTED_ZONE,
      title: severity === AlertSeverity.CRITICAL ? 'Restricted Zone Ahead' : 'Restricted Zone Nearby',
      description: zone.warningMessage ?? `${distance} from "${zone.name}"`,
      distanceKm,
      severity,
      timestamp: at,
      sourceId: zone.id,
      location: this.zoneIndex?.centerOf(zone.id) ?? zone.polygon[0],
      metadata: {
        zoneType: zone.zoneType,
        zoneName: zone.name
      }
    };
  }

  private record(key: string, now: number, event: ProximityAlertEvent): ProximityAlertEvent {
    this.lastAlertAt.set(key, now);
    this.alerts.push(event);
    if (this.alerts.length > this.config.maxActiveAlerts) {
      this.alerts.splice(0, this.alerts.length - this.config.maxActiveAlerts);
    }

    logger.info(`Proximity alert: ${event.title} (${event.severity})`, {
      sourceId: event.sourceId,
      distanceKm: Number(event.distanceKm.toFixed(3))
    });
    this.emitter.emit('alert', event);
    return event;
  }

  private cooldownElapsed(key: string, now: number): boolean {
    const last = this.lastAlertAt.get(key);
    return last === undefined || now - last >= this.config.cooldownMs;
  }

  private pruneCooldowns(now: number): void {
    for (const [key, last] of this.lastAlertAt) {
      if (now - last >= this.config.cooldownMs) {
        this.lastAlertAt.delete(key);
      }
    }
  }

  private validate(poi: PointOfInterest): string | null {
    if (!poi.id) return 'missing id';
    if (!poi.position || !isValidCoordinate(poi.position.latitude, poi.position.longitude)) {
      return 'missing or invalid coordinates';
    }
    if (!Number.isFinite(poi.intensity)) return 'intensity is not a number';
    if (!Number.isFinite(poi.alertCount)) return 'alertCount is not a number';
    return null;
  }
}
