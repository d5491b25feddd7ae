import { EventEmitter } from 'events';
import {
  EngineConfig,
  EngineConfigOverrides,
  EngineStatus,
  EvaluationResult,
  GeoPoint,
  GeofenceEvent,
  LocationFix,
  PointOfInterest,
  ProximityAlertEvent,
  RestrictedZone,
  SafetyAssessment,
  ZoneDistance,
  ZoneType,
  isValidCoordinate
} from '@wayguard/shared-types';
import { logger } from '../utils/logger';
import { DiagnosticsCallback, EngineError } from '../utils/errors';
import { parsePOIs, parseZones } from '../utils/payloadParser';
import { resolveEngineConfig } from '../config/engineConfig';
import { ZoneIndex, ZoneLoadResult } from './zoneIndex';
import { ProximityTracker, POIIngestResult } from './proximityTracker';
import { GeofenceStateMachine } from './geofenceStateMachine';
import { assessSafety, zoneHeatPoints } from './heatLayer';

export interface AlertEngineOptions {
  config?: EngineConfigOverrides;
  clock?: () => Date;
  onDiagnostic?: DiagnosticsCallback;
}

export interface AlertEngineEvents {
  geofence: GeofenceEvent;
  proximity: ProximityAlertEvent;
  diagnostic: EngineError;
}

const EMPTY_RESULT = (): EvaluationResult => ({ geofence: [], proximity: [] });

/**
 * Geofence and proximity alerting for a single subject. Each ingest call runs
 * one evaluation round to completion; callers serialize access.
 */
export class AlertEngine {
  readonly zoneIndex: ZoneIndex;
  readonly proximity: ProximityTracker;
  readonly geofence: GeofenceStateMachine;

  private readonly emitter = new EventEmitter();
  private readonly clock: () => Date;
  private readonly report: DiagnosticsCallback;
  private config: EngineConfig;
  private lastFix?: GeoPoint & { timestamp: Date };
  private recheckTimer: NodeJS.Timeout | null = null;

  constructor(options: AlertEngineOptions = {}) {
    this.config = resolveEngineConfig(options.config);
    this.clock = options.clock ?? (() => new Date());

    this.report = (error) => {
      options.onDiagnostic?.(error);
      this.emitter.emit('diagnostic', error);
    };

    this.zoneIndex = new ZoneIndex(this.report);
    this.proximity = new ProximityTracker({
      config: this.config,
      zoneIndex: this.zoneIndex,
      clock: this.clock,
      onDiagnostic: this.report
    });
    this.geofence = new GeofenceStateMachine({
      debounceSamples: this.config.debounceSamples,
      clock: this.clock,
      contains: (zone, point) => this.zoneIndex.contains(zone.id, point)
    });

    this.proximity.on('alert', (alert) => {
      this.emitter.emit('proximity', alert);
    });
  }

  get settings(): EngineConfig {
    return this.config;
  }

  get monitoring(): boolean {
    return this.recheckTimer !== null;
  }

  on<K extends keyof AlertEngineEvents>(event: K, listener: (payload: AlertEngineEvents[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  /**
   * Replace the zone set. Membership of zones that disappeared is dropped,
   * then the last fix is evaluated against the new set.
   */
  loadZones(zones: readonly RestrictedZone[]): ZoneLoadResult {
    const previous = this.geofence.trackedZoneIds();
    const result = this.zoneIndex.load(zones);

    const removed = previous.filter(zoneId => !this.zoneIndex.get(zoneId));
    if (removed.length) {
      this.geofence.reset(removed);
    }

    if (this.lastFix) {
      this.evaluate(this.lastFix, this.clock());
    }
    return result;
  }

  /**
   * Parse raw zone payloads at the boundary, then load the valid ones
   */
  loadZonePayloads(raws: readonly unknown[]): ZoneLoadResult {
    const parsed = parseZones(raws);
    parsed.errors.forEach(this.report);

    const result = this.loadZones(parsed.zones);
    return {
      loaded: result.loaded,
      skipped: result.skipped + parsed.errors.length,
      errors: [...parsed.errors, ...result.errors]
    };
  }

  ingestLocation(fix: LocationFix): EvaluationResult {
    if (!isValidCoordinate(fix.latitude, fix.longitude)) {
      logger.warn('Ignoring location fix with invalid coordinates', {
        latitude: fix.latitude,
        longitude: fix.longitude
      });
      return EMPTY_RESULT();
    }

    const at = fix.timestamp ?? this.clock();
    this.lastFix = { latitude: fix.latitude, longitude: fix.longitude, timestamp: at };
    return this.evaluate(this.lastFix, at);
  }

  ingestPOISet(pois: readonly PointOfInterest[]): POIIngestResult {
    return this.proximity.ingestPOISet(pois);
  }

  ingestPOIPayloads(raws: readonly unknown[]): POIIngestResult {
    const parsed = parsePOIs(raws, this.clock());
    parsed.errors.forEach(this.report);

    const result = this.proximity.ingestPOISet(parsed.pois);
    return { ...result, dropped: result.dropped + parsed.errors.length };
  }

  /**
   * Apply configuration overrides. A ConfigurationError leaves the current
   * configuration untouched.
   */
  configure(overrides: EngineConfigOverrides): EngineConfig {
    const next = resolveEngineConfig(overrides, this.config);
    const intervalChanged = next.recheckIntervalMs !== this.config.recheckIntervalMs;

    this.config = next;
    this.proximity.applyConfig(next);
    this.geofence.setDebounceSamples(next.debounceSamples);

    if (intervalChanged && this.monitoring) {
      this.stop();
      this.start();
    }

    logger.info('Alert engine reconfigured', { overrides: Object.keys(overrides) });
    return next;
  }

  /**
   * Proximity re-check against the last fix, for POI changes that arrive
   * without a new location
   */
  recheck(): ProximityAlertEvent[] {
    if (!this.lastFix) return [];
    return this.proximity.recheck(this.clock());
  }

  start(): void {
    if (this.recheckTimer) return;

    this.recheckTimer = setInterval(() => {
      try {
        this.recheck();
      } catch (error) {
        logger.error('Periodic proximity re-check failed:', error);
      }
    }, this.config.recheckIntervalMs);
    this.recheckTimer.unref();

    logger.info(`Alert monitoring started, re-check every ${this.config.recheckIntervalMs}ms`);
  }

  stop(): void {
    if (!this.recheckTimer) return;
    clearInterval(this.recheckTimer);
    this.recheckTimer = null;
    logger.info('Alert monitoring stopped');
  }

  dispose(): void {
    this.stop();
    this.emitter.removeAllListeners();
    this.geofence.reset();
  }

  status(): EngineStatus {
    return {
      zoneCount: this.zoneIndex.size,
      poiCount: this.proximity.poiCount,
      insideZoneIds: this.geofence.insideZoneIds(),
      lastFix: this.lastFix,
      monitoring: this.monitoring,
      activeAlerts: this.proximity.activeAlerts().length
    };
  }

  containsPoint(point: GeoPoint): RestrictedZone[] {
    return this.zoneIndex.containsPoint(point);
  }

  nearestZones(point: GeoPoint, maxResults: number, withinKm?: number): ZoneDistance[] {
    return this.zoneIndex.nearestZones(point, maxResults, withinKm);
  }

  highestSeverityAt(point: GeoPoint): ZoneType {
    return this.zoneIndex.highestSeverity(this.zoneIndex.containsPoint(point));
  }

  /**
   * Zone and POI heat points for the visualization layer
   */
  heatPoints(): PointOfInterest[] {
    return [
      ...zoneHeatPoints(this.zoneIndex.zones(), this.config.zoneIntensityTable, this.clock()),
      ...this.proximity.points()
    ];
  }

  assessSafety(point?: GeoPoint): SafetyAssessment | undefined {
    const target = point ?? this.lastFix;
    if (!target) return undefined;
    return assessSafety(target, this.heatPoints());
  }

  private evaluate(point: GeoPoint, at: Date): EvaluationResult {
    const geofence = this.geofence.evaluate(point, this.zoneIndex.zones(), at);
    for (const event of geofence) {
      this.emitter.emit('geofence', event);
    }

    const proximity = this.proximity.ingestLocation({
      latitude: point.latitude,
      longitude: point.longitude,
      timestamp: at
    });

    return { geofence, proximity };
  }
}
