import { v4 as uuidv4 } from 'uuid';
import {
  GeoPoint,
  GeofenceEvent,
  GeofenceEventType,
  RestrictedZone,
  ZoneMembership
} from '@wayguard/shared-types';
import { logger } from '../utils/logger';
import { ConfigurationError } from '../utils/errors';
import { isPointInPolygon } from '../utils/geo';

export interface GeofenceStateMachineOptions {
  debounceSamples?: number;
  clock?: () => Date;
  /** Containment test, defaults to ray casting against the zone polygon */
  contains?: (zone: RestrictedZone, point: GeoPoint) => boolean;
}

/**
 * Per-zone enter/exit detection. Every zone starts outside; the first
 * evaluation that finds the subject inside emits `enter`. Leaving a zone is
 * only committed after `debounceSamples` consecutive outside evaluations.
 */
export class GeofenceStateMachine {
  private readonly states = new Map<string, ZoneMembership>();
  private readonly clock: () => Date;
  private readonly contains: (zone: RestrictedZone, point: GeoPoint) => boolean;
  private debounceSamples: number;

  constructor(options: GeofenceStateMachineOptions = {}) {
    this.debounceSamples = GeofenceStateMachine.checkDebounce(options.debounceSamples ?? 1);
    this.clock = options.clock ?? (() => new Date());
    this.contains = options.contains ?? ((zone, point) => isPointInPolygon(point, zone.polygon));
  }

  setDebounceSamples(samples: number): void {
    this.debounceSamples = GeofenceStateMachine.checkDebounce(samples);
  }

  evaluate(point: GeoPoint, zones: readonly RestrictedZone[], at: Date = this.clock()): GeofenceEvent[] {
    const events: GeofenceEvent[] = [];
    const location = { latitude: point.latitude, longitude: point.longitude };

    for (const zone of zones) {
      const state = this.states.get(zone.id) ?? { inside: false, outsideStreak: 0 };
      const isInside = this.contains(zone, point);

      if (isInside) {
        if (!state.inside) {
          events.push(this.transition(zone, GeofenceEventType.ENTER, location, at));
          this.states.set(zone.id, { inside: true, lastTransitionAt: at, outsideStreak: 0 });
        } else if (state.outsideStreak > 0) {
          // Back inside before the exit was confirmed
          this.states.set(zone.id, { ...state, outsideStreak: 0 });
        }
        continue;
      }

      if (!state.inside) {
        if (!this.states.has(zone.id)) this.states.set(zone.id, state);
        continue;
      }

      const outsideStreak = state.outsideStreak + 1;
      if (outsideStreak >= this.debounceSamples) {
        events.push(this.transition(zone, GeofenceEventType.EXIT, location, at));
        this.states.set(zone.id, { inside: false, lastTransitionAt: at, outsideStreak: 0 });
      } else {
        this.states.set(zone.id, { ...state, outsideStreak });
      }
    }

    return events;
  }

  /**
   * Forget membership for the given zones, or for every zone
   */
  reset(zoneIds?: readonly string[]): void {
    if (!zoneIds) {
      this.states.clear();
      logger.debug('Cleared all geofence membership');
      return;
    }
    for (const zoneId of zoneIds) {
      this.states.delete(zoneId);
    }
    logger.debug(`Cleared geofence membership for ${zoneIds.length} zones`);
  }

  membership(zoneId: string): ZoneMembership {
    const state = this.states.get(zoneId);
    return state ? { ...state } : { inside: false, outsideStreak: 0 };
  }

  insideZoneIds(): string[] {
    return [...this.states.entries()]
      .filter(([, state]) => state.inside)
      .map(([zoneId]) => zoneId);
  }

  trackedZoneIds(): string[] {
    return [...this.states.keys()];
  }

  private transition(
    zone: RestrictedZone,
    eventType: GeofenceEventType,
    location: GeoPoint,
    at: Date
  ): GeofenceEvent {
    if (eventType === GeofenceEventType.ENTER) {
      logger.warn(`Subject entered restricted zone: ${zone.name}`, { zoneId: zone.id, zoneType: zone.zoneType });
    } else {
      logger.info(`Subject exited restricted zone: ${zone.name}`, { zoneId: zone.id });
    }

    return {
      id: uuidv4(),
      eventType,
      zone,
      location,
      timestamp: at
    };
  }

  private static checkDebounce(samples: number): number {
    if (!Number.isInteger(samples) || samples < 1) {
      throw new ConfigurationError(`debounceSamples must be a positive integer, got ${samples}`);
    }
    return samples;
  }
}
