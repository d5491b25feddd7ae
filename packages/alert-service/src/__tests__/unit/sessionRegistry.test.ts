import { GeofenceEventType } from '@wayguard/shared-types';
import { ConfigurationError } from '@wayguard/alert-engine';
import { SessionRegistry } from '../../services/sessionRegistry';
import {
  FORT_ZONE_PAYLOAD,
  INSIDE_FORT,
  NEAR_ALERT,
  OUTSIDE_FORT,
  PANIC_ALERT_PAYLOAD
} from '../helpers/fixtures';

describe('SessionRegistry', () => {
  let registry: SessionRegistry;

  beforeEach(() => {
    registry = new SessionRegistry();
  });

  afterEach(() => {
    registry.close();
  });

  test('should create one engine per subject', () => {
    const engine = registry.engineFor('tourist-1');

    expect(registry.engineFor('tourist-1')).toBe(engine);
    expect(registry.engineFor('tourist-2')).not.toBe(engine);
    expect(registry.size).toBe(2);
  });

  test('should tag each engine with its subject', () => {
    expect(registry.engineFor('tourist-1').settings.subjectId).toBe('tourist-1');
  });

  describe('loadZonePayloads', () => {
    test('should report parsed and skipped zones', () => {
      const result = registry.loadZonePayloads([FORT_ZONE_PAYLOAD, { id: 'broken' }]);

      expect(result.loaded).toBe(1);
      expect(result.skipped).toBe(1);
      expect(result.errors.map(error => error.zoneId)).toEqual(['broken']);
    });

    test('should push zones to live sessions and seed new ones', () => {
      const existing = registry.engineFor('tourist-1');

      registry.loadZonePayloads([FORT_ZONE_PAYLOAD]);

      expect(existing.status().zoneCount).toBe(1);
      expect(registry.engineFor('tourist-2').status().zoneCount).toBe(1);
    });
  });

  describe('loadPOIPayloads', () => {
    test('should count accepted and dropped payloads', () => {
      expect(registry.loadPOIPayloads([PANIC_ALERT_PAYLOAD, { id: 'no-position' }]))
        .toEqual({ accepted: 1, dropped: 1 });
    });

    test('should seed new sessions with the current points', () => {
      registry.loadPOIPayloads([PANIC_ALERT_PAYLOAD]);

      expect(registry.engineFor('tourist-3').status().poiCount).toBe(1);
    });

    test('should not alert a subject about its own report', () => {
      registry.loadPOIPayloads([PANIC_ALERT_PAYLOAD]);

      expect(registry.ingestLocation('tourist-2', NEAR_ALERT).proximity).toEqual([]);
      expect(registry.ingestLocation('tourist-3', NEAR_ALERT).proximity).toHaveLength(1);
    });
  });

  describe('events', () => {
    beforeEach(() => {
      registry.loadZonePayloads([FORT_ZONE_PAYLOAD]);
    });

    test('should forward engine events with the subject id', () => {
      const listener = jest.fn();
      registry.on('event', listener);

      registry.ingestLocation('tourist-1', INSIDE_FORT);

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0]).toMatchObject({
        kind: 'geofence',
        subjectId: 'tourist-1',
        event: { eventType: GeofenceEventType.ENTER }
      });
    });

    test('should keep history per subject', () => {
      registry.ingestLocation('tourist-1', INSIDE_FORT);

      expect(registry.history('tourist-1')).toHaveLength(1);
      expect(registry.history('tourist-2')).toEqual([]);
    });

    test('should keep only the most recent events', () => {
      registry.close();
      registry = new SessionRegistry({ historyLimit: 2 });
      registry.loadZonePayloads([FORT_ZONE_PAYLOAD]);

      registry.ingestLocation('tourist-1', INSIDE_FORT);
      registry.ingestLocation('tourist-1', OUTSIDE_FORT);
      registry.ingestLocation('tourist-1', INSIDE_FORT);

      const kinds = registry.history('tourist-1').map(entry => entry.kind === 'geofence' && entry.event.eventType);
      expect(kinds).toEqual([GeofenceEventType.EXIT, GeofenceEventType.ENTER]);
    });
  });

  test('should reject invalid configuration for a subject', () => {
    expect(() => registry.configure('tourist-1', { radiusKm: 0 })).toThrow(ConfigurationError);
    expect(registry.configure('tourist-1', { radiusKm: 2 }).radiusKm).toBe(2);
  });

  test('should start monitoring when asked to', () => {
    registry.close();
    registry = new SessionRegistry({ monitor: true, engineConfig: { recheckIntervalMs: 60000 } });

    const engine = registry.engineFor('tourist-1');
    expect(engine.monitoring).toBe(true);

    registry.remove('tourist-1');
    expect(engine.monitoring).toBe(false);
  });

  test('should remove sessions', () => {
    registry.engineFor('tourist-1');

    expect(registry.remove('tourist-1')).toBe(true);
    expect(registry.remove('tourist-1')).toBe(false);
    expect(registry.has('tourist-1')).toBe(false);
  });

  describe('idle eviction', () => {
    const IDLE_MS = 10 * 60 * 1000;
    let now: number;

    beforeEach(() => {
      registry.close();
      now = new Date('2026-03-01T12:00:00Z').getTime();
      registry = new SessionRegistry({ idleTimeoutMs: IDLE_MS, clock: () => new Date(now) });
    });

    test('should evict sessions idle for the timeout', () => {
      const engine = registry.engineFor('tourist-1');
      registry.engineFor('tourist-2');

      now += IDLE_MS / 2;
      registry.ingestLocation('tourist-2', OUTSIDE_FORT);
      now += IDLE_MS / 2;

      expect(registry.evictIdle()).toEqual(['tourist-1']);
      expect(registry.has('tourist-1')).toBe(false);
      expect(registry.has('tourist-2')).toBe(true);
      expect(engine.monitoring).toBe(false);
    });

    test('should keep sessions with an open socket', () => {
      registry.engineFor('tourist-1');
      registry.connect('tourist-1');

      now += IDLE_MS;

      expect(registry.evictIdle()).toEqual([]);
      expect(registry.has('tourist-1')).toBe(true);
    });

    test('should evict once the last socket has been idle for the timeout', () => {
      registry.engineFor('tourist-1');
      registry.connect('tourist-1');
      registry.connect('tourist-1');

      now += IDLE_MS;
      registry.disconnect('tourist-1');
      expect(registry.evictIdle()).toEqual([]);

      registry.disconnect('tourist-1');
      expect(registry.evictIdle()).toEqual([]);

      now += IDLE_MS;
      expect(registry.evictIdle()).toEqual(['tourist-1']);
    });

    test('should not open a session for a connection alone', () => {
      registry.connect('tourist-1');

      expect(registry.has('tourist-1')).toBe(false);
    });

    test('should sweep idle sessions while monitoring', () => {
      jest.useFakeTimers();
      try {
        registry.close();
        registry = new SessionRegistry({
          monitor: true,
          idleTimeoutMs: IDLE_MS,
          sweepIntervalMs: 1000,
          clock: () => new Date(now)
        });
        registry.engineFor('tourist-1');

        now += IDLE_MS;
        jest.advanceTimersByTime(1000);

        expect(registry.has('tourist-1')).toBe(false);
      } finally {
        registry.close();
        jest.useRealTimers();
      }
    });
  });
});
