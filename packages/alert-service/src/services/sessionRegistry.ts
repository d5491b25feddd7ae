import { EventEmitter } from 'events';
import {
  EngineConfig,
  EngineConfigOverrides,
  EvaluationResult,
  GeofenceEvent,
  LocationFix,
  PointOfInterest,
  ProximityAlertEvent,
  RestrictedZone
} from '@wayguard/shared-types';
import { AlertEngine, ZoneIndex, ZoneLoadResult, parsePOIs, parseZones } from '@wayguard/alert-engine';
import { logger } from '../utils/logger';

export type SubjectEvent =
  | { kind: 'geofence'; subjectId: string; event: GeofenceEvent }
  | { kind: 'proximity'; subjectId: string; event: ProximityAlertEvent };

export interface POILoadResult {
  accepted: number;
  dropped: number;
}

export interface SessionRegistryOptions {
  engineConfig?: EngineConfigOverrides;
  historyLimit?: number;
  /** Start the periodic proximity re-check for every new session, and the idle sweep */
  monitor?: boolean;
  /** A session with no open socket is evicted after this long without activity */
  idleTimeoutMs?: number;
  sweepIntervalMs?: number;
  clock?: () => Date;
}

interface Session {
  engine: AlertEngine;
  history: SubjectEvent[];
  lastActiveAt: number;
}

/**
 * One alert engine per tracked subject. Zone and POI sets are shared: a new
 * upload is pushed to every live session and seeds sessions created later.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  // Open sockets per subject; kept apart so a connection alone starts no engine
  private readonly connections = new Map<string, number>();
  private readonly emitter = new EventEmitter();
  private readonly engineConfig: EngineConfigOverrides;
  private readonly historyLimit: number;
  private readonly monitor: boolean;
  private readonly idleTimeoutMs: number;
  private readonly clock: () => Date;
  private sweepTimer: NodeJS.Timeout | null = null;

  private zones: RestrictedZone[] = [];
  private pois: PointOfInterest[] = [];

  constructor(options: SessionRegistryOptions = {}) {
    this.engineConfig = options.engineConfig ?? {};
    this.historyLimit = options.historyLimit ?? 100;
    this.monitor = options.monitor ?? false;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 30 * 60 * 1000;
    this.clock = options.clock ?? (() => new Date());

    if (this.monitor) {
      this.sweepTimer = setInterval(() => this.evictIdle(), options.sweepIntervalMs ?? 60 * 1000);
      this.sweepTimer.unref();
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  on(event: 'event', listener: (event: SubjectEvent) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  has(subjectId: string): boolean {
    return this.sessions.has(subjectId);
  }

  engineFor(subjectId: string): AlertEngine {
    return this.touch(this.sessionFor(subjectId)).engine;
  }

  /**
   * Track an open socket for the subject. Connected sessions are never evicted.
   */
  connect(subjectId: string): void {
    this.connections.set(subjectId, (this.connections.get(subjectId) ?? 0) + 1);
  }

  disconnect(subjectId: string): void {
    const open = (this.connections.get(subjectId) ?? 0) - 1;
    if (open > 0) {
      this.connections.set(subjectId, open);
    } else {
      this.connections.delete(subjectId);
    }

    const session = this.sessions.get(subjectId);
    if (session) this.touch(session);
  }

  /**
   * Close sessions with no open socket that have been idle for the timeout.
   * Returns the evicted subject ids.
   */
  evictIdle(): string[] {
    const now = this.clock().getTime();
    const idle = [...this.sessions.entries()]
      .filter(([subjectId, session]) => !this.connections.has(subjectId) && now - session.lastActiveAt >= this.idleTimeoutMs)
      .map(([subjectId]) => subjectId);

    idle.forEach(subjectId => this.remove(subjectId));
    if (idle.length) {
      logger.info(`Evicted ${idle.length} idle alert sessions`);
    }
    return idle;
  }

  loadZonePayloads(raws: readonly unknown[]): ZoneLoadResult {
    const parsed = parseZones(raws);
    const index = new ZoneIndex();
    const result = index.load(parsed.zones);

    this.zones = index.zones();
    for (const { engine } of this.sessions.values()) {
      engine.loadZones(this.zones);
    }

    return {
      loaded: result.loaded,
      skipped: result.skipped + parsed.errors.length,
      errors: [...parsed.errors, ...result.errors]
    };
  }

  loadPOIPayloads(raws: readonly unknown[]): POILoadResult {
    const parsed = parsePOIs(raws, this.clock());

    this.pois = parsed.pois;
    for (const { engine } of this.sessions.values()) {
      engine.ingestPOISet(this.pois);
    }

    return { accepted: parsed.pois.length, dropped: parsed.errors.length };
  }

  ingestLocation(subjectId: string, fix: LocationFix): EvaluationResult {
    return this.engineFor(subjectId).ingestLocation(fix);
  }

  configure(subjectId: string, overrides: EngineConfigOverrides): EngineConfig {
    return this.engineFor(subjectId).configure(overrides);
  }

  /**
   * Most recent events for a subject, oldest first
   */
  history(subjectId: string): SubjectEvent[] {
    return [...(this.sessions.get(subjectId)?.history ?? [])];
  }

  remove(subjectId: string): boolean {
    const session = this.sessions.get(subjectId);
    if (!session) return false;

    session.engine.dispose();
    this.sessions.delete(subjectId);
    logger.info(`Closed alert session for subject ${subjectId}`);
    return true;
  }

  close(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    for (const subjectId of [...this.sessions.keys()]) {
      this.remove(subjectId);
    }
    this.connections.clear();
    this.emitter.removeAllListeners();
  }

  private sessionFor(subjectId: string): Session {
    const existing = this.sessions.get(subjectId);
    if (existing) return existing;

    const engine = new AlertEngine({
      config: { ...this.engineConfig, subjectId },
      clock: this.clock
    });
    const session: Session = { engine, history: [], lastActiveAt: this.clock().getTime() };

    engine.on('geofence', event => this.record(session, { kind: 'geofence', subjectId, event }));
    engine.on('proximity', event => this.record(session, { kind: 'proximity', subjectId, event }));

    if (this.zones.length) engine.loadZones(this.zones);
    if (this.pois.length) engine.ingestPOISet(this.pois);
    if (this.monitor) engine.start();

    this.sessions.set(subjectId, session);
    logger.info(`Opened alert session for subject ${subjectId}`);
    return session;
  }

  private touch(session: Session): Session {
    session.lastActiveAt = this.clock().getTime();
    return session;
  }

  private record(session: Session, entry: SubjectEvent): void {
    session.history.push(entry);
    if (session.history.length > this.historyLimit) {
      session.history.splice(0, session.history.length - this.historyLimit);
    }
    this.emitter.emit('event', entry);
  }
}
