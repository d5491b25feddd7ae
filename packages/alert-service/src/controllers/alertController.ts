import { Response, NextFunction } from 'express';
import { EngineConfigOverrides, GeoPoint } from '@wayguard/shared-types';
import { ConfigurationError } from '@wayguard/alert-engine';
import { SessionRegistry } from '../services/sessionRegistry';
import { AuthenticatedRequest } from '../middleware/auth';
import { logger } from '../utils/logger';

interface LocationUpdateBody {
  latitude: number;
  longitude: number;
  accuracy?: number;
  timestamp?: Date;
}

interface PointQuery {
  latitude?: number;
  longitude?: number;
  limit?: number;
  withinKm?: number;
}

const pointOf = (query: PointQuery): GeoPoint | undefined =>
  query.latitude === undefined || query.longitude === undefined
    ? undefined
    : { latitude: query.latitude, longitude: query.longitude };

export class AlertController {
  constructor(private readonly registry: SessionRegistry) {}

  /**
   * Evaluate a location fix for the authenticated subject
   */
  updateLocation = (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const subjectId = this.subjectOf(req, res);
    if (!subjectId) return;

    try {
      const body: LocationUpdateBody = req.body;
      const result = this.registry.ingestLocation(subjectId, body);

      res.json({
        success: true,
        geofence: result.geofence,
        proximity: result.proximity
      });
    } catch (error) {
      logger.error('Error evaluating location:', error);
      next(error);
    }
  };

  /**
   * Replace the shared restricted zone set
   */
  loadZones = (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    try {
      const payloads: unknown[] = req.body;
      const result = this.registry.loadZonePayloads(payloads);

      res.json({
        success: true,
        loaded: result.loaded,
        skipped: result.skipped,
        errors: result.errors.map(error => ({ zoneId: error.zoneId, message: error.message }))
      });
    } catch (error) {
      logger.error('Error loading zones:', error);
      next(error);
    }
  };

  /**
   * Replace the shared set of emergency points
   */
  loadPOIs = (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    try {
      const payloads: unknown[] = req.body;
      const result = this.registry.loadPOIPayloads(payloads);

      res.json({ success: true, accepted: result.accepted, dropped: result.dropped });
    } catch (error) {
      logger.error('Error loading points of interest:', error);
      next(error);
    }
  };

  updateConfig = (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const subjectId = this.subjectOf(req, res);
    if (!subjectId) return;

    try {
      const overrides: EngineConfigOverrides = req.body;
      const settings = this.registry.configure(subjectId, overrides);

      res.json({
        success: true,
        config: {
          radiusKm: settings.radiusKm,
          cooldownMs: settings.cooldownMs,
          debounceSamples: settings.debounceSamples,
          mergeThresholdKm: settings.mergeThresholdKm,
          recheckIntervalMs: settings.recheckIntervalMs,
          maxActiveAlerts: settings.maxActiveAlerts
        }
      });
    } catch (error) {
      if (error instanceof ConfigurationError) {
        res.status(400).json({
          error: 'Invalid configuration',
          details: error.issues.map(issue => ({ field: issue.path.join('.'), message: issue.message }))
        });
        return;
      }
      logger.error('Error updating configuration:', error);
      next(error);
    }
  };

  getStatus = (req: AuthenticatedRequest, res: Response): void => {
    const subjectId = this.subjectOf(req, res);
    if (!subjectId) return;

    res.json({ subjectId, ...this.registry.engineFor(subjectId).status() });
  };

  getContainingZones = (req: AuthenticatedRequest, res: Response): void => {
    const subjectId = this.subjectOf(req, res);
    if (!subjectId) return;

    const point = pointOf(res.locals.query);
    if (!point) {
      res.status(400).json({ error: 'Latitude and longitude are required' });
      return;
    }

    const engine = this.registry.engineFor(subjectId);
    res.json({
      zones: engine.containsPoint(point),
      highestSeverity: engine.highestSeverityAt(point)
    });
  };

  getNearestZones = (req: AuthenticatedRequest, res: Response): void => {
    const subjectId = this.subjectOf(req, res);
    if (!subjectId) return;

    const query: PointQuery = res.locals.query;
    const point = pointOf(query);
    if (!point) {
      res.status(400).json({ error: 'Latitude and longitude are required' });
      return;
    }

    const zones = this.registry.engineFor(subjectId).nearestZones(point, query.limit ?? 5, query.withinKm);
    res.json({ zones, count: zones.length });
  };

  /**
   * Safety score at the given point, or at the subject's last fix
   */
  getSafety = (req: AuthenticatedRequest, res: Response): void => {
    const subjectId = this.subjectOf(req, res);
    if (!subjectId) return;

    const assessment = this.registry.engineFor(subjectId).assessSafety(pointOf(res.locals.query));
    if (!assessment) {
      res.status(404).json({ error: 'No location available for a safety assessment' });
      return;
    }

    res.json(assessment);
  };

  getEvents = (req: AuthenticatedRequest, res: Response): void => {
    const subjectId = this.subjectOf(req, res);
    if (!subjectId) return;

    const events = this.registry.history(subjectId);
    res.json({ events, count: events.length });
  };

  private subjectOf(req: AuthenticatedRequest, res: Response): string | undefined {
    const subjectId = req.subject?.subjectId;
    if (!subjectId) {
      res.status(401).json({ error: 'Access denied. No subject in token.' });
    }
    return subjectId;
  }
}
