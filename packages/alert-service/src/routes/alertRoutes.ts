import { Router } from 'express';
import rateLimit from 'express-rate-limit';
import { AlertController } from '../controllers/alertController';
import {
  validateConfigUpdate,
  validateLocationUpdate,
  validateNearestZonesQuery,
  validatePayloadList,
  validatePointQuery,
  validateSafetyQuery
} from '../middleware/validation';

export function createAlertRoutes(controller: AlertController): Router {
  const router = Router();

  // Rate limiting for location updates
  const locationUpdateLimiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1 minute
    max: 60, // 60 updates per minute
    message: 'Too many location updates, please slow down'
  });

  // Rate limiting for general API calls
  const generalLimiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 300,
    message: 'Too many requests, please try again later'
  });

  // Evaluation
  router.post('/location', locationUpdateLimiter, validateLocationUpdate, controller.updateLocation);

  // Shared data sets
  router.put('/zones', generalLimiter, validatePayloadList, controller.loadZones);
  router.put('/pois', generalLimiter, validatePayloadList, controller.loadPOIs);

  // Per-subject settings and state
  router.put('/config', generalLimiter, validateConfigUpdate, controller.updateConfig);
  router.get('/status', generalLimiter, controller.getStatus);
  router.get('/events', generalLimiter, controller.getEvents);

  // Zone queries
  router.get('/zones/containing', generalLimiter, validatePointQuery, controller.getContainingZones);
  router.get('/zones/nearest', generalLimiter, validateNearestZonesQuery, controller.getNearestZones);
  router.get('/safety', generalLimiter, validateSafetyQuery, controller.getSafety);

  return router;
}
