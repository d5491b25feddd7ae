import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { logger } from '../utils/logger';

const latitude = Joi.number().min(-90).max(90);
const longitude = Joi.number().min(-180).max(180);

// Location update validation schema, shared with the WebSocket handler
export const locationUpdateSchema = Joi.object({
  latitude: latitude.required(),
  longitude: longitude.required(),
  accuracy: Joi.number().min(0).max(10000).optional(),
  timestamp: Joi.date().iso().optional()
});

// Raw upstream payloads are normalized by the engine, only the envelope is checked here
const payloadListSchema = Joi.array().items(Joi.object().unknown(true)).max(10000).required();

// Types only; range checks belong to the engine configuration schema
const configSchema = Joi.object({
  radiusKm: Joi.number().optional(),
  cooldownMs: Joi.number().integer().optional(),
  debounceSamples: Joi.number().integer().optional(),
  mergeThresholdKm: Joi.number().optional(),
  recheckIntervalMs: Joi.number().integer().optional(),
  maxActiveAlerts: Joi.number().integer().optional()
}).min(1);

const pointQuerySchema = Joi.object({
  latitude: latitude.required(),
  longitude: longitude.required()
});

const nearestZonesQuerySchema = Joi.object({
  latitude: latitude.required(),
  longitude: longitude.required(),
  limit: Joi.number().integer().min(1).max(50).default(5),
  withinKm: Joi.number().positive().optional()
});

const safetyQuerySchema = Joi.object({
  latitude: latitude.optional(),
  longitude: longitude.optional()
}).and('latitude', 'longitude');

interface ValidationDetail {
  field: string;
  message: string;
}

const describe = (error: Joi.ValidationError): ValidationDetail[] =>
  error.details.map(detail => ({
    field: detail.path.join('.'),
    message: detail.message
  }));

/**
 * Generic validation middleware factory
 */
function createValidationMiddleware(schema: Joi.Schema) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const { error, value } = schema.validate(req.body, {
      abortEarly: false,
      stripUnknown: true
    });

    if (error) {
      const errorDetails = describe(error);
      logger.warn('Validation error:', {
        url: req.url,
        method: req.method,
        errors: errorDetails
      });

      res.status(400).json({
        error: 'Validation failed',
        details: errorDetails
      });
      return;
    }

    // Replace req.body with validated and sanitized data
    req.body = value;
    next();
  };
}

/**
 * Query parameter validation middleware
 */
function createQueryValidationMiddleware(schema: Joi.ObjectSchema) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const { error, value } = schema.validate(req.query, {
      abortEarly: false,
      stripUnknown: true
    });

    if (error) {
      const errorDetails = describe(error);
      logger.warn('Query validation error:', {
        url: req.url,
        method: req.method,
        errors: errorDetails
      });

      res.status(400).json({
        error: 'Query validation failed',
        details: errorDetails
      });
      return;
    }

    // Converted values (numbers, defaults) for the controller
    res.locals.query = value;
    next();
  };
}

export const validateLocationUpdate = createValidationMiddleware(locationUpdateSchema);
export const validatePayloadList = createValidationMiddleware(payloadListSchema);
export const validateConfigUpdate = createValidationMiddleware(configSchema);

export const validatePointQuery = createQueryValidationMiddleware(pointQuerySchema);
export const validateNearestZonesQuery = createQueryValidationMiddleware(nearestZonesQuerySchema);
export const validateSafetyQuery = createQueryValidationMiddleware(safetyQuerySchema);
