import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';

import { config } from './utils/config';
import { SessionRegistry } from './services/sessionRegistry';
import { AlertController } from './controllers/alertController';
import { createAlertRoutes } from './routes/alertRoutes';
import { createAuthMiddleware } from './middleware/auth';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';

export interface AppOptions {
  registry: SessionRegistry;
  jwtSecret: string;
  corsOrigin?: string;
}

export function createApp({ registry, jwtSecret, corsOrigin = config.CORS_ORIGIN }: AppOptions): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({
    origin: corsOrigin,
    credentials: true
  }));

  // Rate limiting
  const limiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 1000, // Limit each IP to 1000 requests per windowMs
    message: 'Too many requests from this IP, please try again later.'
  });
  app.use(limiter);

  // Body parsing middleware
  app.use(express.json({ limit: '10mb' }));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'healthy',
      service: 'alert-service',
      timestamp: new Date().toISOString()
    });
  });

  // API routes
  const controller = new AlertController(registry);
  app.use('/api/alerts', createAuthMiddleware(jwtSecret), createAlertRoutes(controller));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
