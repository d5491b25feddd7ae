import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';

const statusOf = (err: unknown): number =>
  err instanceof Error && 'status' in err && typeof err.status === 'number' ? err.status : 500;

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const status = statusOf(err);
  const message = status < 500 && err instanceof Error ? err.message : 'Internal Server Error';

  logger.error('Unhandled error', {
    status,
    message: err instanceof Error ? err.message : String(err),
    ...(err instanceof Error && err.stack ? { stack: err.stack } : {})
  });

  res.status(status).json({
    success: false,
    error: {
      code: status === 400 ? 'BAD_REQUEST' : status === 404 ? 'NOT_FOUND' : 'INTERNAL_ERROR',
      message
    }
  });
}

export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json({
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: 'Route not found'
    }
  });
}
