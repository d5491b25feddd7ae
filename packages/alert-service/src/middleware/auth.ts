import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { logger } from '../utils/logger';
import { AlertSocket } from '../websocket/types';

export interface AuthenticatedRequest extends Request {
  subject?: {
    subjectId: string;
    role?: string;
  };
}

export interface SubjectClaims {
  subjectId: string;
  role?: string;
}

/**
 * Verify a subject token. Throws when the signature is invalid or the
 * `subjectId` claim is missing.
 */
export function verifySubjectToken(token: string, jwtSecret: string): SubjectClaims {
  const decoded = jwt.verify(token, jwtSecret);
  if (typeof decoded === 'string' || typeof decoded.subjectId !== 'string' || !decoded.subjectId) {
    throw new Error('Token has no subjectId claim');
  }
  return {
    subjectId: decoded.subjectId,
    role: typeof decoded.role === 'string' ? decoded.role : undefined
  };
}

export const createAuthMiddleware = (jwtSecret: string) =>
  (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const token = req.header('Authorization')?.replace('Bearer ', '');

    if (!token) {
      res.status(401).json({ error: 'Access denied. No token provided.' });
      return;
    }

    try {
      req.subject = verifySubjectToken(token, jwtSecret);
      next();
    } catch (error) {
      logger.warn('Rejected API token', { error: error instanceof Error ? error.message : String(error) });
      res.status(401).json({ error: 'Invalid token' });
    }
  };

export const createSocketAuthMiddleware = (jwtSecret: string) =>
  (socket: AlertSocket, next: (err?: Error) => void): void => {
    const token: unknown = socket.handshake.auth.token;

    if (typeof token !== 'string' || !token) {
      next(new Error('Authentication error: No token provided'));
      return;
    }

    try {
      socket.data.subjectId = verifySubjectToken(token, jwtSecret).subjectId;
      next();
    } catch (error) {
      logger.warn('Rejected socket token', { error: error instanceof Error ? error.message : String(error) });
      next(new Error('Authentication error: Invalid token'));
    }
  };
