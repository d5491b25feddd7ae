import { LocationFix } from '@wayguard/shared-types';
import { logger } from '../utils/logger';
import { createSocketAuthMiddleware } from '../middleware/auth';
import { locationUpdateSchema } from '../middleware/validation';
import { SessionRegistry, SubjectEvent } from '../services/sessionRegistry';
import { AlertServer, AlertSocket, subjectRoom } from './types';

export class AlertWebSocketHandler {
  private readonly unsubscribe: () => void;

  constructor(
    private readonly io: AlertServer,
    private readonly registry: SessionRegistry,
    jwtSecret: string
  ) {
    this.io.use(createSocketAuthMiddleware(jwtSecret));
    this.io.on('connection', socket => this.handleConnection(socket));

    // Engine events reach every socket of the subject, whatever caused them
    this.unsubscribe = this.registry.on('event', event => this.broadcast(event));
  }

  close(): void {
    this.unsubscribe();
  }

  private handleConnection(socket: AlertSocket): void {
    const { subjectId } = socket.data;
    logger.info(`Subject connected: ${subjectId}`);

    // Join subject to their personal room
    void socket.join(subjectRoom(subjectId));
    this.registry.connect(subjectId);

    socket.on('location:update', data => {
      this.handleLocationUpdate(socket, data);
    });

    socket.on('disconnect', reason => {
      this.registry.disconnect(subjectId);
      logger.info(`Subject disconnected: ${subjectId}`, { reason });
    });
  }

  private handleLocationUpdate(socket: AlertSocket, data: unknown): void {
    const { error, value } = locationUpdateSchema.validate(data, { abortEarly: false, stripUnknown: true });
    if (error) {
      socket.emit('location:error', {
        message: 'Invalid location update',
        details: error.details.map(detail => detail.message)
      });
      return;
    }

    try {
      const fix: LocationFix = value;
      const result = this.registry.ingestLocation(socket.data.subjectId, fix);

      socket.emit('location:update-success', {
        timestamp: fix.timestamp ?? new Date(),
        geofence: result.geofence,
        proximity: result.proximity
      });
    } catch (err) {
      logger.error('Error handling location update:', err);
      socket.emit('location:error', { message: 'Failed to evaluate location' });
    }
  }

  private broadcast(entry: SubjectEvent): void {
    const room = this.io.to(subjectRoom(entry.subjectId));
    if (entry.kind === 'geofence') {
      room.emit('geofence:event', entry.event);
    } else {
      room.emit('proximity:alert', entry.event);
    }
  }
}
