import { Server, Socket } from 'socket.io';
import { GeofenceEvent, ProximityAlertEvent } from '@wayguard/shared-types';

export type ClientToServerEvents = {
  'location:update': (data: unknown) => void;
};

export type ServerToClientEvents = {
  'location:update-success': (payload: {
    timestamp: Date;
    geofence: GeofenceEvent[];
    proximity: ProximityAlertEvent[];
  }) => void;
  'location:error': (payload: { message: string; details?: string[] }) => void;
  'geofence:event': (event: GeofenceEvent) => void;
  'proximity:alert': (event: ProximityAlertEvent) => void;
};

export type InterServerEvents = Record<string, never>;

export type SocketData = {
  subjectId: string;
};

export type AlertServer = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;
export type AlertSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

export const subjectRoom = (subjectId: string): string => `subject:${subjectId}`;
