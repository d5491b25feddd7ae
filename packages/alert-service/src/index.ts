import { createServer } from 'http';
import { Server } from 'socket.io';

import { config } from './utils/config';
import { logger } from './utils/logger';
import { createApp } from './app';
import { SessionRegistry } from './services/sessionRegistry';
import { AlertWebSocketHandler } from './websocket/alertHandler';
import { ClientToServerEvents, InterServerEvents, ServerToClientEvents, SocketData } from './websocket/types';

const registry = new SessionRegistry({
  engineConfig: config.ENGINE,
  monitor: true,
  idleTimeoutMs: config.SESSION_IDLE_TIMEOUT_MS
});
const app = createApp({ registry, jwtSecret: config.JWT_SECRET });
const server = createServer(app);
const io = new Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>(server, {
  cors: {
    origin: config.CORS_ORIGIN,
    methods: ['GET', 'POST'],
    credentials: true
  }
});

const alertWsHandler = new AlertWebSocketHandler(io, registry, config.JWT_SECRET);

server.listen(config.PORT, () => {
  logger.info(`Alert service running on port ${config.PORT}`);
  logger.info('WebSocket server ready for real-time alerts');
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down gracefully`);
  alertWsHandler.close();
  registry.close();
  void io.close(() => {
    logger.info('Alert service shut down');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export { app, server, io };
