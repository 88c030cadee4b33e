import 'reflect-metadata';

import type { Server } from 'node:http';
import { config as loadEnv } from 'dotenv';
import { loadConfig } from './shared/config';
import { configureLogging, Logger } from './shared/logger';
import { TOKENS } from './shared/tokens';
import { registerDependencies } from './app.container';
import { createServer } from './presentation/http/server';
import type { OiSnapshotApp } from './app';
import type {
  IPollLoop,
  ISessionStore,
  ISnapshotCache,
} from './domain/interfaces/services.interface';
import type { UptimeService } from './infrastructure/services/uptime.service';

// Load environment variables
loadEnv();

const logger = new Logger('Main');

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection:', reason);
  process.exit(1);
});

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function bootstrap(): Promise<void> {
  const config = loadConfig();
  configureLogging({ level: config.logLevel, toFile: config.logToFile });

  logger.info('Starting OI snapshot service...');
  const container = registerDependencies(config);
  const app = container.get<OiSnapshotApp>(TOKENS.App);

  // The loop races the server: requests before the first cycle get a 503.
  app.start();

  const server = createServer({
    snapshotCache: container.get<ISnapshotCache>(TOKENS.SnapshotCache),
    pollLoop: container.get<IPollLoop>(TOKENS.PollLoop),
    sessionStore: container.get<ISessionStore>(TOKENS.SessionStore),
    uptimeService: container.get<UptimeService>(TOKENS.UptimeService),
  }).listen(config.port, config.host, () => {
    logger.info(`HTTP server listening on ${config.host}:${config.port}`);
  });

  let isShuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await app.stop();
      await closeServer(server);
    } finally {
      process.exit(0);
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

bootstrap().catch((error: unknown) => {
  logger.error('Failed to start application:', error);
  process.exit(1);
});
