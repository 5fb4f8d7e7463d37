import type { Server } from 'node:http';
import { createApp } from './app';
import { loadEnvFile } from './lib/env-loader';
import { isDevelopment, loadConfig } from './lib/config';
import { createLogger, type Logger } from './lib/logger';
import { setupProcessErrorHandlers } from './lib/errors';
import { createServices } from './services';

const SHUTDOWN_TIMEOUT_MS = 30000;

const handleListenError = (logger: Logger, port: number) => (error: NodeJS.ErrnoException): void => {
  if (error.syscall !== 'listen') {
    throw error;
  }

  switch (error.code) {
    case 'EACCES':
      logger.fatal(`Port ${port} requires elevated privileges`);
      process.exit(1);
      break;
    case 'EADDRINUSE':
      logger.fatal(`Port ${port} is already in use`);
      process.exit(1);
      break;
    default:
      throw error;
  }
};

const registerShutdown = (server: Server, logger: Logger): void => {
  let shutdownInProgress = false;

  const gracefulShutdown = (signal: string): void => {
    if (shutdownInProgress) {
      logger.warn({ signal }, 'Shutdown already in progress, ignoring signal');
      return;
    }

    shutdownInProgress = true;
    logger.info({ signal }, 'Received shutdown signal, starting graceful shutdown');

    // Connections are opened per operation, so only the HTTP server needs closing
    server.close((error?: Error) => {
      if (error) {
        logger.error({ err: error }, 'Error during server shutdown');
        process.exit(1);
      }
      logger.info('Graceful shutdown completed');
      process.exit(0);
    });

    setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
};

function bootstrap(): void {
  loadEnvFile();
  const config = loadConfig();
  const logger = createLogger(config.log, { service: 'repo-pulse' });
  setupProcessErrorHandlers(logger);

  const services = createServices(config, logger);
  const app = createApp(services, config, logger);

  const server = app.listen(config.server.port, config.server.host, () => {
    logger.info({
      port: config.server.port,
      host: config.server.host,
      environment: config.env,
      processId: process.pid,
    }, 'Repo Pulse server started');

    if (isDevelopment(config)) {
      logger.info(`API running at http://${config.server.host}:${config.server.port}`);
      logger.info(`Health Check: http://${config.server.host}:${config.server.port}/health`);
    }
  });

  server.on('error', handleListenError(logger, config.server.port));
  registerShutdown(server, logger);
}

try {
  bootstrap();
} catch (error) {
  // The logger may not exist yet when configuration is invalid
  console.error('Failed to start server:', error);
  process.exit(1);
}
