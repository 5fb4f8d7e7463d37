import { loadEnvFile } from '../lib/env-loader';
import { loadConfig } from '../lib/config';
import { createLogger } from '../lib/logger';
import { setupProcessErrorHandlers } from '../lib/errors';
import { GatewayClient } from '../clients/gateway';
import { createWebApp } from './app';
import { WebTemplates } from './templates';

const SHUTDOWN_TIMEOUT_MS = 10000;

function main(): void {
  loadEnvFile();
  const config = loadConfig();
  const logger = createLogger(config.log, { service: 'web-client' });
  setupProcessErrorHandlers(logger);

  const gateway = new GatewayClient(
    { baseUrl: config.web.gatewayUrl, timeoutMs: config.web.gatewayTimeoutMs },
    logger
  );
  const app = createWebApp(gateway, new WebTemplates(), config, logger);

  const server = app.listen(config.web.port, config.server.host, () => {
    logger.info({ port: config.web.port, gateway: config.web.gatewayUrl }, 'Web client started');
  });

  server.on('error', (error: Error) => {
    logger.fatal({ err: error }, 'Web client failed to listen');
    process.exit(1);
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Received shutdown signal');
    server.close((error?: Error) => {
      if (error) {
        logger.error({ err: error }, 'Error during web client shutdown');
        process.exit(1);
      }
      process.exit(0);
    });
    setTimeout(() => process.exit(1), SHUTDOWN_TIMEOUT_MS).unref();
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  main();
} catch (error) {
  console.error('Failed to start web client:', error);
  process.exit(1);
}
