import { loadEnvFile } from '../lib/env-loader';
import { loadConfig } from '../lib/config';
import { createLogger } from '../lib/logger';
import { setupProcessErrorHandlers } from '../lib/errors';
import { GatewayClient } from '../clients/gateway';
import { ConversationManager } from './conversation';
import { TelegramApi, TelegramBot } from './telegram';

function main(): void {
  loadEnvFile();
  const config = loadConfig();
  const logger = createLogger(config.log, { service: 'telegram-bot' });
  setupProcessErrorHandlers(logger);

  if (!config.bot.token) {
    logger.error('TELEGRAM_BOT_TOKEN is not set');
    process.exit(1);
  }

  const gateway = new GatewayClient(
    { baseUrl: config.bot.gatewayUrl, timeoutMs: config.bot.gatewayTimeoutMs },
    logger
  );
  const bot = new TelegramBot(
    new TelegramApi({ apiUrl: config.bot.apiUrl, token: config.bot.token }),
    new ConversationManager(gateway, logger),
    logger
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Received shutdown signal');
    bot.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Error during bot shutdown');
        process.exit(1);
      }
    );
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  bot.start();
}

main();
