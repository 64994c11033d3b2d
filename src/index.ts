/**
 * Windshield rewards service entry point
 */

import { config } from './config.js';
import { logger } from './utils/logger.js';
import { closeDatabase, isDatabaseHealthy, openDatabase } from './db/connection.js';
import { createRewardsServices } from './packages/adapters/rewards/index.js';
import { createApp, startServer, stopServer } from './api/server.js';

async function main(): Promise<void> {
  logger.info({ databasePath: config.database.path, logLevel: config.logging.level }, 'Starting windshield rewards service');

  const db = openDatabase(config.database.path);
  const services = createRewardsServices(db, {
    referrals: config.referrals,
    redemptions: config.redemptions,
  });

  const app = createApp(services, {
    adminApiKeys: config.api.adminApiKeys,
    isDatabaseHealthy: () => isDatabaseHealthy(db),
  });
  const server = await startServer(app, config.api.port, config.api.host);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await stopServer(server);
      closeDatabase(db);
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start windshield rewards service');
  process.exit(1);
});
