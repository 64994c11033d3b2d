/**
 * Seed the default reward catalog into the configured database.
 *
 * Usage: npm run seed:catalog [-- path/to/catalog.json]
 */

import { config } from '../src/config.js';
import { closeDatabase, openDatabase } from '../src/db/connection.js';
import { DEFAULT_CATALOG_PATH, seedRewardCatalog } from '../src/db/seeds/reward-catalog.js';
import { createRewardsServices } from '../src/packages/adapters/rewards/index.js';
import { logger } from '../src/utils/logger.js';

async function main(): Promise<void> {
  const catalogPath = process.argv[2] ?? DEFAULT_CATALOG_PATH;
  const db = openDatabase(config.database.path);

  try {
    const { catalog } = createRewardsServices(db, {
      referrals: config.referrals,
      redemptions: config.redemptions,
    });
    const result = await seedRewardCatalog(catalog, catalogPath);
    logger.info({ catalogPath, ...result }, 'Catalog seed complete');
  } finally {
    closeDatabase(db);
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Catalog seed failed');
  process.exit(1);
});
