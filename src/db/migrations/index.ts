/**
 * Ordered migration registry and runner.
 *
 * Applied migrations are recorded in schema_migrations so the runner is
 * safe to call on every startup.
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';
import * as customersStaff from './001_customers_staff.js';
import * as referralSystem from './002_referral_system.js';
import * as pointsLedger from './003_points_ledger.js';
import * as rewardCatalog from './004_reward_catalog.js';
import * as notifications from './005_notifications.js';

export interface Migration {
  id: string;
  up: (db: Database.Database) => void;
  down: (db: Database.Database) => void;
}

export const MIGRATIONS: readonly Migration[] = [
  { id: '001_customers_staff', up: customersStaff.up, down: customersStaff.down },
  { id: '002_referral_system', up: referralSystem.up, down: referralSystem.down },
  { id: '003_points_ledger', up: pointsLedger.up, down: pointsLedger.down },
  { id: '004_reward_catalog', up: rewardCatalog.up, down: rewardCatalog.down },
  { id: '005_notifications', up: notifications.up, down: notifications.down },
];

const MIGRATIONS_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS schema_migrations (
  id TEXT PRIMARY KEY,
  applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
)`;

/**
 * Apply every migration not yet recorded. Returns the ids applied by this call.
 */
export function runMigrations(db: Database.Database): string[] {
  db.exec(MIGRATIONS_TABLE_SQL);

  const applied = new Set(
    db.prepare<[], { id: string }>('SELECT id FROM schema_migrations').all().map((row) => row.id)
  );
  const record = db.prepare<[string]>('INSERT INTO schema_migrations (id) VALUES (?)');
  const ran: string[] = [];

  for (const migration of MIGRATIONS) {
    if (applied.has(migration.id)) continue;

    db.transaction(() => {
      migration.up(db);
      record.run(migration.id);
    }).immediate();
    ran.push(migration.id);
  }

  if (ran.length > 0) {
    logger.info({ migrations: ran }, 'Database migrations applied');
  } else {
    logger.debug('Database schema up to date');
  }

  return ran;
}
