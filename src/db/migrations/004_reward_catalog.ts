/**
 * Migration 004: Reward Catalog and Redemptions
 *
 * - reward_types: what a reward does in the real world (discount kind/value)
 * - reward_options: purchasable catalog entries, soft-deactivated only
 * - redemptions: point-for-reward requests and their fulfillment lifecycle
 *
 * States: pending → assigned → fulfilled
 *         pending | assigned → rejected
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';

export const REWARD_CATALOG_SCHEMA_SQL = `
-- =============================================================================
-- reward_types
-- =============================================================================
CREATE TABLE IF NOT EXISTS reward_types (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE,
  category TEXT NOT NULL CHECK (category IN (
    'REPAIR_DISCOUNT', 'REPLACEMENT_DISCOUNT', 'FREE_SERVICE', 'MERCHANDISE', 'GIFT_CARD', 'OTHER'
  )),
  discount_kind TEXT NOT NULL DEFAULT 'NONE' CHECK (discount_kind IN (
    'PERCENTAGE', 'FIXED_AMOUNT', 'FREE', 'NONE'
  )),
  -- PERCENTAGE: whole percent; FIXED_AMOUNT: cents; FREE/NONE: 0
  discount_value INTEGER NOT NULL DEFAULT 0 CHECK (discount_value >= 0),
  description TEXT NOT NULL DEFAULT '',
  is_active INTEGER NOT NULL DEFAULT 1 CHECK (is_active IN (0, 1)),
  CHECK (discount_kind != 'PERCENTAGE' OR (discount_value > 0 AND discount_value <= 100)),
  CHECK (discount_kind != 'FIXED_AMOUNT' OR discount_value > 0),
  CHECK (discount_kind NOT IN ('FREE', 'NONE') OR discount_value = 0)
);

-- =============================================================================
-- reward_options
-- =============================================================================
CREATE TABLE IF NOT EXISTS reward_options (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE,
  description TEXT NOT NULL DEFAULT '',
  points_required INTEGER NOT NULL CHECK (points_required > 0),
  reward_type_id INTEGER REFERENCES reward_types(id),
  is_active INTEGER NOT NULL DEFAULT 1 CHECK (is_active IN (0, 1)),
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE TRIGGER IF NOT EXISTS reward_options_no_delete
  BEFORE DELETE ON reward_options
BEGIN
  SELECT RAISE(ABORT, 'reward_options are deactivated, never deleted');
END;

-- =============================================================================
-- redemptions
-- =============================================================================
CREATE TABLE IF NOT EXISTS redemptions (
  id TEXT PRIMARY KEY,
  customer_id TEXT NOT NULL REFERENCES points_accounts(customer_id),
  reward_option_id INTEGER NOT NULL REFERENCES reward_options(id),
  points_spent INTEGER NOT NULL CHECK (points_spent > 0),
  status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN (
    'pending', 'assigned', 'fulfilled', 'rejected'
  )),
  assigned_technician_id TEXT REFERENCES technicians(id),
  processed_by TEXT,
  notes TEXT,
  rejection_reason TEXT,
  applied_to_repair_id TEXT REFERENCES repairs(id),
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  assigned_at TEXT,
  processed_at TEXT,
  fulfilled_at TEXT,
  rejected_at TEXT,
  CHECK (status != 'assigned' OR assigned_technician_id IS NOT NULL)
);

CREATE INDEX IF NOT EXISTS idx_redemptions_customer
  ON redemptions(customer_id, created_at);

CREATE INDEX IF NOT EXISTS idx_redemptions_status
  ON redemptions(status, created_at);

CREATE INDEX IF NOT EXISTS idx_redemptions_technician
  ON redemptions(assigned_technician_id, status);
`;

const ROLLBACK_SQL = `
DROP INDEX IF EXISTS idx_redemptions_technician;
DROP INDEX IF EXISTS idx_redemptions_status;
DROP INDEX IF EXISTS idx_redemptions_customer;
DROP TABLE IF EXISTS redemptions;
DROP TRIGGER IF EXISTS reward_options_no_delete;
DROP TABLE IF EXISTS reward_options;
DROP TABLE IF EXISTS reward_types;
`;

export function up(db: Database.Database): void {
  logger.info('Running migration 004_reward_catalog: Creating catalog and redemption tables');
  db.exec(REWARD_CATALOG_SCHEMA_SQL);
  logger.info('Migration 004_reward_catalog completed');
}

export function down(db: Database.Database): void {
  logger.info('Reverting migration 004_reward_catalog');
  db.exec(ROLLBACK_SQL);
  logger.info('Migration 004_reward_catalog reverted');
}
