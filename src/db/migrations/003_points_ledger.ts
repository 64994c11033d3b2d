/**
 * Migration 003: Points Ledger
 *
 * - points_accounts: per-customer balance cache (never negative)
 * - points_ledger: append-only log of every balance mutation
 *
 * The balance of an account always equals the sum of its ledger amounts;
 * both rows are written in the same transaction.
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';

export const POINTS_LEDGER_SCHEMA_SQL = `
-- =============================================================================
-- points_accounts
-- =============================================================================
CREATE TABLE IF NOT EXISTS points_accounts (
  customer_id TEXT PRIMARY KEY REFERENCES customers(id),
  balance INTEGER NOT NULL DEFAULT 0 CHECK (balance >= 0),
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

-- =============================================================================
-- points_ledger — append-only
-- =============================================================================
CREATE TABLE IF NOT EXISTS points_ledger (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  customer_id TEXT NOT NULL REFERENCES points_accounts(customer_id),
  entry_type TEXT NOT NULL CHECK (entry_type IN (
    'referral_award', 'welcome_bonus', 'redemption_debit', 'redemption_refund', 'adjustment'
  )),
  amount INTEGER NOT NULL CHECK (amount != 0),
  balance_after INTEGER NOT NULL CHECK (balance_after >= 0),
  reference_id TEXT,
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE INDEX IF NOT EXISTS idx_points_ledger_customer
  ON points_ledger(customer_id, id);

CREATE TRIGGER IF NOT EXISTS points_ledger_no_update
  BEFORE UPDATE ON points_ledger
BEGIN
  SELECT RAISE(ABORT, 'points_ledger is append-only');
END;

CREATE TRIGGER IF NOT EXISTS points_ledger_no_delete
  BEFORE DELETE ON points_ledger
BEGIN
  SELECT RAISE(ABORT, 'points_ledger is append-only');
END;
`;

const ROLLBACK_SQL = `
DROP TRIGGER IF EXISTS points_ledger_no_delete;
DROP TRIGGER IF EXISTS points_ledger_no_update;
DROP INDEX IF EXISTS idx_points_ledger_customer;
DROP TABLE IF EXISTS points_ledger;
DROP TABLE IF EXISTS points_accounts;
`;

export function up(db: Database.Database): void {
  logger.info('Running migration 003_points_ledger: Creating points tables');
  db.exec(POINTS_LEDGER_SCHEMA_SQL);
  logger.info('Migration 003_points_ledger completed');
}

export function down(db: Database.Database): void {
  logger.info('Reverting migration 003_points_ledger');
  db.exec(ROLLBACK_SQL);
  logger.info('Migration 003_points_ledger reverted');
}
