/**
 * Migration 002: Referral System
 *
 * - referral_codes: one shareable code per customer
 * - referrals: successful referrals, one per (code, referred customer)
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';

export const REFERRAL_SCHEMA_SQL = `
-- =============================================================================
-- referral_codes — Referral code generation and tracking
-- =============================================================================
CREATE TABLE IF NOT EXISTS referral_codes (
  id TEXT PRIMARY KEY,
  customer_id TEXT NOT NULL UNIQUE REFERENCES customers(id),
  code TEXT NOT NULL UNIQUE CHECK (code GLOB '[A-Z0-9]*' AND length(code) BETWEEN 6 AND 8),
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

-- =============================================================================
-- referrals — Referrer-to-referred bindings
-- =============================================================================
CREATE TABLE IF NOT EXISTS referrals (
  id TEXT PRIMARY KEY,
  referral_code_id TEXT NOT NULL REFERENCES referral_codes(id),
  referrer_customer_id TEXT NOT NULL REFERENCES customers(id),
  referred_customer_id TEXT NOT NULL REFERENCES customers(id),
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  UNIQUE (referral_code_id, referred_customer_id),
  CHECK (referrer_customer_id != referred_customer_id)
);

CREATE INDEX IF NOT EXISTS idx_referrals_referrer
  ON referrals(referrer_customer_id);
`;

const ROLLBACK_SQL = `
DROP INDEX IF EXISTS idx_referrals_referrer;
DROP TABLE IF EXISTS referrals;
DROP TABLE IF EXISTS referral_codes;
`;

export function up(db: Database.Database): void {
  logger.info('Running migration 002_referral_system: Creating referral tables');
  db.exec(REFERRAL_SCHEMA_SQL);
  logger.info('Migration 002_referral_system completed');
}

export function down(db: Database.Database): void {
  logger.info('Reverting migration 002_referral_system');
  db.exec(ROLLBACK_SQL);
  logger.info('Migration 002_referral_system reverted');
}
