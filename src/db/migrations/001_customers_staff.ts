/**
 * Migration 001: Customers and Staff
 *
 * Creates the identity tables the ledger references:
 * - customers: customer accounts (lowercased name, optional unique email)
 * - technicians: local mirror of the staffing roster
 * - repairs: repair jobs, used for technician workload and reward discounts
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';

export const CUSTOMERS_STAFF_SCHEMA_SQL = `
-- =============================================================================
-- customers
-- =============================================================================
CREATE TABLE IF NOT EXISTS customers (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL CHECK (name = lower(name)),
  email TEXT UNIQUE,
  phone TEXT,
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

-- =============================================================================
-- technicians
-- =============================================================================
CREATE TABLE IF NOT EXISTS technicians (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  is_manager INTEGER NOT NULL DEFAULT 0 CHECK (is_manager IN (0, 1)),
  is_active INTEGER NOT NULL DEFAULT 1 CHECK (is_active IN (0, 1)),
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

-- =============================================================================
-- repairs
-- =============================================================================
CREATE TABLE IF NOT EXISTS repairs (
  id TEXT PRIMARY KEY,
  technician_id TEXT NOT NULL REFERENCES technicians(id),
  customer_id TEXT REFERENCES customers(id),
  unit_number TEXT NOT NULL,
  queue_status TEXT NOT NULL DEFAULT 'PENDING' CHECK (queue_status IN (
    'REQUESTED', 'PENDING', 'APPROVED', 'IN_PROGRESS', 'COMPLETED', 'DENIED'
  )),
  cost_cents INTEGER NOT NULL DEFAULT 0 CHECK (cost_cents >= 0),
  discount_cents INTEGER NOT NULL DEFAULT 0 CHECK (discount_cents >= 0 AND discount_cents <= cost_cents),
  applied_redemption_id TEXT,
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE INDEX IF NOT EXISTS idx_repairs_technician_status
  ON repairs(technician_id, queue_status);
`;

const ROLLBACK_SQL = `
DROP INDEX IF EXISTS idx_repairs_technician_status;
DROP TABLE IF EXISTS repairs;
DROP TABLE IF EXISTS technicians;
DROP TABLE IF EXISTS customers;
`;

export function up(db: Database.Database): void {
  logger.info('Running migration 001_customers_staff: Creating customer and staff tables');
  db.exec(CUSTOMERS_STAFF_SCHEMA_SQL);
  logger.info('Migration 001_customers_staff completed');
}

export function down(db: Database.Database): void {
  logger.info('Reverting migration 001_customers_staff');
  db.exec(ROLLBACK_SQL);
  logger.info('Migration 001_customers_staff reverted');
}
