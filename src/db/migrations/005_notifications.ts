/**
 * Migration 005: Notifications
 *
 * Portal notifications written by the default notification adapter.
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';

export const NOTIFICATIONS_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS notifications (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  recipient_type TEXT NOT NULL CHECK (recipient_type IN ('customer', 'technician')),
  recipient_id TEXT NOT NULL,
  message TEXT NOT NULL,
  redemption_id TEXT,
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  read_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_notifications_recipient
  ON notifications(recipient_type, recipient_id, created_at);
`;

const ROLLBACK_SQL = `
DROP INDEX IF EXISTS idx_notifications_recipient;
DROP TABLE IF EXISTS notifications;
`;

export function up(db: Database.Database): void {
  logger.info('Running migration 005_notifications: Creating notifications table');
  db.exec(NOTIFICATIONS_SCHEMA_SQL);
  logger.info('Migration 005_notifications completed');
}

export function down(db: Database.Database): void {
  logger.info('Reverting migration 005_notifications');
  db.exec(ROLLBACK_SQL);
  logger.info('Migration 005_notifications reverted');
}
