/**
 * Database Connection Module
 *
 * Opens a better-sqlite3 handle, applies pragmas and migrations. The handle
 * is returned to the caller and injected into services; nothing here holds
 * it globally.
 *
 * @module db/connection
 */

import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { logger } from '../utils/logger.js';
import { runMigrations } from './migrations/index.js';

/**
 * Open a database at `dbPath` (or ':memory:') and bring its schema up to date
 */
export function openDatabase(dbPath: string): Database.Database {
  // For file-based SQLite, ensure data directory exists
  if (dbPath !== ':memory:') {
    const dbDir = dirname(dbPath);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
      logger.info({ path: dbDir }, 'Created database directory');
    }
  }

  const db = new Database(dbPath);
  logger.info({ path: dbPath }, 'Database connection established');

  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  // Wait for the writer lock instead of failing immediately under BEGIN IMMEDIATE
  db.pragma('busy_timeout = 5000');

  runMigrations(db);

  return db;
}

/**
 * Close the database connection
 */
export function closeDatabase(db: Database.Database): void {
  if (db.open) {
    db.close();
    logger.info('Database connection closed');
  }
}

/**
 * Liveness probe for /health. Any SQLite error counts as unhealthy.
 */
export function isDatabaseHealthy(db: Database.Database): boolean {
  if (!db.open) {
    return false;
  }
  try {
    return db.prepare('SELECT 1').get() !== undefined;
  } catch (error) {
    logger.warn({ event: 'database.health.failed', error }, 'Database health probe failed');
    return false;
  }
}

// Re-export Database type for consumers
export type { Database };
