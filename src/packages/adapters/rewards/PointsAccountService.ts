/**
 * PointsAccountService — Per-Customer Points Balance
 *
 * The balance column on points_accounts is a cache; points_ledger is the
 * source of truth. Every mutation updates the balance and appends one
 * ledger entry in the same transaction, so balance == SUM(amount).
 *
 * Debits are compare-and-set: UPDATE ... WHERE balance >= amount. A stale
 * read can therefore never overdraw an account.
 *
 * credit() and debit() take part in the caller's transaction and must be
 * invoked from inside db.transaction(...).
 *
 * @module packages/adapters/rewards/PointsAccountService
 */

import type Database from 'better-sqlite3';
import type {
  BalanceCheck,
  IPointsAccountService,
  LedgerEntryType,
  PointsAccount,
  PointsLedgerEntry,
} from '../../core/ports/IPointsAccount.js';
import type { UpsertResult } from '../../core/ports/UpsertResult.js';
import {
  InsufficientPointsError,
  NotFoundError,
  ValidationError,
} from '../../../utils/errors.js';
import { createChildLogger } from '../../../utils/logger.js';

const log = createChildLogger({ module: 'PointsAccountService' });

const DEFAULT_LEDGER_LIMIT = 50;

export type CreditEntryType = Exclude<LedgerEntryType, 'redemption_debit'>;
export type DebitEntryType = Extract<LedgerEntryType, 'redemption_debit' | 'adjustment'>;

// =============================================================================
// Row Types
// =============================================================================

interface AccountRow {
  customer_id: string;
  balance: number;
  created_at: string;
  updated_at: string;
}

interface LedgerRow {
  id: number;
  customer_id: string;
  entry_type: LedgerEntryType;
  amount: number;
  balance_after: number;
  reference_id: string | null;
  created_at: string;
}

// =============================================================================
// Helpers
// =============================================================================

function rowToAccount(row: AccountRow): PointsAccount {
  return {
    customerId: row.customer_id,
    balance: row.balance,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToEntry(row: LedgerRow): PointsLedgerEntry {
  return {
    id: row.id,
    customerId: row.customer_id,
    entryType: row.entry_type,
    amount: row.amount,
    balanceAfter: row.balance_after,
    referenceId: row.reference_id,
    createdAt: row.created_at,
  };
}

function assertPositiveAmount(amount: number): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new ValidationError(`Points amount must be a positive integer, got ${amount}`, 'amount');
  }
}

// =============================================================================
// Implementation
// =============================================================================

export class PointsAccountService implements IPointsAccountService {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  async getBalance(customerId: string): Promise<number> {
    return this.readBalance(customerId);
  }

  async ensureAccount(customerId: string): Promise<UpsertResult<PointsAccount>> {
    return this.db.transaction(() => this.ensureAccountRow(customerId)).immediate();
  }

  async getLedger(customerId: string, limit: number = DEFAULT_LEDGER_LIMIT): Promise<PointsLedgerEntry[]> {
    return this.db.prepare<[string, number], LedgerRow>(`
      SELECT * FROM points_ledger
      WHERE customer_id = ?
      ORDER BY id DESC
      LIMIT ?
    `).all(customerId, limit).map(rowToEntry);
  }

  async adjust(customerId: string, amount: number, referenceId: string): Promise<PointsLedgerEntry> {
    if (!Number.isSafeInteger(amount) || amount === 0) {
      throw new ValidationError(`Adjustment must be a non-zero integer, got ${amount}`, 'amount');
    }

    const entry = this.db.transaction(() =>
      amount > 0
        ? this.credit(customerId, amount, 'adjustment', referenceId)
        : this.debit(customerId, -amount, 'adjustment', referenceId)
    ).immediate();

    log.info({ event: 'points.adjusted', customerId, amount, referenceId }, 'Points balance adjusted');
    return entry;
  }

  async verifyBalance(customerId: string): Promise<BalanceCheck> {
    const row = this.db.prepare<[string, string], { balance: number; ledger_sum: number }>(`
      SELECT
        COALESCE((SELECT balance FROM points_accounts WHERE customer_id = ?), 0) AS balance,
        COALESCE((SELECT SUM(amount) FROM points_ledger WHERE customer_id = ?), 0) AS ledger_sum
    `).get(customerId, customerId);

    const balance = row?.balance ?? 0;
    const ledgerSum = row?.ledger_sum ?? 0;
    if (balance !== ledgerSum) {
      log.error({ event: 'points.drift', customerId, balance, ledgerSum }, 'Balance does not match ledger');
    }
    return { customerId, balance, ledgerSum, consistent: balance === ledgerSum };
  }

  // ---------------------------------------------------------------------------
  // Transaction participants
  // ---------------------------------------------------------------------------

  /**
   * Add points, creating the account on first credit.
   */
  credit(customerId: string, amount: number, entryType: CreditEntryType, referenceId: string | null): PointsLedgerEntry {
    assertPositiveAmount(amount);
    this.ensureAccountRow(customerId);

    const updated = this.db.prepare<[number, string], { balance: number }>(`
      UPDATE points_accounts
      SET balance = balance + ?, updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
      WHERE customer_id = ?
      RETURNING balance
    `).get(amount, customerId);

    if (!updated) {
      throw new NotFoundError('Points account', customerId);
    }
    return this.appendEntry(customerId, entryType, amount, updated.balance, referenceId);
  }

  /**
   * Remove points. Throws InsufficientPointsError (aborting the caller's
   * transaction) when the balance is below the amount.
   */
  debit(customerId: string, amount: number, entryType: DebitEntryType, referenceId: string | null): PointsLedgerEntry {
    assertPositiveAmount(amount);

    const updated = this.db.prepare<[number, string, number], { balance: number }>(`
      UPDATE points_accounts
      SET balance = balance - ?, updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
      WHERE customer_id = ? AND balance >= ?
      RETURNING balance
    `).get(amount, customerId, amount);

    if (!updated) {
      throw new InsufficientPointsError(amount, this.readBalance(customerId));
    }
    return this.appendEntry(customerId, entryType, -amount, updated.balance, referenceId);
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private readBalance(customerId: string): number {
    const row = this.db.prepare<[string], { balance: number }>(
      'SELECT balance FROM points_accounts WHERE customer_id = ?'
    ).get(customerId);
    return row?.balance ?? 0;
  }

  private ensureAccountRow(customerId: string): UpsertResult<PointsAccount> {
    const customer = this.db.prepare<[string], { id: string }>(
      'SELECT id FROM customers WHERE id = ?'
    ).get(customerId);
    if (!customer) {
      throw new NotFoundError('Customer', customerId);
    }

    const info = this.db.prepare<[string]>(`
      INSERT INTO points_accounts (customer_id) VALUES (?)
      ON CONFLICT(customer_id) DO NOTHING
    `).run(customerId);

    const row = this.db.prepare<[string], AccountRow>(
      'SELECT * FROM points_accounts WHERE customer_id = ?'
    ).get(customerId);
    if (!row) {
      throw new NotFoundError('Points account', customerId);
    }

    if (info.changes > 0) {
      log.debug({ event: 'points.account.created', customerId }, 'Points account created');
      return { outcome: 'created', value: rowToAccount(row) };
    }
    return { outcome: 'existing', value: rowToAccount(row) };
  }

  private appendEntry(
    customerId: string,
    entryType: LedgerEntryType,
    amount: number,
    balanceAfter: number,
    referenceId: string | null,
  ): PointsLedgerEntry {
    const row = this.db.prepare<[string, LedgerEntryType, number, number, string | null], LedgerRow>(`
      INSERT INTO points_ledger (customer_id, entry_type, amount, balance_after, reference_id)
      VALUES (?, ?, ?, ?, ?)
      RETURNING *
    `).get(customerId, entryType, amount, balanceAfter, referenceId);

    if (!row) {
      throw new Error(`Ledger insert returned no row for ${customerId}`);
    }
    return rowToEntry(row);
  }
}
