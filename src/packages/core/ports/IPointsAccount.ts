/**
 * Points Balance Port
 *
 * The balance is a cache of the append-only points ledger. Every mutation
 * writes both in one transaction.
 *
 * @module packages/core/ports/IPointsAccount
 */

import type { UpsertResult } from './UpsertResult.js';

export type LedgerEntryType =
  | 'referral_award'
  | 'welcome_bonus'
  | 'redemption_debit'
  | 'redemption_refund'
  | 'adjustment';

export interface PointsAccount {
  customerId: string;
  balance: number;
  createdAt: string;
  updatedAt: string;
}

export interface PointsLedgerEntry {
  id: number;
  customerId: string;
  entryType: LedgerEntryType;
  /** Positive for credits, negative for debits */
  amount: number;
  balanceAfter: number;
  referenceId: string | null;
  createdAt: string;
}

export interface BalanceCheck {
  customerId: string;
  balance: number;
  ledgerSum: number;
  consistent: boolean;
}

export interface IPointsAccountService {
  /** 0 when the customer has no account yet */
  getBalance(customerId: string): Promise<number>;

  ensureAccount(customerId: string): Promise<UpsertResult<PointsAccount>>;

  /** Newest first */
  getLedger(customerId: string, limit?: number): Promise<PointsLedgerEntry[]>;

  /** Staff correction; negative amounts may not take the balance below zero */
  adjust(customerId: string, amount: number, referenceId: string): Promise<PointsLedgerEntry>;

  verifyBalance(customerId: string): Promise<BalanceCheck>;
}
