/**
 * ReferralLedger — Referral Recording and Awards
 *
 * A successful referral writes the referral row and both point awards in a
 * single immediate transaction. Either all three land or none do.
 *
 * @module packages/adapters/rewards/ReferralLedger
 */

import { randomUUID } from 'crypto';
import type Database from 'better-sqlite3';
import type {
  IReferralLedger,
  LeaderboardEntry,
  Referral,
  ReferralStats,
} from '../../core/ports/IReferralLedger.js';
import type { PointsAccountService } from './PointsAccountService.js';
import {
  DuplicateReferralError,
  NotFoundError,
  SelfReferralError,
} from '../../../utils/errors.js';
import { createChildLogger } from '../../../utils/logger.js';

const log = createChildLogger({ module: 'ReferralLedger' });

const DEFAULT_LEADERBOARD_SIZE = 10;

export interface ReferralAwards {
  referrerAwardPoints: number;
  welcomeBonusPoints: number;
}

// =============================================================================
// Row Types
// =============================================================================

interface ReferralRow {
  id: string;
  referral_code_id: string;
  code: string;
  referrer_customer_id: string;
  referred_customer_id: string;
  created_at: string;
}

interface CodeRow {
  id: string;
  customer_id: string;
  code: string;
}

interface LeaderboardRow {
  customer_id: string;
  name: string;
  referral_count: number;
}

function rowToReferral(row: ReferralRow): Referral {
  return {
    id: row.id,
    referralCodeId: row.referral_code_id,
    code: row.code,
    referrerCustomerId: row.referrer_customer_id,
    referredCustomerId: row.referred_customer_id,
    createdAt: row.created_at,
  };
}

const SELECT_REFERRAL = `
  SELECT r.id, r.referral_code_id, c.code, r.referrer_customer_id, r.referred_customer_id, r.created_at
  FROM referrals r
  JOIN referral_codes c ON c.id = r.referral_code_id
`;

// =============================================================================
// Implementation
// =============================================================================

export class ReferralLedger implements IReferralLedger {
  private db: Database.Database;
  private points: PointsAccountService;
  private awards: ReferralAwards;

  constructor(db: Database.Database, points: PointsAccountService, awards: ReferralAwards) {
    this.db = db;
    this.points = points;
    this.awards = awards;
  }

  async processReferral(code: string, referredCustomerId: string): Promise<Referral> {
    const referral = this.db.transaction((): Referral => {
      const codeRow = this.db.prepare<[string], CodeRow>(
        'SELECT id, customer_id, code FROM referral_codes WHERE code = ?'
      ).get(code);
      if (!codeRow) {
        throw new NotFoundError('Referral code', code);
      }

      const referred = this.db.prepare<[string], { id: string }>(
        'SELECT id FROM customers WHERE id = ?'
      ).get(referredCustomerId);
      if (!referred) {
        throw new NotFoundError('Customer', referredCustomerId);
      }

      if (codeRow.customer_id === referredCustomerId) {
        throw new SelfReferralError();
      }

      const duplicate = this.db.prepare<[string, string], { id: string }>(
        'SELECT id FROM referrals WHERE referral_code_id = ? AND referred_customer_id = ?'
      ).get(codeRow.id, referredCustomerId);
      if (duplicate) {
        throw new DuplicateReferralError(code);
      }

      const id = randomUUID();
      this.db.prepare<[string, string, string, string]>(`
        INSERT INTO referrals (id, referral_code_id, referrer_customer_id, referred_customer_id)
        VALUES (?, ?, ?, ?)
      `).run(id, codeRow.id, codeRow.customer_id, referredCustomerId);

      this.points.credit(codeRow.customer_id, this.awards.referrerAwardPoints, 'referral_award', id);
      this.points.credit(referredCustomerId, this.awards.welcomeBonusPoints, 'welcome_bonus', id);

      const row = this.db.prepare<[string], ReferralRow>(`${SELECT_REFERRAL} WHERE r.id = ?`).get(id);
      if (!row) {
        throw new NotFoundError('Referral', id);
      }
      return rowToReferral(row);
    }).immediate();

    log.info({
      event: 'referral.processed',
      referralId: referral.id,
      referrerCustomerId: referral.referrerCustomerId,
      referredCustomerId,
      referrerAward: this.awards.referrerAwardPoints,
      welcomeBonus: this.awards.welcomeBonusPoints,
    }, 'Referral processed');

    return referral;
  }

  async getReferralCount(customerId: string): Promise<number> {
    const row = this.db.prepare<[string], { count: number }>(
      'SELECT COUNT(*) AS count FROM referrals WHERE referrer_customer_id = ?'
    ).get(customerId);
    return row?.count ?? 0;
  }

  async getReferralHistory(customerId: string): Promise<Referral[]> {
    return this.db.prepare<[string], ReferralRow>(`
      ${SELECT_REFERRAL}
      WHERE r.referrer_customer_id = ?
      ORDER BY r.created_at DESC, r.rowid DESC
    `).all(customerId).map(rowToReferral);
  }

  async getReferralStats(customerId: string): Promise<ReferralStats> {
    const codeRow = this.db.prepare<[string], { code: string }>(
      'SELECT code FROM referral_codes WHERE customer_id = ?'
    ).get(customerId);

    return {
      code: codeRow?.code ?? null,
      totalReferrals: await this.getReferralCount(customerId),
      points: await this.points.getBalance(customerId),
    };
  }

  async getLeaderboard(limit: number = DEFAULT_LEADERBOARD_SIZE): Promise<LeaderboardEntry[]> {
    return this.db.prepare<[number], LeaderboardRow>(`
      SELECT c.id AS customer_id, c.name, COUNT(r.id) AS referral_count
      FROM referrals r
      JOIN customers c ON c.id = r.referrer_customer_id
      GROUP BY c.id, c.name
      ORDER BY referral_count DESC, c.id ASC
      LIMIT ?
    `).all(limit).map((row) => ({
      customerId: row.customer_id,
      name: row.name,
      referralCount: row.referral_count,
    }));
  }
}
