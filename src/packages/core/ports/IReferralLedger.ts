/**
 * Referral Processing Port
 *
 * @module packages/core/ports/IReferralLedger
 */

export interface Referral {
  id: string;
  referralCodeId: string;
  code: string;
  referrerCustomerId: string;
  referredCustomerId: string;
  createdAt: string;
}

export interface ReferralStats {
  /** null until the customer has requested a code */
  code: string | null;
  totalReferrals: number;
  points: number;
}

export interface LeaderboardEntry {
  customerId: string;
  name: string;
  referralCount: number;
}

export interface IReferralLedger {
  /**
   * Record a referral and award points to both sides in one transaction.
   * Throws NotFoundError, SelfReferralError or DuplicateReferralError.
   */
  processReferral(code: string, referredCustomerId: string): Promise<Referral>;

  getReferralCount(customerId: string): Promise<number>;

  /** Referrals made with the customer's code, newest first */
  getReferralHistory(customerId: string): Promise<Referral[]>;

  getReferralStats(customerId: string): Promise<ReferralStats>;

  getLeaderboard(limit?: number): Promise<LeaderboardEntry[]>;
}
