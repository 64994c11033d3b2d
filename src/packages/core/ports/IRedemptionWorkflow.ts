/**
 * Redemption State Machine Port
 *
 * State transitions:
 *   pending  → assigned   (technician picked)
 *   pending  → rejected
 *   assigned → fulfilled  (technician completes)
 *   assigned → rejected
 *   pending  → fulfilled  (only when unassigned fulfillment is enabled)
 *
 * fulfilled and rejected are terminal.
 *
 * @module packages/core/ports/IRedemptionWorkflow
 */

import type { DiscountResult } from '../rewards/discount.js';

export type RedemptionStatus = 'pending' | 'assigned' | 'fulfilled' | 'rejected';

export interface Redemption {
  id: string;
  customerId: string;
  rewardOptionId: number;
  rewardOptionName: string;
  /** Cost snapshot taken at redemption time */
  pointsSpent: number;
  status: RedemptionStatus;
  assignedTechnicianId: string | null;
  processedBy: string | null;
  notes: string | null;
  rejectionReason: string | null;
  appliedToRepairId: string | null;
  createdAt: string;
  assignedAt: string | null;
  processedAt: string | null;
  fulfilledAt: string | null;
  rejectedAt: string | null;
}

export interface IRedemptionWorkflow {
  /**
   * Debit the option's cost and open a pending redemption, then try to
   * assign it. Throws UnknownOptionError or InsufficientPointsError.
   */
  redeem(customerId: string, rewardOptionId: number): Promise<Redemption>;

  fulfill(redemptionId: string, technicianId: string, notes?: string): Promise<Redemption>;

  reject(redemptionId: string, reason: string, rejectedBy?: string): Promise<Redemption>;

  /** Apply a fulfilled redemption's discount to a repair; once per redemption */
  applyToRepair(redemptionId: string, repairId: string): Promise<DiscountResult>;

  getRedemption(redemptionId: string): Promise<Redemption | null>;

  /** Newest first */
  getRedemptionHistory(customerId: string, limit?: number): Promise<Redemption[]>;

  /** Oldest first */
  getPendingRedemptions(): Promise<Redemption[]>;

  /** Open (assigned or pending) redemptions for a technician, oldest first */
  getTechnicianRedemptions(technicianId: string): Promise<Redemption[]>;
}
