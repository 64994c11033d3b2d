/**
 * RedemptionWorkflow — Points-for-Reward Lifecycle
 *
 * Formal state transitions with SQL WHERE guards to prevent invalid moves.
 * Every transition re-reads the row inside an immediate transaction and
 * updates with `WHERE status IN (...)`, so concurrent moves cannot both win.
 *
 * States: pending → assigned → fulfilled
 *         pending | assigned → rejected
 *         pending → fulfilled (only with unassigned fulfillment enabled)
 *
 * Notifications run after commit and never undo a transition.
 *
 * @module packages/adapters/rewards/RedemptionWorkflow
 */

import { randomUUID } from 'crypto';
import type Database from 'better-sqlite3';
import type { INotificationSender } from '../../core/ports/INotificationSender.js';
import type {
  IRedemptionWorkflow,
  Redemption,
  RedemptionStatus,
} from '../../core/ports/IRedemptionWorkflow.js';
import type { IRepairTracker } from '../../core/ports/IRepairTracker.js';
import type { ITechnicianAssigner } from '../../core/ports/ITechnicianAssigner.js';
import { computeDiscount, type DiscountResult } from '../../core/rewards/discount.js';
import { canTransition, sourcesFor, type TransitionPolicy } from '../../core/rewards/redemption-states.js';
import { notifySafely } from '../notifications/dispatch.js';
import type { PointsAccountService } from './PointsAccountService.js';
import type { RewardCatalog } from './RewardCatalog.js';
import {
  AppError,
  DependencyFailureError,
  DiscountAlreadyAppliedError,
  InvalidTransitionError,
  NotAssignedTechnicianError,
  NotFoundError,
  RedemptionNotFulfilledError,
  UnknownOptionError,
  ValidationError,
  errorMessage,
} from '../../../utils/errors.js';
import { createChildLogger } from '../../../utils/logger.js';

const log = createChildLogger({ module: 'RedemptionWorkflow' });

// =============================================================================
// Types
// =============================================================================

export interface RedemptionPolicy extends TransitionPolicy {
  /** Return points_spent to the customer when a redemption is rejected */
  refundOnReject: boolean;
}

export interface RedemptionWorkflowDeps {
  db: Database.Database;
  points: PointsAccountService;
  catalog: RewardCatalog;
  assigner: ITechnicianAssigner;
  repairs: IRepairTracker;
  notifier: INotificationSender;
  policy: RedemptionPolicy;
}

interface RedemptionRow {
  id: string;
  customer_id: string;
  reward_option_id: number;
  reward_option_name: string;
  points_spent: number;
  status: RedemptionStatus;
  assigned_technician_id: string | null;
  processed_by: string | null;
  notes: string | null;
  rejection_reason: string | null;
  applied_to_repair_id: string | null;
  created_at: string;
  assigned_at: string | null;
  processed_at: string | null;
  fulfilled_at: string | null;
  rejected_at: string | null;
}

// =============================================================================
// Helpers
// =============================================================================

function rowToRedemption(row: RedemptionRow): Redemption {
  return {
    id: row.id,
    customerId: row.customer_id,
    rewardOptionId: row.reward_option_id,
    rewardOptionName: row.reward_option_name,
    pointsSpent: row.points_spent,
    status: row.status,
    assignedTechnicianId: row.assigned_technician_id,
    processedBy: row.processed_by,
    notes: row.notes,
    rejectionReason: row.rejection_reason,
    appliedToRepairId: row.applied_to_repair_id,
    createdAt: row.created_at,
    assignedAt: row.assigned_at,
    processedAt: row.processed_at,
    fulfilledAt: row.fulfilled_at,
    rejectedAt: row.rejected_at,
  };
}

const SELECT_REDEMPTION = `
  SELECT r.*, o.name AS reward_option_name
  FROM redemptions r
  JOIN reward_options o ON o.id = r.reward_option_id
`;

function placeholders(values: readonly unknown[]): string {
  return values.map(() => '?').join(', ');
}

// =============================================================================
// RedemptionWorkflow
// =============================================================================

export class RedemptionWorkflow implements IRedemptionWorkflow {
  private db: Database.Database;
  private points: PointsAccountService;
  private catalog: RewardCatalog;
  private assigner: ITechnicianAssigner;
  private repairs: IRepairTracker;
  private notifier: INotificationSender;
  private policy: RedemptionPolicy;

  constructor(deps: RedemptionWorkflowDeps) {
    this.db = deps.db;
    this.points = deps.points;
    this.catalog = deps.catalog;
    this.assigner = deps.assigner;
    this.repairs = deps.repairs;
    this.notifier = deps.notifier;
    this.policy = deps.policy;
  }

  /**
   * Debit the option's current price and open a pending redemption.
   * Assignment is attempted afterwards; if it fails the redemption
   * simply stays pending for staff to pick up.
   */
  async redeem(customerId: string, rewardOptionId: number): Promise<Redemption> {
    if (!Number.isSafeInteger(rewardOptionId) || rewardOptionId <= 0) {
      throw new ValidationError('rewardOptionId must be a positive integer', 'rewardOptionId');
    }

    const redemptionId = randomUUID();
    const created = this.db.transaction((): Redemption => {
      const option = this.catalog.findOption(rewardOptionId);
      if (!option || !option.isActive) {
        throw new UnknownOptionError(rewardOptionId);
      }

      const customer = this.db.prepare<[string], { id: string }>(
        'SELECT id FROM customers WHERE id = ?'
      ).get(customerId);
      if (!customer) {
        throw new NotFoundError('Customer', customerId);
      }

      this.points.debit(customerId, option.pointsRequired, 'redemption_debit', redemptionId);

      this.db.prepare<[string, string, number, number]>(`
        INSERT INTO redemptions (id, customer_id, reward_option_id, points_spent, status)
        VALUES (?, ?, ?, ?, 'pending')
      `).run(redemptionId, customerId, rewardOptionId, option.pointsRequired);

      return this.requireRedemption(redemptionId);
    }).immediate();

    log.info({
      event: 'redemption.created',
      redemptionId,
      customerId,
      rewardOptionId,
      pointsSpent: created.pointsSpent,
    }, 'Redemption created');

    try {
      await this.assigner.assign(redemptionId);
    } catch (error) {
      log.warn(
        { event: 'redemption.assign.failed', redemptionId, error: errorMessage(error) },
        'Technician assignment failed; redemption stays pending'
      );
    }

    return this.findRedemption(redemptionId) ?? created;
  }

  async fulfill(redemptionId: string, technicianId: string, notes?: string): Promise<Redemption> {
    const roster = await this.callRepairTracker(() => this.repairs.listTechnicians());
    const technician = roster.find((candidate) => candidate.id === technicianId && candidate.isActive);
    if (!technician) {
      throw new NotFoundError('Technician', technicianId);
    }

    const sources = sourcesFor('fulfilled', this.policy);
    const fulfilled = this.db.transaction((): Redemption => {
      const current = this.requireRedemption(redemptionId);
      if (!canTransition(current.status, 'fulfilled', this.policy)) {
        throw new InvalidTransitionError(redemptionId, current.status, 'fulfilled');
      }
      if (current.assignedTechnicianId !== null
        && current.assignedTechnicianId !== technicianId
        && !technician.isManager) {
        throw new NotAssignedTechnicianError(redemptionId, technicianId);
      }

      const info = this.db.prepare(`
        UPDATE redemptions
        SET status = 'fulfilled', processed_by = ?, notes = ?,
            processed_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now'),
            fulfilled_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
        WHERE id = ? AND status IN (${placeholders(sources)})
      `).run(technicianId, notes ?? null, redemptionId, ...sources);
      if (info.changes === 0) {
        throw new InvalidTransitionError(redemptionId, current.status, 'fulfilled');
      }

      return this.requireRedemption(redemptionId);
    }).immediate();

    log.info({ event: 'redemption.fulfilled', redemptionId, technicianId }, 'Redemption fulfilled');

    await notifySafely(this.notifier, {
      recipient: { type: 'customer', id: fulfilled.customerId },
      message: `Your reward "${fulfilled.rewardOptionName}" has been fulfilled.`,
      redemptionId,
    });

    return fulfilled;
  }

  async reject(redemptionId: string, reason: string, rejectedBy?: string): Promise<Redemption> {
    const trimmedReason = reason.trim();
    if (trimmedReason.length === 0) {
      throw new ValidationError('A rejection reason is required', 'reason');
    }

    const sources = sourcesFor('rejected', this.policy);
    const rejected = this.db.transaction((): Redemption => {
      const current = this.requireRedemption(redemptionId);
      if (!canTransition(current.status, 'rejected', this.policy)) {
        throw new InvalidTransitionError(redemptionId, current.status, 'rejected');
      }

      const info = this.db.prepare(`
        UPDATE redemptions
        SET status = 'rejected', rejection_reason = ?, processed_by = ?,
            processed_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now'),
            rejected_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
        WHERE id = ? AND status IN (${placeholders(sources)})
      `).run(trimmedReason, rejectedBy ?? null, redemptionId, ...sources);
      if (info.changes === 0) {
        throw new InvalidTransitionError(redemptionId, current.status, 'rejected');
      }

      if (this.policy.refundOnReject) {
        this.points.credit(current.customerId, current.pointsSpent, 'redemption_refund', redemptionId);
      }

      return this.requireRedemption(redemptionId);
    }).immediate();

    log.info({
      event: 'redemption.rejected',
      redemptionId,
      rejectedBy: rejectedBy ?? null,
      refundedPoints: this.policy.refundOnReject ? rejected.pointsSpent : 0,
    }, 'Redemption rejected');

    const refundNote = this.policy.refundOnReject
      ? ` ${rejected.pointsSpent} points have been returned to your balance.`
      : '';
    await notifySafely(this.notifier, {
      recipient: { type: 'customer', id: rejected.customerId },
      message: `Your reward "${rejected.rewardOptionName}" could not be provided: ${trimmedReason}.${refundNote}`,
      redemptionId,
    });

    return rejected;
  }

  /**
   * Apply a fulfilled redemption's discount to a repair. Rewards that carry
   * no discount (merchandise, gift cards) return a zero result and are not
   * recorded against the repair.
   *
   * The redemption is claimed before the repair tracker is called, so two
   * concurrent applications of one redemption cannot both discount a repair.
   * The claim is released when the tracker refuses or fails.
   */
  async applyToRepair(redemptionId: string, repairId: string): Promise<DiscountResult> {
    this.claimForRepair(redemptionId, repairId);

    let discount: DiscountResult;
    try {
      discount = await this.discountRepair(redemptionId, repairId);
    } catch (error) {
      this.releaseRepairClaim(redemptionId, repairId);
      throw error;
    }

    if (!discount.discountApplied) {
      this.releaseRepairClaim(redemptionId, repairId);
      log.info({ event: 'redemption.apply.no_discount', redemptionId, repairId }, 'Reward carries no repair discount');
      return discount;
    }

    log.info({
      event: 'redemption.applied',
      redemptionId,
      repairId,
      savingsCents: discount.savingsCents,
    }, 'Redemption discount applied to repair');

    return discount;
  }

  private claimForRepair(redemptionId: string, repairId: string): void {
    this.db.transaction(() => {
      const redemption = this.requireRedemption(redemptionId);
      if (redemption.status !== 'fulfilled') {
        throw new RedemptionNotFulfilledError(redemptionId, redemption.status);
      }
      if (redemption.appliedToRepairId !== null) {
        throw new DiscountAlreadyAppliedError(
          `Redemption ${redemptionId} was already applied to repair ${redemption.appliedToRepairId}`
        );
      }

      const info = this.db.prepare<[string, string]>(`
        UPDATE redemptions SET applied_to_repair_id = ?
        WHERE id = ? AND status = 'fulfilled' AND applied_to_repair_id IS NULL
      `).run(repairId, redemptionId);
      if (info.changes === 0) {
        throw new DiscountAlreadyAppliedError(`Redemption ${redemptionId} was already applied`);
      }
    }).immediate();
  }

  private releaseRepairClaim(redemptionId: string, repairId: string): void {
    this.db.prepare<[string, string]>(`
      UPDATE redemptions SET applied_to_repair_id = NULL
      WHERE id = ? AND applied_to_repair_id = ?
    `).run(redemptionId, repairId);
  }

  private async discountRepair(redemptionId: string, repairId: string): Promise<DiscountResult> {
    const redemption = this.requireRedemption(redemptionId);
    const repair = await this.callRepairTracker(() => this.repairs.getRepair(repairId));
    if (!repair) {
      throw new NotFoundError('Repair', repairId);
    }
    if (repair.appliedRedemptionId !== null) {
      throw new DiscountAlreadyAppliedError(`Repair ${repairId} already carries a reward discount`);
    }

    const option = this.catalog.findOption(redemption.rewardOptionId);
    const discount = computeDiscount(option?.rewardType ?? null, repair.costCents);
    if (discount.discountApplied) {
      await this.callRepairTracker(() => this.repairs.applyDiscount(repairId, discount, redemptionId));
    }
    return discount;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  async getRedemption(redemptionId: string): Promise<Redemption | null> {
    return this.findRedemption(redemptionId);
  }

  async getRedemptionHistory(customerId: string, limit?: number): Promise<Redemption[]> {
    return this.db.prepare<[string, number], RedemptionRow>(`
      ${SELECT_REDEMPTION}
      WHERE r.customer_id = ?
      ORDER BY r.created_at DESC, r.rowid DESC
      LIMIT ?
    `).all(customerId, limit ?? -1).map(rowToRedemption);
  }

  async getPendingRedemptions(): Promise<Redemption[]> {
    return this.db.prepare<[], RedemptionRow>(`
      ${SELECT_REDEMPTION}
      WHERE r.status = 'pending'
      ORDER BY r.created_at ASC, r.rowid ASC
    `).all().map(rowToRedemption);
  }

  async getTechnicianRedemptions(technicianId: string): Promise<Redemption[]> {
    return this.db.prepare<[string], RedemptionRow>(`
      ${SELECT_REDEMPTION}
      WHERE r.assigned_technician_id = ? AND r.status IN ('pending', 'assigned')
      ORDER BY r.created_at ASC, r.rowid ASC
    `).all(technicianId).map(rowToRedemption);
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private findRedemption(redemptionId: string): Redemption | null {
    const row = this.db.prepare<[string], RedemptionRow>(`${SELECT_REDEMPTION} WHERE r.id = ?`).get(redemptionId);
    return row ? rowToRedemption(row) : null;
  }

  private requireRedemption(redemptionId: string): Redemption {
    const redemption = this.findRedemption(redemptionId);
    if (!redemption) {
      throw new NotFoundError('Redemption', redemptionId);
    }
    return redemption;
  }

  private async callRepairTracker<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new DependencyFailureError('repair-tracker', errorMessage(error));
    }
  }
}
