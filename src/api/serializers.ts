/**
 * Wire formats for API responses (snake_case, as clients expect)
 */

import type { Customer } from '../packages/core/ports/ICustomerDirectory.js';
import type { PointsLedgerEntry } from '../packages/core/ports/IPointsAccount.js';
import type { Redemption } from '../packages/core/ports/IRedemptionWorkflow.js';
import type { ReferralCode } from '../packages/core/ports/IReferralCodeRegistry.js';
import type { LeaderboardEntry, Referral } from '../packages/core/ports/IReferralLedger.js';
import type { Repair, Technician } from '../packages/core/ports/IRepairTracker.js';
import type { RewardOption, RewardType } from '../packages/core/ports/IRewardCatalog.js';
import { describeRewardType, type DiscountResult } from '../packages/core/rewards/discount.js';
import type { StoredNotification } from '../packages/adapters/notifications/SqliteNotificationSender.js';

export function serializeCustomer(customer: Customer) {
  return {
    id: customer.id,
    name: customer.name,
    email: customer.email,
    phone: customer.phone,
    created_at: customer.createdAt,
  };
}

export function serializeReferralCode(code: ReferralCode) {
  return {
    code: code.code,
    customer_id: code.customerId,
    created_at: code.createdAt,
  };
}

export function serializeReferral(referral: Referral) {
  return {
    id: referral.id,
    code: referral.code,
    referrer_customer_id: referral.referrerCustomerId,
    referred_customer_id: referral.referredCustomerId,
    created_at: referral.createdAt,
  };
}

export function serializeLeaderboardEntry(entry: LeaderboardEntry, index: number) {
  return {
    rank: index + 1,
    customer_id: entry.customerId,
    name: entry.name,
    referral_count: entry.referralCount,
  };
}

export function serializeLedgerEntry(entry: PointsLedgerEntry) {
  return {
    id: entry.id,
    entry_type: entry.entryType,
    amount: entry.amount,
    balance_after: entry.balanceAfter,
    reference_id: entry.referenceId,
    created_at: entry.createdAt,
  };
}

export function serializeRewardType(rewardType: RewardType) {
  return {
    id: rewardType.id,
    name: rewardType.name,
    category: rewardType.category,
    discount_kind: rewardType.discountKind,
    discount_value: rewardType.discountValue,
    description: rewardType.description,
    label: describeRewardType(rewardType),
    is_active: rewardType.isActive,
  };
}

export function serializeRewardOption(option: RewardOption) {
  return {
    id: option.id,
    name: option.name,
    description: option.description,
    points_required: option.pointsRequired,
    reward_type: option.rewardType ? serializeRewardType(option.rewardType) : null,
    is_active: option.isActive,
    created_at: option.createdAt,
    updated_at: option.updatedAt,
  };
}

export function serializeRedemption(redemption: Redemption) {
  return {
    id: redemption.id,
    customer_id: redemption.customerId,
    reward_option_id: redemption.rewardOptionId,
    reward_option_name: redemption.rewardOptionName,
    points_spent: redemption.pointsSpent,
    status: redemption.status,
    assigned_technician_id: redemption.assignedTechnicianId,
    processed_by: redemption.processedBy,
    notes: redemption.notes,
    rejection_reason: redemption.rejectionReason,
    applied_to_repair_id: redemption.appliedToRepairId,
    created_at: redemption.createdAt,
    assigned_at: redemption.assignedAt,
    processed_at: redemption.processedAt,
    fulfilled_at: redemption.fulfilledAt,
    rejected_at: redemption.rejectedAt,
  };
}

export function serializeDiscount(discount: DiscountResult) {
  return {
    original_cents: discount.originalCents,
    final_cents: discount.finalCents,
    savings_cents: discount.savingsCents,
    discount_applied: discount.discountApplied,
    description: discount.description,
  };
}

export function serializeTechnician(technician: Technician) {
  return {
    id: technician.id,
    name: technician.name,
    is_manager: technician.isManager,
    is_active: technician.isActive,
  };
}

export function serializeRepair(repair: Repair) {
  return {
    id: repair.id,
    technician_id: repair.technicianId,
    customer_id: repair.customerId,
    unit_number: repair.unitNumber,
    queue_status: repair.queueStatus,
    cost_cents: repair.costCents,
    discount_cents: repair.discountCents,
    applied_redemption_id: repair.appliedRedemptionId,
  };
}

export function serializeNotification(notification: StoredNotification) {
  return {
    id: notification.id,
    message: notification.message,
    redemption_id: notification.redemptionId,
    created_at: notification.createdAt,
    read_at: notification.readAt,
  };
}
