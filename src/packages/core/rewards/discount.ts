/**
 * Discount Rules
 *
 * Translates a reward type into savings on a repair. Only repair-oriented
 * categories reduce cost; merchandise-style rewards (donuts, pizza, gift
 * cards) are delivered separately and never touch the repair price.
 *
 * All amounts are integer cents.
 *
 * @module packages/core/rewards/discount
 */

import type { RewardCategory, RewardType } from '../ports/IRewardCatalog.js';

export interface DiscountResult {
  originalCents: number;
  finalCents: number;
  savingsCents: number;
  discountApplied: boolean;
  description: string;
}

const NON_DISCOUNT_CATEGORIES: ReadonlySet<RewardCategory> = new Set<RewardCategory>([
  'MERCHANDISE',
  'GIFT_CARD',
  'OTHER',
]);

export function formatCents(cents: number): string {
  return `$${(cents / 100).toFixed(2)}`;
}

function noDiscount(costCents: number): DiscountResult {
  return {
    originalCents: costCents,
    finalCents: costCents,
    savingsCents: 0,
    discountApplied: false,
    description: 'No discount',
  };
}

function withSavings(costCents: number, savingsCents: number, description: string): DiscountResult {
  return {
    originalCents: costCents,
    finalCents: costCents - savingsCents,
    savingsCents,
    discountApplied: savingsCents > 0,
    description,
  };
}

/**
 * Compute the discount a reward type grants against a repair cost.
 */
export function computeDiscount(rewardType: RewardType | null, costCents: number): DiscountResult {
  if (!rewardType || NON_DISCOUNT_CATEGORIES.has(rewardType.category)) {
    return noDiscount(costCents);
  }

  switch (rewardType.discountKind) {
    case 'PERCENTAGE': {
      const savings = Math.round((costCents * rewardType.discountValue) / 100);
      return withSavings(costCents, Math.min(savings, costCents), `${rewardType.discountValue}% off`);
    }
    case 'FIXED_AMOUNT':
      return withSavings(
        costCents,
        Math.min(rewardType.discountValue, costCents),
        `${formatCents(rewardType.discountValue)} off`,
      );
    case 'FREE':
      return withSavings(costCents, costCents, 'Free repair');
    case 'NONE':
      return noDiscount(costCents);
  }
}

/**
 * Human-readable label, e.g. "Repair Service Discount - 50% off"
 */
export function describeRewardType(rewardType: RewardType): string {
  switch (rewardType.discountKind) {
    case 'PERCENTAGE':
      return `${rewardType.name} - ${rewardType.discountValue}% off`;
    case 'FIXED_AMOUNT':
      return `${rewardType.name} - ${formatCents(rewardType.discountValue)} off`;
    case 'FREE':
      return `${rewardType.name} - Free`;
    case 'NONE':
      return rewardType.name;
  }
}
