import { describe, it, expect } from 'vitest';
import { computeDiscount, describeRewardType, formatCents } from '../../../src/packages/core/rewards/discount.js';
import type { RewardType } from '../../../src/packages/core/ports/IRewardCatalog.js';

function rewardType(overrides: Partial<RewardType>): RewardType {
  return {
    id: 1,
    name: 'Repair Service Discount',
    category: 'REPAIR_DISCOUNT',
    discountKind: 'PERCENTAGE',
    discountValue: 50,
    description: '',
    isActive: true,
    ...overrides,
  };
}

describe('computeDiscount', () => {
  it('applies a percentage discount to the repair cost', () => {
    expect(computeDiscount(rewardType({}), 5000)).toEqual({
      originalCents: 5000,
      finalCents: 2500,
      savingsCents: 2500,
      discountApplied: true,
      description: '50% off',
    });
  });

  it('rounds percentage savings to the nearest cent', () => {
    const result = computeDiscount(rewardType({ discountValue: 33 }), 1001);
    expect(result.savingsCents).toBe(330);
    expect(result.finalCents).toBe(671);
  });

  it('makes a free-service reward cover the whole repair', () => {
    const result = computeDiscount(
      rewardType({ name: 'Free Service', category: 'FREE_SERVICE', discountKind: 'FREE', discountValue: 0 }),
      5000,
    );
    expect(result).toEqual({
      originalCents: 5000,
      finalCents: 0,
      savingsCents: 5000,
      discountApplied: true,
      description: 'Free repair',
    });
  });

  it('caps a fixed discount at the repair cost', () => {
    const type = rewardType({ discountKind: 'FIXED_AMOUNT', discountValue: 7500 });
    expect(computeDiscount(type, 5000).savingsCents).toBe(5000);
    expect(computeDiscount(type, 5000).finalCents).toBe(0);
  });

  it('describes fixed discounts in dollars', () => {
    const result = computeDiscount(rewardType({ discountKind: 'FIXED_AMOUNT', discountValue: 1500 }), 5000);
    expect(result.savingsCents).toBe(1500);
    expect(result.finalCents).toBe(3500);
    expect(result.description).toBe('$15.00 off');
  });

  it('never discounts a repair for merchandise rewards', () => {
    const treats = rewardType({ name: 'Office Treats', category: 'MERCHANDISE', discountKind: 'NONE', discountValue: 0 });
    expect(computeDiscount(treats, 5000)).toEqual({
      originalCents: 5000,
      finalCents: 5000,
      savingsCents: 0,
      discountApplied: false,
      description: 'No discount',
    });
  });

  it('ignores the discount kind when the category is not repair related', () => {
    const giftCard = rewardType({ category: 'GIFT_CARD', discountKind: 'PERCENTAGE', discountValue: 50 });
    expect(computeDiscount(giftCard, 5000).discountApplied).toBe(false);
    expect(computeDiscount(giftCard, 5000).finalCents).toBe(5000);
  });

  it('returns no discount without a reward type', () => {
    expect(computeDiscount(null, 4200).savingsCents).toBe(0);
    expect(computeDiscount(null, 4200).finalCents).toBe(4200);
  });

  it('reports no applied discount on a zero-cost repair', () => {
    const result = computeDiscount(rewardType({}), 0);
    expect(result.discountApplied).toBe(false);
    expect(result.description).toBe('50% off');
  });
});

describe('describeRewardType', () => {
  it('renders each discount kind', () => {
    expect(describeRewardType(rewardType({}))).toBe('Repair Service Discount - 50% off');
    expect(describeRewardType(rewardType({ name: 'Ten Off', discountKind: 'FIXED_AMOUNT', discountValue: 1000 })))
      .toBe('Ten Off - $10.00 off');
    expect(describeRewardType(rewardType({ name: 'Free Service', discountKind: 'FREE', discountValue: 0 })))
      .toBe('Free Service - Free');
    expect(describeRewardType(rewardType({ name: 'Office Treats', discountKind: 'NONE', discountValue: 0 })))
      .toBe('Office Treats');
  });
});

describe('formatCents', () => {
  it('formats with two decimals', () => {
    expect(formatCents(5)).toBe('$0.05');
    expect(formatCents(123456)).toBe('$1234.56');
  });
});
