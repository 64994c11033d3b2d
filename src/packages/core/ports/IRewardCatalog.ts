/**
 * Reward Options Port
 *
 * @module packages/core/ports/IRewardCatalog
 */

export type RewardCategory =
  | 'REPAIR_DISCOUNT'
  | 'REPLACEMENT_DISCOUNT'
  | 'FREE_SERVICE'
  | 'MERCHANDISE'
  | 'GIFT_CARD'
  | 'OTHER';

export type DiscountKind = 'PERCENTAGE' | 'FIXED_AMOUNT' | 'FREE' | 'NONE';

export interface RewardType {
  id: number;
  name: string;
  category: RewardCategory;
  discountKind: DiscountKind;
  /** Whole percent for PERCENTAGE, cents for FIXED_AMOUNT, 0 otherwise */
  discountValue: number;
  description: string;
  isActive: boolean;
}

export interface RewardOption {
  id: number;
  name: string;
  description: string;
  pointsRequired: number;
  rewardType: RewardType | null;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface AvailableRewards {
  points: number;
  available: RewardOption[];
  unavailable: RewardOption[];
}

export interface ListOptionsFilter {
  activeOnly?: boolean;
}

export interface IRewardCatalog {
  /** Ordered by points required, cheapest first */
  listOptions(filter?: ListOptionsFilter): Promise<RewardOption[]>;

  getOption(rewardOptionId: number): Promise<RewardOption | null>;

  /** Input is validated; throws ValidationError */
  createOption(input: unknown): Promise<RewardOption>;

  updateOption(rewardOptionId: number, patch: unknown): Promise<RewardOption>;

  /** Soft delete */
  deactivateOption(rewardOptionId: number): Promise<RewardOption>;

  createRewardType(input: unknown): Promise<RewardType>;

  listRewardTypes(): Promise<RewardType[]>;

  /** Active options split by whether the customer can afford them */
  getAvailableRewards(customerId: string): Promise<AvailableRewards>;
}
