/**
 * Catalog input schemas (staff-facing create/update payloads)
 */

import { z } from 'zod';

export const REWARD_CATEGORIES = [
  'REPAIR_DISCOUNT',
  'REPLACEMENT_DISCOUNT',
  'FREE_SERVICE',
  'MERCHANDISE',
  'GIFT_CARD',
  'OTHER',
] as const;

export const DISCOUNT_KINDS = ['PERCENTAGE', 'FIXED_AMOUNT', 'FREE', 'NONE'] as const;

export const rewardTypeInputSchema = z
  .object({
    name: z.string().trim().min(1).max(100),
    category: z.enum(REWARD_CATEGORIES),
    discountKind: z.enum(DISCOUNT_KINDS).default('NONE'),
    discountValue: z.number().int().min(0).default(0),
    description: z.string().max(500).default(''),
    isActive: z.boolean().default(true),
  })
  .superRefine((value, ctx) => {
    if (value.discountKind === 'PERCENTAGE' && (value.discountValue < 1 || value.discountValue > 100)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['discountValue'],
        message: 'Percentage discounts must be between 1 and 100',
      });
    }
    if (value.discountKind === 'FIXED_AMOUNT' && value.discountValue < 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['discountValue'],
        message: 'Fixed discounts must be at least 1 cent',
      });
    }
    if ((value.discountKind === 'FREE' || value.discountKind === 'NONE') && value.discountValue !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['discountValue'],
        message: `${value.discountKind} rewards carry no discount value`,
      });
    }
  });

export type RewardTypeInput = z.infer<typeof rewardTypeInputSchema>;

export const rewardOptionInputSchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: z.string().max(1000).default(''),
  pointsRequired: z.number().int().positive(),
  rewardTypeId: z.number().int().positive().nullable().default(null),
  isActive: z.boolean().default(true),
});

export type RewardOptionInput = z.infer<typeof rewardOptionInputSchema>;

export const rewardOptionPatchSchema = z
  .object({
    name: z.string().trim().min(1).max(100),
    description: z.string().max(1000),
    pointsRequired: z.number().int().positive(),
    rewardTypeId: z.number().int().positive().nullable(),
    isActive: z.boolean(),
  })
  .partial()
  .refine((patch) => Object.keys(patch).length > 0, { message: 'Patch must change at least one field' });

export type RewardOptionPatch = z.infer<typeof rewardOptionPatchSchema>;
