/**
 * Rewards Routes
 *
 * Points balance, catalog browsing and redemption requests for the calling
 * customer (X-Customer-Id).
 */

import { Router } from 'express';
import type { Response } from 'express';
import { z } from 'zod';
import type { RewardsServices } from '../../packages/adapters/rewards/index.js';
import { parseOrThrow } from '../../utils/validation.js';
import { customerIdOf, requireCustomer, type AuthenticatedRequest } from '../middleware.js';
import {
  serializeLedgerEntry,
  serializeRedemption,
  serializeRewardOption,
} from '../serializers.js';

// =============================================================================
// Schema Definitions
// =============================================================================

const redeemSchema = z.object({
  rewardOptionId: z.number().int().positive(),
});

const limitQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional(),
});

// =============================================================================
// Router
// =============================================================================

export function createRewardsRouter(
  services: Pick<RewardsServices, 'points' | 'catalog' | 'redemptions'>,
): Router {
  const router = Router();
  router.use(requireCustomer);

  /**
   * GET /api/rewards/balance
   */
  router.get('/balance', async (req: AuthenticatedRequest, res: Response) => {
    const customerId = customerIdOf(req);
    const balance = await services.points.getBalance(customerId);
    res.json({ customer_id: customerId, balance });
  });

  /**
   * GET /api/rewards/ledger
   * Points history, newest first
   */
  router.get('/ledger', async (req: AuthenticatedRequest, res: Response) => {
    const query = parseOrThrow(limitQuerySchema, req.query);
    const entries = await services.points.getLedger(customerIdOf(req), query.limit);
    res.json({ entries: entries.map(serializeLedgerEntry) });
  });

  /**
   * GET /api/rewards/options
   * Active options split by what the caller can afford
   */
  router.get('/options', async (req: AuthenticatedRequest, res: Response) => {
    const rewards = await services.catalog.getAvailableRewards(customerIdOf(req));
    res.json({
      points: rewards.points,
      available: rewards.available.map(serializeRewardOption),
      unavailable: rewards.unavailable.map(serializeRewardOption),
    });
  });

  /**
   * POST /api/rewards/redeem
   */
  router.post('/redeem', async (req: AuthenticatedRequest, res: Response) => {
    const body = parseOrThrow(redeemSchema, req.body);
    const redemption = await services.redemptions.redeem(customerIdOf(req), body.rewardOptionId);
    res.status(201).json({ redemption: serializeRedemption(redemption) });
  });

  /**
   * GET /api/rewards/redemptions
   */
  router.get('/redemptions', async (req: AuthenticatedRequest, res: Response) => {
    const query = parseOrThrow(limitQuerySchema, req.query);
    const redemptions = await services.redemptions.getRedemptionHistory(customerIdOf(req), query.limit);
    res.json({ redemptions: redemptions.map(serializeRedemption) });
  });

  return router;
}
