/**
 * Referral Routes
 *
 * Customer-facing referral code and referral endpoints. Caller identity
 * comes from the X-Customer-Id header set by the gateway.
 */

import { Router } from 'express';
import type { Response } from 'express';
import { z } from 'zod';
import type { RewardsServices } from '../../packages/adapters/rewards/index.js';
import { NotFoundError } from '../../utils/errors.js';
import { parseOrThrow } from '../../utils/validation.js';
import { customerIdOf, requireCustomer, type AuthenticatedRequest } from '../middleware.js';
import {
  serializeLeaderboardEntry,
  serializeReferral,
  serializeReferralCode,
} from '../serializers.js';

// =============================================================================
// Schema Definitions
// =============================================================================

const redeemCodeSchema = z.object({
  code: z.string().trim().min(1).max(16),
});

const leaderboardQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(10),
});

// =============================================================================
// Router
// =============================================================================

export function createReferralRouter(
  services: Pick<RewardsServices, 'customers' | 'referralCodes' | 'referrals'>,
): Router {
  const router = Router();

  /**
   * GET /api/referrals/leaderboard
   * Top referrers by referral count
   */
  router.get('/leaderboard', async (req: AuthenticatedRequest, res: Response) => {
    const query = parseOrThrow(leaderboardQuerySchema, req.query);
    const leaders = await services.referrals.getLeaderboard(query.limit);
    res.json({ leaderboard: leaders.map(serializeLeaderboardEntry) });
  });

  router.use(requireCustomer);

  /**
   * POST /api/referrals/code
   * Get or create the caller's referral code
   */
  router.post('/code', async (req: AuthenticatedRequest, res: Response) => {
    const customerId = customerIdOf(req);
    const result = await services.referralCodes.getOrCreateCode(customerId);
    res.status(result.outcome === 'created' ? 201 : 200).json({
      created: result.outcome === 'created',
      referral_code: serializeReferralCode(result.value),
    });
  });

  /**
   * GET /api/referrals/code
   */
  router.get('/code', async (req: AuthenticatedRequest, res: Response) => {
    const customerId = customerIdOf(req);
    const code = await services.referralCodes.getCodeForCustomer(customerId);
    if (!code) {
      throw new NotFoundError('Referral code for customer', customerId);
    }
    res.json({ referral_code: serializeReferralCode(code) });
  });

  /**
   * POST /api/referrals/redeem-code
   * Apply someone else's referral code to the caller
   */
  router.post('/redeem-code', async (req: AuthenticatedRequest, res: Response) => {
    const customerId = customerIdOf(req);
    const body = parseOrThrow(redeemCodeSchema, req.body);
    await services.customers.requireCustomer(customerId);

    const referral = await services.referrals.processReferral(body.code, customerId);
    res.status(201).json({ referral: serializeReferral(referral) });
  });

  /**
   * GET /api/referrals/stats
   */
  router.get('/stats', async (req: AuthenticatedRequest, res: Response) => {
    const stats = await services.referrals.getReferralStats(customerIdOf(req));
    res.json({
      code: stats.code,
      total_referrals: stats.totalReferrals,
      points: stats.points,
    });
  });

  /**
   * GET /api/referrals/history
   */
  router.get('/history', async (req: AuthenticatedRequest, res: Response) => {
    const referrals = await services.referrals.getReferralHistory(customerIdOf(req));
    res.json({ referrals: referrals.map(serializeReferral) });
  });

  return router;
}
