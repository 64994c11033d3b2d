/**
 * Technician Routes
 *
 * Work queue for technicians fulfilling reward redemptions
 * (X-Technician-Id).
 */

import { Router } from 'express';
import type { Response } from 'express';
import { z } from 'zod';
import type { RewardsServices } from '../../packages/adapters/rewards/index.js';
import { parseOrThrow } from '../../utils/validation.js';
import {
  requireTechnician,
  routeParam,
  technicianIdOf,
  type AuthenticatedRequest,
} from '../middleware.js';
import { serializeDiscount, serializeRedemption } from '../serializers.js';

const fulfillSchema = z.object({
  notes: z.string().trim().max(1000).optional(),
});

const rejectSchema = z.object({
  reason: z.string().trim().min(1).max(500),
});

const applySchema = z.object({
  repairId: z.string().trim().min(1),
});

export function createTechnicianRouter(services: Pick<RewardsServices, 'redemptions'>): Router {
  const router = Router();
  router.use(requireTechnician);

  /**
   * GET /api/technician/redemptions
   * Open redemptions assigned to the caller, oldest first
   */
  router.get('/redemptions', async (req: AuthenticatedRequest, res: Response) => {
    const redemptions = await services.redemptions.getTechnicianRedemptions(technicianIdOf(req));
    res.json({ redemptions: redemptions.map(serializeRedemption) });
  });

  /**
   * POST /api/technician/redemptions/:id/fulfill
   */
  router.post('/redemptions/:id/fulfill', async (req: AuthenticatedRequest, res: Response) => {
    const body = parseOrThrow(fulfillSchema, req.body ?? {});
    const redemption = await services.redemptions.fulfill(
      routeParam(req, 'id'),
      technicianIdOf(req),
      body.notes,
    );
    res.json({ redemption: serializeRedemption(redemption) });
  });

  /**
   * POST /api/technician/redemptions/:id/reject
   */
  router.post('/redemptions/:id/reject', async (req: AuthenticatedRequest, res: Response) => {
    const body = parseOrThrow(rejectSchema, req.body);
    const redemption = await services.redemptions.reject(routeParam(req, 'id'), body.reason, technicianIdOf(req));
    res.json({ redemption: serializeRedemption(redemption) });
  });

  /**
   * POST /api/technician/redemptions/:id/apply
   * Apply a fulfilled redemption's discount to a repair
   */
  router.post('/redemptions/:id/apply', async (req: AuthenticatedRequest, res: Response) => {
    const body = parseOrThrow(applySchema, req.body);
    const discount = await services.redemptions.applyToRepair(routeParam(req, 'id'), body.repairId);
    res.json({ discount: serializeDiscount(discount) });
  });

  return router;
}
